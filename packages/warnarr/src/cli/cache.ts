/**
 * Cache management commands
 */

import { Command } from 'commander';

import { printError } from '../report/console.js';
import { loadConfig } from '../shared/config.js';
import { errorMessage } from '../shared/types.js';
import { openCache } from './context.js';

function formatTime(ms: number | null): string {
  return ms === null ? '—' : new Date(ms).toISOString();
}

export function cacheCommand(baseDir: string): Command {
  const cmd = new Command('cache')
    .description('Manage the DoesTheDogDie.com response cache');

  cmd
    .command('stats')
    .description('Show cache statistics')
    .option('-c, --config <path>', 'Config file path')
    .action(async (opts: { config?: string }) => {
      try {
        const config = loadConfig(baseDir, opts.config, { requireDtddKey: false });
        const cache = openCache(config);
        try {
          const stats = cache.stats();
          console.log(`Cache DB : ${config.cache.dbPath}`);
          console.log(`TTL      : ${config.cache.ttlSeconds} seconds`);
          console.log(`Entries  : ${stats.entries} (${stats.fresh} fresh, ${stats.stale} stale)`);
          console.log(`Oldest   : ${formatTime(stats.oldestCachedAt)}`);
          console.log(`Newest   : ${formatTime(stats.newestCachedAt)}`);
        } finally {
          cache.close();
        }
      } catch (err) {
        printError(errorMessage(err));
        process.exit(1);
      }
    });

  cmd
    .command('clear')
    .description('Clear the response cache')
    .option('-c, --config <path>', 'Config file path')
    .action(async (opts: { config?: string }) => {
      try {
        const config = loadConfig(baseDir, opts.config, { requireDtddKey: false });
        const cache = openCache(config);
        try {
          const removed = cache.clear();
          console.log(`Cache cleared (${removed} entries, ${config.cache.dbPath})`);
        } finally {
          cache.close();
        }
      } catch (err) {
        printError(errorMessage(err));
        process.exit(1);
      }
    });

  return cmd;
}
