/**
 * warnarr run
 * Match every movie against DoesTheDogDie.com and annotate its overview.
 */

import { Command } from 'commander';

import { findMoviesByTitle, iterateLibraries, JellyfinWriter, resolveLibraries } from '../jellyfin/library.js';
import type { MediaItem } from '../matching/types.js';
import { runBatch } from '../pipeline/process.js';
import {
  formatOutcome,
  formatSummary,
  printError,
  printHeader,
  printLines,
  printWarning,
} from '../report/console.js';
import { loadConfig } from '../shared/config.js';
import { errorMessage } from '../shared/types.js';
import { connectJellyfin, makeMatcher, makeRunLogger, openCache } from './context.js';

interface RunOptions {
  dryRun?: boolean;
  movie?: string;
  refreshCache?: boolean;
  config?: string;
}

export function runCommand(baseDir: string): Command {
  return new Command('run')
    .description('Add content warnings to Jellyfin movie overviews')
    .option('--dry-run', 'Preview changes without writing to Jellyfin')
    .option('--movie <title>', 'Process a single movie by title (exact match)')
    .option('--refresh-cache', 'Clear the DTDD response cache before running')
    .option('-c, --config <path>', 'Config file path')
    .action(async (opts: RunOptions) => {
      try {
        const config = loadConfig(baseDir, opts.config);
        const dryRun = Boolean(opts.dryRun) || config.dryRun;

        const jellyfin = await connectJellyfin(config);
        const { libraries, warnings } = await resolveLibraries(jellyfin, config.jellyfin.libraries);
        for (const w of warnings) printWarning(w);
        if (libraries.length === 0) {
          throw new Error('No movie libraries found to process.');
        }

        let items: Iterable<MediaItem> | AsyncIterable<MediaItem>;
        if (opts.movie) {
          const found = await findMoviesByTitle(jellyfin, libraries, opts.movie);
          if (found.length === 0) {
            console.log(`Movie '${opts.movie}' not found in Jellyfin.`);
            return;
          }
          items = found;
        } else {
          items = iterateLibraries(jellyfin, libraries, {
            onLibrary: (lib, count) => printHeader(`Processing: ${lib.Name} (${count} movies)`),
            onLibraryError: (lib, err) =>
              printError(`Could not list library '${lib.Name}', skipping: ${errorMessage(err)}`),
          });
        }

        const cache = openCache(config);
        try {
          if (opts.refreshCache) {
            console.log(`Cache cleared (${cache.clear()} entries, ${config.cache.dbPath})`);
          }
          if (dryRun) console.log('DRY RUN — no changes will be made to Jellyfin\n');

          const runLog = makeRunLogger(config);
          const startedAt = new Date().toISOString();
          const summary = await runBatch(
            items,
            { matcher: makeMatcher(config, cache), writer: new JellyfinWriter(jellyfin) },
            {
              thresholds: config.warnings,
              separator: config.warnings.separator,
              dryRun,
              onOutcome: (outcome) => {
                printLines(formatOutcome(outcome));
                runLog?.record(outcome);
              },
            }
          );

          printLines(formatSummary(summary));
          if (runLog) {
            const logPath = runLog.flush();
            runLog.writeStatus({
              mode: 'run',
              startedAt,
              finishedAt: new Date().toISOString(),
              summary,
              logPath,
            });
            console.log(`Run log: ${logPath}`);
          }
        } finally {
          cache.close();
        }
      } catch (err) {
        printError(errorMessage(err));
        process.exit(1);
      }
    });
}
