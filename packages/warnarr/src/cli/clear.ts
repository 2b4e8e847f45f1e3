/**
 * warnarr clear
 * Remove every content-warning block from movie overviews.
 */

import { Command } from 'commander';

import { iterateLibraries, JellyfinWriter, resolveLibraries } from '../jellyfin/library.js';
import { clearAnnotations } from '../pipeline/process.js';
import {
  formatClearOutcome,
  formatClearSummary,
  printError,
  printHeader,
  printLines,
  printWarning,
} from '../report/console.js';
import { loadConfig } from '../shared/config.js';
import { errorMessage } from '../shared/types.js';
import { connectJellyfin, makeRunLogger } from './context.js';

export function clearCommand(baseDir: string): Command {
  return new Command('clear')
    .description('Remove all content warnings from Jellyfin movie overviews')
    .option('--dry-run', 'List affected movies without writing to Jellyfin')
    .option('-c, --config <path>', 'Config file path')
    .action(async (opts: { dryRun?: boolean; config?: string }) => {
      try {
        const config = loadConfig(baseDir, opts.config, { requireDtddKey: false });
        const dryRun = Boolean(opts.dryRun) || config.dryRun;

        const jellyfin = await connectJellyfin(config);
        const { libraries, warnings } = await resolveLibraries(jellyfin, config.jellyfin.libraries);
        for (const w of warnings) printWarning(w);

        const startedAt = new Date().toISOString();
        const items = iterateLibraries(jellyfin, libraries, {
          onLibrary: (lib) => printHeader(`Clearing warnings from: ${lib.Name}`),
          onLibraryError: (lib, err) =>
            printError(`Could not list library '${lib.Name}', skipping: ${errorMessage(err)}`),
        });
        const summary = await clearAnnotations(items, new JellyfinWriter(jellyfin), {
          separator: config.warnings.separator,
          dryRun,
          onOutcome: (outcome) => console.log(formatClearOutcome(outcome, dryRun)),
        });

        printLines(formatClearSummary(summary));
        makeRunLogger(config)?.writeStatus({
          mode: 'clear',
          startedAt,
          finishedAt: new Date().toISOString(),
          summary,
          logPath: null,
        });
      } catch (err) {
        printError(errorMessage(err));
        process.exit(1);
      }
    });
}
