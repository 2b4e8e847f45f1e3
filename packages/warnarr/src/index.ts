#!/usr/bin/env node
/**
 * Warnarr - DoesTheDogDie.com content warnings in Jellyfin movie overviews
 */

import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { runCommand } from './cli/run.js';
import { clearCommand } from './cli/clear.js';
import { cacheCommand } from './cli/cache.js';

const baseDir = fileURLToPath(new URL('..', import.meta.url));

const program = new Command();

program
  .name('warnarr')
  .description('Content warnings from DoesTheDogDie.com in your Jellyfin movie library')
  .version('0.1.0');

program.addCommand(runCommand(baseDir));
program.addCommand(clearCommand(baseDir));
program.addCommand(cacheCommand(baseDir));

await program.parseAsync(process.argv);
