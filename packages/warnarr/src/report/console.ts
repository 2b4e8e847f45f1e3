import { cyan, dim, green, red, yellow } from 'colorette';

import type { BatchSummary, ClearOutcome, ClearSummary, ItemOutcome } from '../pipeline/types.js';

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return (str || '').replace(/\x1b\[[0-9;]*m/g, '');
}

/** Console lines for one pipeline outcome */
export function formatOutcome(outcome: ItemOutcome): string[] {
  const { label } = outcome;
  switch (outcome.status) {
    case 'updated': {
      const body = (outcome.warningText ?? '').split('\n').map(l => `      ${l}`);
      if (outcome.dryRun) return [green(`  ✓ ${label} — would add warnings:`), ...body];
      if (!outcome.changed) return [dim(`  = ${label} — warnings already up to date`)];
      return [green(`  ✓ ${label} — warnings added`)];
    }
    case 'skipped-no-match':
      return [dim(`  – ${label} — not found on DTDD`)];
    case 'skipped-no-warnings':
      return [dim(`  – ${label} — no significant warnings`)];
    case 'failed':
      return outcome.stage === 'write'
        ? [red(`  ✗ ${label} — failed to update: ${outcome.error ?? 'unknown error'}`)]
        : [red(`  ✗ ${label} — API error: ${outcome.error ?? 'unknown error'}`)];
  }
}

export function formatClearOutcome(outcome: ClearOutcome, dryRun: boolean): string {
  if (outcome.status === 'failed') {
    return red(`  ✗ ${outcome.label} — failed to update: ${outcome.error ?? 'unknown error'}`);
  }
  return green(`  ✓ ${outcome.label} — ${dryRun ? 'would remove warnings' : 'warnings removed'}`);
}

export function formatSummary(summary: BatchSummary): string[] {
  const lines = [
    '',
    cyan('═'.repeat(50)),
    `Done in ${(summary.elapsedMs / 1000).toFixed(1)}s`,
    `Processed: ${summary.processed} movies`,
    `Updated:   ${summary.updated} movies`,
    `No match:  ${summary.noMatch}`,
    `No warnings: ${summary.noWarnings}`,
  ];
  if (summary.failed > 0) lines.push(red(`Failed:    ${summary.failed}`));
  if (summary.dryRun) lines.push(yellow('(DRY RUN — no actual changes made)'));
  return lines;
}

export function formatClearSummary(summary: ClearSummary): string[] {
  const lines = [
    '',
    `Done. Cleared warnings from ${summary.cleared} movie(s) of ${summary.scanned} scanned.`,
  ];
  if (summary.failed > 0) lines.push(red(`Failed: ${summary.failed}`));
  if (summary.dryRun) lines.push(yellow('(DRY RUN — no actual changes made)'));
  return lines;
}

export function printLines(lines: string[]): void {
  for (const line of lines) console.log(line);
}

export function printError(message: string): void {
  console.error(red(`ERROR: ${message}`));
}

export function printWarning(message: string): void {
  console.warn(yellow(`Warning: ${message}`));
}

export function printHeader(title: string): void {
  console.log(`\n${cyan(title)}`);
  console.log('-'.repeat(50));
}
