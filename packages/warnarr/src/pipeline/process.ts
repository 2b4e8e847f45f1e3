/**
 * Warning pipeline — match, classify, annotate, write back.
 * Strictly sequential; no per-item failure stops the batch.
 */

import type { MatchResult, MediaItem } from '../matching/types.js';
import { errorMessage } from '../shared/types.js';
import { applyWarnings, stripWarnings } from '../warnings/annotate.js';
import { formatWarnings } from '../warnings/classify.js';
import type {
  BatchSummary,
  ClearOutcome,
  ClearSummary,
  DescriptionWriter,
  ItemOutcome,
  PipelineDeps,
  PipelineOptions,
} from './types.js';

export function itemLabel(item: Pick<MediaItem, 'title' | 'year'>): string {
  return item.year !== null ? `${item.title} (${item.year})` : item.title;
}

export async function processItem(
  item: MediaItem,
  deps: PipelineDeps,
  opts: PipelineOptions
): Promise<ItemOutcome> {
  const dryRun = Boolean(opts.dryRun);
  const base = { itemId: item.id, label: itemLabel(item), dryRun };

  let match: MatchResult | null;
  try {
    match = await deps.matcher.match(item);
  } catch (err) {
    return { ...base, status: 'failed', stage: 'match', error: errorMessage(err) };
  }

  if (!match) return { ...base, status: 'skipped-no-match' };

  const found = { ...base, method: match.method, dtddId: match.entity.id };
  const warningText = formatWarnings(match.record, opts.thresholds);
  if (warningText === null) return { ...found, status: 'skipped-no-warnings' };

  const next = applyWarnings(item.description, warningText, opts.separator);
  const changed = next !== item.description;
  const updated: ItemOutcome = { ...found, status: 'updated', warningText, changed };

  if (dryRun || !changed) return updated;

  try {
    await deps.writer.updateDescription(item, next);
  } catch (err) {
    return { ...found, warningText, status: 'failed', stage: 'write', error: errorMessage(err) };
  }
  item.description = next;
  return updated;
}

export async function runBatch(
  items: Iterable<MediaItem> | AsyncIterable<MediaItem>,
  deps: PipelineDeps,
  opts: PipelineOptions
): Promise<BatchSummary> {
  const start = Date.now();
  const summary: BatchSummary = {
    processed: 0,
    updated: 0,
    noMatch: 0,
    noWarnings: 0,
    failed: 0,
    elapsedMs: 0,
    dryRun: Boolean(opts.dryRun),
  };

  for await (const item of items) {
    const outcome = await processItem(item, deps, opts);
    summary.processed++;
    switch (outcome.status) {
      case 'updated': summary.updated++; break;
      case 'skipped-no-match': summary.noMatch++; break;
      case 'skipped-no-warnings': summary.noWarnings++; break;
      case 'failed': summary.failed++; break;
    }
    opts.onOutcome?.(outcome);
  }

  summary.elapsedMs = Date.now() - start;
  return summary;
}

export interface ClearOptions {
  separator: string;
  dryRun?: boolean;
  onOutcome?: (outcome: ClearOutcome) => void;
}

/** Strip the warning block from every item that has one */
export async function clearAnnotations(
  items: Iterable<MediaItem> | AsyncIterable<MediaItem>,
  writer: DescriptionWriter,
  opts: ClearOptions
): Promise<ClearSummary> {
  const dryRun = Boolean(opts.dryRun);
  const summary: ClearSummary = { scanned: 0, cleared: 0, failed: 0, dryRun };

  for await (const item of items) {
    summary.scanned++;
    const cleaned = stripWarnings(item.description, opts.separator);
    if (cleaned === item.description) continue;

    const base = { itemId: item.id, label: itemLabel(item) };
    if (!dryRun) {
      try {
        await writer.updateDescription(item, cleaned);
      } catch (err) {
        summary.failed++;
        opts.onOutcome?.({ ...base, status: 'failed', error: errorMessage(err) });
        continue;
      }
      item.description = cleaned;
    }
    summary.cleared++;
    opts.onOutcome?.({ ...base, status: 'cleared' });
  }

  return summary;
}
