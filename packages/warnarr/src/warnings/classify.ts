/**
 * Turn DTDD crowd votes into warning / safe labels and render them.
 */

import type { RemoteMediaRecord } from '../dtdd/types.js';
import type { WarningThresholds } from '../shared/types.js';

export const WARNING_GLYPH = '⚠️  ';
export const SAFE_GLYPH = '✅  ';
export const TOPIC_JOINER = ' · ';

export interface TopicClassification {
  warnings: string[];   // topic names, discovery order
  safe: string[];       // topic "not" names, discovery order
}

export function classifyTopics(
  record: RemoteMediaRecord,
  thresholds: WarningThresholds
): TopicClassification {
  const { minYesVotes, minYesRatio, includeSafeTopics } = thresholds;
  const out: TopicClassification = { warnings: [], safe: [] };

  for (const stat of record.topicStats) {
    const total = stat.yesCount + stat.noCount;
    if (total === 0 || !stat.topicName) continue;

    const ratio = stat.yesCount / total;
    if (ratio >= minYesRatio && stat.yesCount >= minYesVotes) {
      out.warnings.push(stat.topicName);
    } else if (
      includeSafeTopics &&
      stat.topicNotName &&
      1 - ratio >= minYesRatio &&
      stat.noCount >= minYesVotes
    ) {
      out.safe.push(stat.topicNotName);
    }
  }

  return out;
}

/** Render the warning block body, or null when there is nothing to say */
export function renderWarnings({ warnings, safe }: TopicClassification): string | null {
  if (warnings.length === 0 && safe.length === 0) return null;

  const lines: string[] = [];
  if (warnings.length > 0) lines.push(WARNING_GLYPH + warnings.join(TOPIC_JOINER));
  if (safe.length > 0) lines.push(SAFE_GLYPH + safe.join(TOPIC_JOINER));
  return lines.join('\n');
}

export function formatWarnings(
  record: RemoteMediaRecord,
  thresholds: WarningThresholds
): string | null {
  return renderWarnings(classifyTopics(record, thresholds));
}
