/**
 * Decoders for raw DTDD JSON. Shapes are loose upstream, so every field is
 * read through a narrow helper and missing values fall back to defaults.
 */

import { isRecord } from '../shared/types.js';
import type { RemoteEntity, RemoteMediaRecord, TopicStat } from './types.js';

function text(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function count(value: unknown): number {
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

function toId(value: unknown): number | undefined {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isInteger(n) ? n : undefined;
}

/** `items` array out of a /dddsearch response body */
export function searchItemsOf(body: unknown): unknown[] {
  if (!isRecord(body)) return [];
  return Array.isArray(body.items) ? body.items : [];
}

/** Decode a cached `items` array; entries without an integer id are dropped */
export function decodeSearchItems(payload: unknown): RemoteEntity[] {
  if (!Array.isArray(payload)) return [];
  const out: RemoteEntity[] = [];
  for (const raw of payload) {
    if (!isRecord(raw)) continue;
    const id = toId(raw.id);
    if (id === undefined) continue;
    out.push({
      id,
      title: text(raw.name),
      releaseYear: text(raw.releaseYear),
      itemType: isRecord(raw.itemType) ? text(raw.itemType.name) : '',
    });
  }
  return out;
}

export function decodeMediaRecord(payload: unknown): RemoteMediaRecord {
  if (!isRecord(payload) || !Array.isArray(payload.topicItemStats)) {
    return { topicStats: [] };
  }
  const topicStats: TopicStat[] = [];
  for (const raw of payload.topicItemStats) {
    if (!isRecord(raw)) continue;
    const topic = isRecord(raw.topic) ? raw.topic : {};
    topicStats.push({
      topicName: text(topic.name),
      topicNotName: text(topic.notName),
      yesCount: count(raw.yesSum),
      noCount: count(raw.noSum),
    });
  }
  return { topicStats };
}
