import { describe, expect, it } from 'vitest';

import type { RemoteMediaRecord, TopicStat } from '../src/dtdd/types.js';
import {
  classifyTopics,
  formatWarnings,
  SAFE_GLYPH,
  TOPIC_JOINER,
  WARNING_GLYPH,
} from '../src/warnings/classify.js';

const DEFAULTS = { minYesVotes: 3, minYesRatio: 0.6, includeSafeTopics: false };

function stat(topicName: string, yesCount: number, noCount: number, topicNotName = `not ${topicName}`): TopicStat {
  return { topicName, topicNotName, yesCount, noCount };
}

function record(...topicStats: TopicStat[]): RemoteMediaRecord {
  return { topicStats };
}

describe('classifyTopics', () => {
  it('flags a topic with enough yes votes and a high ratio', () => {
    const out = classifyTopics(record(stat('a dog dies', 10, 2)), DEFAULTS);
    expect(out).toEqual({ warnings: ['a dog dies'], safe: [] });
  });

  it('excludes a unanimous topic below the vote floor', () => {
    expect(formatWarnings(record(stat('a dog dies', 2, 0)), DEFAULTS)).toBeNull();
  });

  it('accepts a ratio exactly at the threshold', () => {
    const out = classifyTopics(record(stat('jump scares', 3, 2)), DEFAULTS);
    expect(out.warnings).toEqual(['jump scares']);
  });

  it('skips topics without votes or without a name', () => {
    const out = classifyTopics(record(stat('spiders', 0, 0), stat('', 9, 0)), DEFAULTS);
    expect(out).toEqual({ warnings: [], safe: [] });
  });

  it('reports safe topics by their not-name only when enabled', () => {
    const data = record(stat('a cat dies', 1, 9, 'no cats die'), stat('vomit', 2, 2));
    expect(classifyTopics(data, DEFAULTS).safe).toEqual([]);
    expect(classifyTopics(data, { ...DEFAULTS, includeSafeTopics: true })).toEqual({
      warnings: [],
      safe: ['no cats die'],
    });
  });

  it('needs enough no votes for a safe label', () => {
    const data = record(stat('a cat dies', 0, 2));
    expect(classifyTopics(data, { ...DEFAULTS, includeSafeTopics: true }).safe).toEqual([]);
  });

  it('keeps discovery order', () => {
    const data = record(stat('b', 5, 0), stat('a', 6, 1), stat('c', 4, 0));
    expect(classifyTopics(data, DEFAULTS).warnings).toEqual(['b', 'a', 'c']);
  });

  it('never grows the warning set when thresholds rise', () => {
    const data = record(
      stat('t1', 1, 0), stat('t2', 3, 2), stat('t3', 10, 2), stat('t4', 4, 4),
      stat('t5', 20, 1), stat('t6', 6, 3), stat('t7', 2, 8)
    );
    const votes = [0, 1, 3, 5, 10, 25];
    const ratios = [0, 0.3, 0.5, 0.6, 0.8, 0.95, 1];

    for (const v of votes) {
      for (const r of ratios) {
        const base = classifyTopics(data, { ...DEFAULTS, minYesVotes: v, minYesRatio: r }).warnings;
        for (const v2 of votes.filter(x => x >= v)) {
          for (const r2 of ratios.filter(x => x >= r)) {
            const stricter = classifyTopics(data, { ...DEFAULTS, minYesVotes: v2, minYesRatio: r2 }).warnings;
            for (const name of stricter) expect(base).toContain(name);
          }
        }
      }
    }
  });
});

describe('formatWarnings', () => {
  it('uses the caution and check glyphs with a middle-dot joiner', () => {
    expect(WARNING_GLYPH).toBe('⚠️  ');
    expect(SAFE_GLYPH).toBe('✅  ');
    expect(TOPIC_JOINER).toBe(' · ');
  });

  it('renders one warning line', () => {
    const text = formatWarnings(record(stat('a dog dies', 10, 2), stat('jump scares', 8, 1)), DEFAULTS);
    expect(text).toBe('⚠️  a dog dies · jump scares');
  });

  it('renders warning and safe lines separated by one line break', () => {
    const data = record(stat('a dog dies', 10, 2), stat('a cat dies', 0, 7, 'no cats die'), stat('spiders', 1, 12, 'no spiders'));
    const text = formatWarnings(data, { ...DEFAULTS, includeSafeTopics: true });
    expect(text).toBe('⚠️  a dog dies\n✅  no cats die · no spiders');
  });

  it('renders only the safe line when nothing warns', () => {
    const text = formatWarnings(record(stat('a cat dies', 0, 7, 'no cats die')), { ...DEFAULTS, includeSafeTopics: true });
    expect(text).toBe('✅  no cats die');
  });
});
