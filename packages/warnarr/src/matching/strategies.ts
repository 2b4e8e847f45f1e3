/**
 * Title-search strategies — pure functions, no side effects.
 * Each takes the local item + DTDD search results in service ranking order
 * and returns the first acceptable hit, or undefined.
 */

import type { RemoteEntity } from '../dtdd/types.js';
import type { MatchMethod, MatchStrategy, MediaItem } from './types.js';

export const MOVIE_ITEM_TYPE = 'Movie';

export function strategyTitleYear(item: MediaItem, results: RemoteEntity[]): RemoteEntity | undefined {
  if (item.year === null) return undefined;
  const year = String(item.year);
  return results.find(r => r.releaseYear === year);
}

export function strategyMovieType(_item: MediaItem, results: RemoteEntity[]): RemoteEntity | undefined {
  return results.find(r => r.itemType === MOVIE_ITEM_TYPE);
}

export function strategyFirstResult(_item: MediaItem, results: RemoteEntity[]): RemoteEntity | undefined {
  return results[0];
}

export const TITLE_STRATEGIES: ReadonlyArray<{ method: MatchMethod; pick: MatchStrategy }> = [
  { method: 'title_year', pick: strategyTitleYear },
  { method: 'movie_type', pick: strategyMovieType },
  { method: 'first_result', pick: strategyFirstResult },
];
