/**
 * Matching types — pure interfaces, no network imports.
 */

import type { RemoteEntity, RemoteMediaRecord } from '../dtdd/types.js';

/** A movie as read from the media server */
export interface MediaItem {
  id: string;               // media-server item id
  title: string;
  year: number | null;
  imdbId: string | null;
  description: string;
}

export type MatchMethod = 'imdb' | 'title_year' | 'movie_type' | 'first_result';

/** Picks one candidate out of title-search results, or passes */
export type MatchStrategy = (
  item: MediaItem,
  results: RemoteEntity[]
) => RemoteEntity | undefined;

export interface MatchResult {
  entity: RemoteEntity;
  record: RemoteMediaRecord;
  method: MatchMethod;
}
