/**
 * Cache key derivation. Each request kind gets its own prefix so a title
 * that looks like an id can never collide with an id lookup.
 */

export const KEY_PREFIX = {
  search: 'search:',
  imdb: 'imdb:',
  media: 'media:',
} as const;

/** Lower-case, trim, and collapse whitespace runs to "_" */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, '_');
}

export function searchKey(query: string): string {
  return `${KEY_PREFIX.search}${normalizeQuery(query)}`;
}

export function imdbKey(imdbId: string): string {
  return `${KEY_PREFIX.imdb}${imdbId.trim().toLowerCase()}`;
}

export function mediaKey(id: number): string {
  return `${KEY_PREFIX.media}${id}`;
}
