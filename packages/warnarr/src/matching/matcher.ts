/**
 * EntityMatcher — maps a local movie to one DTDD media record.
 *
 * IMDb id search first; when that is missing or finds nothing, title search
 * followed by TITLE_STRATEGIES in order. Lookup errors propagate; a failed
 * detail fetch after an IMDb hit does not fall back to title search.
 */

import type { TriggerLookup } from '../dtdd/client.js';
import { TITLE_STRATEGIES } from './strategies.js';
import type { MatchResult, MediaItem } from './types.js';

export class EntityMatcher {
  constructor(private lookup: TriggerLookup) {}

  async match(item: MediaItem): Promise<MatchResult | null> {
    if (item.imdbId) {
      const byId = await this.lookup.searchByImdb(item.imdbId);
      if (byId.length > 0) {
        const entity = byId[0];
        return { entity, record: await this.lookup.getMedia(entity.id), method: 'imdb' };
      }
    }

    const results = await this.lookup.search(item.title);
    if (results.length === 0) return null;

    for (const { method, pick } of TITLE_STRATEGIES) {
      const entity = pick(item, results);
      if (entity) {
        return { entity, record: await this.lookup.getMedia(entity.id), method };
      }
    }
    return null;
  }
}
