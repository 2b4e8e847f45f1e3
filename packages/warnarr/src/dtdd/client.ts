/**
 * DoesTheDogDie.com API client
 * Every call goes through the RateLimitedFetcher, so responses are cached in
 * SQLite and outbound requests are spaced by the configured delay.
 */

import { imdbKey, mediaKey, searchKey } from '../cache/keys.js';
import type { CacheStore } from '../cache/store.js';
import { decodeMediaRecord, decodeSearchItems, searchItemsOf } from './decode.js';
import { RateLimitedFetcher } from './fetcher.js';
import type { RemoteEntity, RemoteMediaRecord } from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export class DtddRequestError extends Error {
  constructor(readonly status: number, readonly url: string, statusText: string) {
    super(`HTTP ${status} ${statusText} — ${url}`);
    this.name = 'DtddRequestError';
  }
}

export interface DtddClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
}

/** The three lookups the matcher needs */
export interface TriggerLookup {
  search(query: string): Promise<RemoteEntity[]>;
  searchByImdb(imdbId: string): Promise<RemoteEntity[]>;
  getMedia(id: number): Promise<RemoteMediaRecord>;
}

export class DtddClient implements TriggerLookup {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(
    opts: DtddClientOptions,
    private fetcher: RateLimitedFetcher,
    private cache: Pick<CacheStore, 'clear'>
  ) {
    this.baseUrl = opts.baseUrl.replace(/\/$/, '');
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Search by title string */
  async search(query: string): Promise<RemoteEntity[]> {
    const qs = new URLSearchParams({ q: query });
    const payload = await this.fetcher.fetchOrCache(searchKey(query), async () =>
      searchItemsOf(await this.get(`/dddsearch?${qs}`))
    );
    return decodeSearchItems(payload);
  }

  /** Search by IMDb id (e.g. "tt0000001") */
  async searchByImdb(imdbId: string): Promise<RemoteEntity[]> {
    const qs = new URLSearchParams({ imdb: imdbId });
    const payload = await this.fetcher.fetchOrCache(imdbKey(imdbId), async () =>
      searchItemsOf(await this.get(`/dddsearch?${qs}`))
    );
    return decodeSearchItems(payload);
  }

  /** Full trigger statistics for one DTDD media id */
  async getMedia(id: number): Promise<RemoteMediaRecord> {
    const payload = await this.fetcher.fetchOrCache(mediaKey(id), () =>
      this.get(`/media/${id}`)
    );
    return decodeMediaRecord(payload);
  }

  clearCache(): number {
    return this.cache.clear();
  }

  // ──────────────────────────────────────────────────────────────────
  // HTTP transport
  // ──────────────────────────────────────────────────────────────────

  private async get(apiPath: string): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const url = `${this.baseUrl}${apiPath}`;
      const res = await fetch(url, {
        headers: {
          'Accept': 'application/json',
          'X-API-KEY': this.apiKey,
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        throw new DtddRequestError(res.status, url, res.statusText);
      }

      return await res.json();
    } finally {
      clearTimeout(timer);
    }
  }
}
