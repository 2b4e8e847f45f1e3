/**
 * Jellyfin API client
 * Reads movie libraries and writes back item overviews.
 */

import { isRecord } from '../shared/types.js';

const DEFAULT_BATCH_SIZE = 250;
const DEFAULT_TIMEOUT_MS = 30_000;
const CACHE_TTL_MS = 30_000; // 30-second cache for library listings

interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

export interface JfMovie {
  Id: string;
  Name: string;
  ProductionYear?: number;
  Overview?: string;
  ProviderIds?: {
    Imdb?: string;
    Tmdb?: string;
  };
}

export interface JfLibrary {
  ItemId: string;
  Name: string;
  CollectionType?: string;
  Locations: string[];
}

export interface JellyfinClientOptions {
  url: string;
  apiKey: string;
  userId?: string;
  timeoutMs?: number;
}

export class JellyfinClient {
  private baseUrl: string;
  private apiKey: string;
  private userId: string;
  private timeoutMs: number;
  private libraryCache: CacheEntry<JfLibrary[]> | null = null;

  constructor(opts: JellyfinClientOptions) {
    this.baseUrl = opts.url.replace(/\/$/, '');
    this.apiKey = opts.apiKey;
    this.userId = opts.userId ?? '';
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    if (!this.baseUrl) throw new Error('Jellyfin URL not set. Set jellyfin.url or JELLYFIN_URL.');
    if (!this.apiKey) throw new Error('Jellyfin API key not set. Set jellyfin.apiKey or JELLYFIN_API_KEY.');
  }

  /** Server name; throws when Jellyfin is unreachable or the key is rejected */
  async ping(): Promise<string> {
    const info = await this.get<{ ServerName?: string }>('/System/Info');
    return info.ServerName ?? 'Jellyfin';
  }

  // ──────────────────────────────────────────────────────────────────
  // Libraries
  // ──────────────────────────────────────────────────────────────────

  async getLibraries(): Promise<JfLibrary[]> {
    if (this.libraryCache && this.libraryCache.expiresAt > Date.now()) {
      return this.libraryCache.data;
    }
    const data = await this.get<JfLibrary[]>('/Library/VirtualFolders');
    this.libraryCache = { data, expiresAt: Date.now() + CACHE_TTL_MS };
    return data;
  }

  async getMovieLibraries(): Promise<JfLibrary[]> {
    const libs = await this.getLibraries();
    return libs.filter(l => l.CollectionType === 'movies');
  }

  // ──────────────────────────────────────────────────────────────────
  // Movies
  // ──────────────────────────────────────────────────────────────────

  /** Every movie in one library, fetched in batches */
  async getLibraryMovies(libraryId: string, batchSize = DEFAULT_BATCH_SIZE): Promise<JfMovie[]> {
    const movies: JfMovie[] = [];
    let startIndex = 0;

    while (true) {
      const qs = new URLSearchParams({
        ParentId: libraryId,
        IncludeItemTypes: 'Movie',
        Recursive: 'true',
        SortBy: 'SortName',
        StartIndex: String(startIndex),
        Limit: String(batchSize),
        Fields: 'ProviderIds,Overview',
      });

      const data = await this.get<{ Items: JfMovie[]; TotalRecordCount: number }>(
        `/Items?${qs}`
      );
      movies.push(...data.Items);
      startIndex += batchSize;

      if (startIndex >= data.TotalRecordCount || data.Items.length === 0) break;
    }

    return movies;
  }

  /** Search one library by title — returns candidates (not always exact) */
  async searchLibraryMovies(libraryId: string, title: string): Promise<JfMovie[]> {
    const qs = new URLSearchParams({
      ParentId: libraryId,
      SearchTerm: title,
      IncludeItemTypes: 'Movie',
      Recursive: 'true',
      Limit: '50',
      Fields: 'ProviderIds,Overview',
    });
    const data = await this.get<{ Items: JfMovie[] }>(`/Items?${qs}`);
    return data.Items;
  }

  /**
   * Replace an item's overview and lock the field, so a metadata refresh
   * does not overwrite it.
   * Jellyfin's update endpoint takes the whole item DTO, so it is read first.
   */
  async updateOverview(itemId: string, overview: string): Promise<void> {
    const readPath = this.userId
      ? `/Users/${encodeURIComponent(this.userId)}/Items/${encodeURIComponent(itemId)}`
      : `/Items/${encodeURIComponent(itemId)}`;
    const dto = await this.get<unknown>(readPath);
    if (!isRecord(dto)) {
      throw new Error(`Unexpected item payload for ${itemId}`);
    }
    const locked = Array.isArray(dto.LockedFields)
      ? dto.LockedFields.filter((f): f is string => typeof f === 'string')
      : [];
    await this.post(`/Items/${encodeURIComponent(itemId)}`, {
      ...dto,
      Overview: overview,
      LockedFields: locked.includes('Overview') ? locked : [...locked, 'Overview'],
    });
  }

  // ──────────────────────────────────────────────────────────────────
  // HTTP transport
  // ──────────────────────────────────────────────────────────────────

  private async get<T>(apiPath: string): Promise<T> {
    return this.send('GET', apiPath, undefined, async res => await res.json() as T);
  }

  // POST /Items/{id} answers 204 No Content
  private async post(apiPath: string, body: unknown): Promise<void> {
    await this.send('POST', apiPath, body, async () => undefined);
  }

  private async send<R>(
    method: 'GET' | 'POST',
    apiPath: string,
    body: unknown,
    read: (res: Response) => Promise<R>
  ): Promise<R> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const url = `${this.baseUrl}${apiPath.startsWith('/') ? '' : '/'}${apiPath}`;
      const res = await fetch(url, {
        method,
        headers: {
          'X-Emby-Token': this.apiKey,
          'Accept': 'application/json',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      if (!res.ok) {
        throw new Error(`HTTP ${res.status} ${res.statusText} — ${method} ${url}`);
      }

      return await read(res);
    } finally {
      clearTimeout(timer);
    }
  }
}
