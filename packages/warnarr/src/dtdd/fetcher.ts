/**
 * RateLimitedFetcher — cache-or-fetch-then-store, with a minimum spacing
 * between outbound calls. Cache hits never wait.
 *
 * The spacing is measured from the end of the previous outbound call and is
 * shared by every request kind that goes through this instance.
 */

import type { CacheStore } from '../cache/store.js';

export interface FetcherOptions {
  delayMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type PayloadCache = Pick<CacheStore, 'get' | 'set'>;

const realSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export class RateLimitedFetcher {
  private readonly delayMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastCallEndedAt: number | null = null;

  /** Outbound calls made by this instance (cache hits excluded) */
  remoteCalls = 0;

  constructor(private cache: PayloadCache, opts: FetcherOptions) {
    this.delayMs = opts.delayMs;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? realSleep;
  }

  async fetchOrCache(key: string, remoteCall: () => Promise<unknown>): Promise<unknown> {
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    await this.waitForSlot();

    let payload: unknown;
    try {
      this.remoteCalls++;
      payload = await remoteCall();
    } finally {
      this.lastCallEndedAt = this.now();
    }

    // Only successful payloads reach the cache
    this.cache.set(key, payload);
    return payload;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastCallEndedAt === null) return;
    const elapsed = this.now() - this.lastCallEndedAt;
    if (elapsed < this.delayMs) {
      await this.sleep(this.delayMs - elapsed);
    }
  }
}
