/**
 * Wiring shared by the CLI commands: config → cache → DTDD client, Jellyfin.
 */

import { CacheStore } from '../cache/store.js';
import { DtddClient } from '../dtdd/client.js';
import { RateLimitedFetcher } from '../dtdd/fetcher.js';
import { JellyfinClient } from '../jellyfin/client.js';
import { EntityMatcher } from '../matching/matcher.js';
import { RunLogger } from '../report/runLog.js';
import { errorMessage, type WarnarrConfig } from '../shared/types.js';

export function openCache(config: WarnarrConfig): CacheStore {
  return new CacheStore(config.cache.dbPath, { ttlMs: config.cache.ttlSeconds * 1000 });
}

export function makeMatcher(config: WarnarrConfig, cache: CacheStore): EntityMatcher {
  const fetcher = new RateLimitedFetcher(cache, { delayMs: config.dtdd.delaySeconds * 1000 });
  const client = new DtddClient(
    {
      apiKey: config.dtdd.apiKey,
      baseUrl: config.dtdd.baseUrl,
      timeoutMs: config.dtdd.timeoutMs,
    },
    fetcher,
    cache
  );
  return new EntityMatcher(client);
}

/** Connect and verify; any failure here is fatal for the command */
export async function connectJellyfin(config: WarnarrConfig): Promise<JellyfinClient> {
  const client = new JellyfinClient({
    url: config.jellyfin.url,
    apiKey: config.jellyfin.apiKey,
    userId: config.jellyfin.userId,
  });
  console.log(`Connecting to Jellyfin at ${config.jellyfin.url}...`);
  try {
    const name = await client.ping();
    console.log(`Connected to: ${name}`);
  } catch (err) {
    throw new Error(`Could not connect to Jellyfin: ${errorMessage(err)}`);
  }
  return client;
}

export function makeRunLogger(config: WarnarrConfig): RunLogger | null {
  return config.runLog.enabled ? new RunLogger(config.runLog.dir) : null;
}
