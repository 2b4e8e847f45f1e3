/**
 * CacheStore — key → JSON payload with a uniform TTL, backed by better-sqlite3.
 * Stale or unparsable rows read as a miss; they are only removed by clear().
 */

import path from 'node:path';
import fs from 'node:fs';
import BetterSqlite3 from 'better-sqlite3';
import type Database from 'better-sqlite3';
import { applySchema } from './schema.js';

export interface CacheStoreOptions {
  ttlMs: number;
  /** Wall clock in epoch ms (injectable for tests) */
  now?: () => number;
}

export interface CacheStats {
  entries: number;
  fresh: number;
  stale: number;
  oldestCachedAt: number | null;
  newestCachedAt: number | null;
}

interface CacheRow {
  cached_at: number;
  payload: string;
}

export class CacheStore {
  private db: Database.Database;
  private readonly ttlMs: number;
  private readonly now: () => number;

  /** `dbPath` may be ":memory:" */
  constructor(dbPath: string, opts: CacheStoreOptions) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new BetterSqlite3(dbPath);
    applySchema(this.db);
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? Date.now;
  }

  get(key: string): unknown {
    const row = this.db.prepare<[string], CacheRow>(
      'SELECT cached_at, payload FROM cache_entries WHERE key = ?'
    ).get(key);
    if (!row) return undefined;
    if (this.now() - row.cached_at >= this.ttlMs) return undefined;

    try {
      return JSON.parse(row.payload);
    } catch {
      // Corrupt row: behave as a miss so the caller refetches and overwrites it
      return undefined;
    }
  }

  set(key: string, payload: unknown): void {
    this.db.prepare(`
      INSERT INTO cache_entries (key, cached_at, payload)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        cached_at = excluded.cached_at,
        payload   = excluded.payload
    `).run(key, this.now(), JSON.stringify(payload) ?? 'null');
  }

  /** Remove every entry; returns how many were removed */
  clear(): number {
    return this.db.prepare('DELETE FROM cache_entries').run().changes;
  }

  stats(): CacheStats {
    const cutoff = this.now() - this.ttlMs;
    const row = this.db.prepare<[number], {
      entries: number;
      fresh: number | null;
      oldest: number | null;
      newest: number | null;
    }>(`
      SELECT
        COUNT(*)                                  AS entries,
        SUM(CASE WHEN cached_at > ? THEN 1 ELSE 0 END) AS fresh,
        MIN(cached_at)                            AS oldest,
        MAX(cached_at)                            AS newest
      FROM cache_entries
    `).get(cutoff);

    const entries = row?.entries ?? 0;
    const fresh = row?.fresh ?? 0;
    return {
      entries,
      fresh,
      stale: entries - fresh,
      oldestCachedAt: row?.oldest ?? null,
      newestCachedAt: row?.newest ?? null,
    };
  }

  close(): void {
    this.db.close();
  }
}
