/**
 * Warnarr cache schema
 * One row per logical DTDD request; payload is the raw JSON response body.
 */

import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

export function applySchema(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS cache_entries (
      key        TEXT PRIMARY KEY,     -- namespaced, e.g. "search:the_thing"
      cached_at  INTEGER NOT NULL,     -- epoch ms
      payload    TEXT NOT NULL         -- JSON
    );
  `);

  const row = db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get();
  if (!row) {
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  }
}
