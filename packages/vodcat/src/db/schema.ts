/**
 * vodcat SQLite schema
 * canonical_items is the source of truth; the match cache only points into it.
 */

import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 2;

export function applySchema(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL
    );

    -- One row per work, however many platforms list it
    CREATE TABLE IF NOT EXISTS canonical_items (
      id            INTEGER PRIMARY KEY AUTOINCREMENT,  -- ids never reused; cached ids of deleted rows stay dead
      title         TEXT NOT NULL,          -- native title as first scraped
      title_key     TEXT,                   -- normalised title, NULL when it normalises to ''
      title_en      TEXT,                   -- English/transliterated title, backfilled
      title_en_key  TEXT,
      year          INTEGER NOT NULL CHECK (year BETWEEN 1900 AND 2030),
      kind          TEXT NOT NULL DEFAULT 'movie' CHECK (kind IN ('movie', 'series')),
      created_at    TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at    TEXT NOT NULL DEFAULT (datetime('now')),
      UNIQUE (title, year),
      UNIQUE (title_key, year)
    );

    CREATE INDEX IF NOT EXISTS idx_items_year_kind    ON canonical_items(year, kind);
    CREATE INDEX IF NOT EXISTS idx_items_title_en_key ON canonical_items(title_en_key, year);

    -- One row per platform listing
    CREATE TABLE IF NOT EXISTS source_mappings (
      id            INTEGER PRIMARY KEY,
      item_id       INTEGER NOT NULL REFERENCES canonical_items(id) ON DELETE CASCADE,
      platform      TEXT NOT NULL,
      source_id     TEXT NOT NULL,
      url           TEXT,
      raw_payload   TEXT,                   -- crawler payload, JSON, kept verbatim
      created_at    TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at    TEXT NOT NULL DEFAULT (datetime('now')),
      UNIQUE (platform, source_id)
    );

    CREATE INDEX IF NOT EXISTS idx_sources_item_id ON source_mappings(item_id);

    CREATE TABLE IF NOT EXISTS genres (
      id         INTEGER PRIMARY KEY,
      name       TEXT UNIQUE NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS item_genres (
      item_id  INTEGER NOT NULL REFERENCES canonical_items(id) ON DELETE CASCADE,
      genre_id INTEGER NOT NULL REFERENCES genres(id) ON DELETE CASCADE,
      PRIMARY KEY (item_id, genre_id)
    );
  `);

  // v2: variation strategy ambiguity log, for curation follow-up
  db.exec(`
    CREATE TABLE IF NOT EXISTS ambiguous_matches (
      id            INTEGER PRIMARY KEY,
      title         TEXT NOT NULL,
      year          INTEGER NOT NULL,
      base_title    TEXT NOT NULL,
      candidate_ids TEXT NOT NULL,          -- JSON array of canonical_items ids
      reviewed      INTEGER NOT NULL DEFAULT 0,
      created_at    TEXT NOT NULL DEFAULT (datetime('now'))
    );
    CREATE INDEX IF NOT EXISTS idx_ambiguous_pending ON ambiguous_matches(reviewed) WHERE reviewed = 0;
  `);

  // Stamp version
  const row = db.prepare<[], { version: number }>('SELECT version FROM schema_version').get();
  if (!row) {
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  } else if (row.version < SCHEMA_VERSION) {
    db.prepare('UPDATE schema_version SET version = ?').run(SCHEMA_VERSION);
  }
}
