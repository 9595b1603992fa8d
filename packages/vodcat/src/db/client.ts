/**
 * vodcat DB client
 * Typed wrappers around better-sqlite3 implementing CatalogRepository.
 */

import path from 'node:path';
import fs from 'node:fs';
import BetterSqlite3 from 'better-sqlite3';
import type Database from 'better-sqlite3';

import { applySchema } from './schema.js';
import type {
  AmbiguousMatchInput,
  CandidateQuery,
  CatalogRepository,
  ItemBackfill,
  NewItem,
  SourceUpsert,
} from './types.js';
import { normalize } from '../matching/normalize.js';
import { TransientStoreError, UniquenessConflictError } from '../shared/errors.js';
import {
  isContentKind,
  isPlatform,
  type CanonicalItem,
  type ContentKind,
  type Genre,
  type Platform,
  type SourceMapping,
} from '../shared/types.js';

interface ItemRow {
  id: number;
  title: string;
  title_key: string | null;
  title_en: string | null;
  title_en_key: string | null;
  year: number;
  kind: string;
  genres_json: string;         // JSON array of genre names
  created_at: string;
  updated_at: string;
}

interface SourceRow {
  id: number;
  item_id: number;
  platform: string;
  source_id: string;
  url: string | null;
  raw_payload: string | null;  // JSON
  created_at: string;
  updated_at: string;
}

export interface AmbiguousMatchRow {
  id: number;
  title: string;
  year: number;
  base_title: string;
  candidate_ids: string;       // JSON array
  reviewed: number;
  created_at: string;
}

export interface CatalogStats {
  items: Record<ContentKind, number>;
  sources: Record<Platform, number>;
  genres: number;
}

export interface CatalogDbOptions {
  /** How long a writer waits on a locked database before SQLITE_BUSY. Default: 5000ms. */
  busyTimeoutMs?: number;
}

const ITEM_SELECT = `
  SELECT i.*,
    (SELECT json_group_array(name) FROM (
       SELECT g.name FROM item_genres ig JOIN genres g ON g.id = ig.genre_id
       WHERE ig.item_id = i.id ORDER BY g.name
     )) AS genres_json
  FROM canonical_items i
`;

// ──────────────────────────────────────────────────────────────────
// SQLite error mapping
// ──────────────────────────────────────────────────────────────────

// SqliteError may come from another module registry (Jest workers), so match by shape
function sqliteCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function errorText(err: unknown, fallback: string): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return fallback;
}

/** Translate SQLite failures into the resolver's error taxonomy; anything else passes through */
export function toStoreError(err: unknown): unknown {
  if (err instanceof UniquenessConflictError || err instanceof TransientStoreError) return err;
  const code = sqliteCode(err);
  if (!code) return err;
  const message = errorText(err, code);

  if (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    const table = /failed: (\w+)\./.exec(message)?.[1] ?? 'unknown';
    return new UniquenessConflictError(message, table, err);
  }
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) {
    return new TransientStoreError(message, code, err);
  }
  return err;
}

function parseJson(text: string | null): unknown {
  if (text === null) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function toStringArray(text: string): string[] {
  const parsed = parseJson(text);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

function rowToItem(row: ItemRow): CanonicalItem {
  return {
    id: row.id,
    title: row.title,
    titleEn: row.title_en,
    year: row.year,
    kind: isContentKind(row.kind) ? row.kind : 'movie',
    genres: toStringArray(row.genres_json),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToSource(row: SourceRow): SourceMapping {
  if (!isPlatform(row.platform)) {
    throw new Error(`source_mappings.${row.id}: unknown platform "${row.platform}"`);
  }
  return {
    id: row.id,
    itemId: row.item_id,
    platform: row.platform,
    sourceId: row.source_id,
    url: row.url,
    rawPayload: parseJson(row.raw_payload),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function keyOrNull(title: string | null | undefined): string | null {
  const key = normalize(title);
  return key.length > 0 ? key : null;
}

export class CatalogDb implements CatalogRepository {
  private db: Database.Database;

  constructor(dbPath: string, opts: CatalogDbOptions = {}) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new BetterSqlite3(dbPath, { timeout: opts.busyTimeoutMs ?? 5000 });
    applySchema(this.db);
  }

  /** BEGIN IMMEDIATE: take the write lock up front so find-or-create never races a reader upgrade */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn).immediate();
    } catch (err) {
      throw toStoreError(err);
    }
  }

  // ──────────────────────────────────────────────────────────────────
  // Items
  // ──────────────────────────────────────────────────────────────────

  getItem(id: number): CanonicalItem | undefined {
    const row = this.db.prepare<[number], ItemRow>(`${ITEM_SELECT} WHERE i.id = ?`).get(id);
    return row ? rowToItem(row) : undefined;
  }

  findItemsByKey(key: string, year: number): CanonicalItem[] {
    if (!key) return [];
    return this.db.prepare<[number, string, string], ItemRow>(
      `${ITEM_SELECT} WHERE i.year = ? AND (i.title_key = ? OR i.title_en_key = ?) ORDER BY i.id`
    ).all(year, key, key).map(rowToItem);
  }

  findItemsByKeyFragment(fragment: string, year: number): CanonicalItem[] {
    if (!fragment) return [];
    return this.db.prepare<[number, string, string], ItemRow>(
      `${ITEM_SELECT}
       WHERE i.year = ? AND (instr(i.title_key, ?) > 0 OR instr(i.title_en_key, ?) > 0)
       ORDER BY i.id`
    ).all(year, fragment, fragment).map(rowToItem);
  }

  findCandidates(query: CandidateQuery): CanonicalItem[] {
    return this.db.prepare<[number, number, string, number], ItemRow>(
      `${ITEM_SELECT} WHERE i.year BETWEEN ? AND ? AND i.kind = ? ORDER BY i.id LIMIT ?`
    ).all(query.minYear, query.maxYear, query.kind, query.limit).map(rowToItem);
  }

  findConflicting(title: string, year: number): CanonicalItem | undefined {
    const row = this.db.prepare<[number, string, string | null], ItemRow>(
      `${ITEM_SELECT} WHERE i.year = ? AND (i.title = ? OR i.title_key = ?) ORDER BY i.id LIMIT 1`
    ).get(year, title, keyOrNull(title));
    return row ? rowToItem(row) : undefined;
  }

  createItem(input: NewItem): CanonicalItem {
    try {
      const result = this.db.prepare(`
        INSERT INTO canonical_items (title, title_key, title_en, title_en_key, year, kind)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(
        input.title,
        keyOrNull(input.title),
        input.titleEn,
        keyOrNull(input.titleEn),
        input.year,
        input.kind
      );
      const id = Number(result.lastInsertRowid);
      this.attachGenres(id, input.genreIds);
      return this.requireItem(id);
    } catch (err) {
      throw toStoreError(err);
    }
  }

  backfillItem(id: number, patch: ItemBackfill): { item: CanonicalItem; changed: boolean } {
    let changed = false;

    if (patch.titleEn) {
      const r = this.db.prepare(`
        UPDATE canonical_items SET title_en = ?, title_en_key = ?, updated_at = datetime('now')
        WHERE id = ? AND title_en IS NULL
      `).run(patch.titleEn, keyOrNull(patch.titleEn), id);
      changed = r.changes > 0;
    }

    if (patch.genreIds && this.attachGenres(id, patch.genreIds) > 0) {
      this.db.prepare(`UPDATE canonical_items SET updated_at = datetime('now') WHERE id = ?`).run(id);
      changed = true;
    }

    return { item: this.requireItem(id), changed };
  }

  deleteItem(id: number): boolean {
    const r = this.db.prepare('DELETE FROM canonical_items WHERE id = ?').run(id);
    return r.changes > 0;
  }

  private requireItem(id: number): CanonicalItem {
    const item = this.getItem(id);
    if (!item) throw new Error(`canonical_items.${id} vanished inside its own transaction`);
    return item;
  }

  private attachGenres(itemId: number, genreIds: number[]): number {
    const stmt = this.db.prepare('INSERT OR IGNORE INTO item_genres (item_id, genre_id) VALUES (?, ?)');
    let added = 0;
    for (const genreId of genreIds) {
      added += stmt.run(itemId, genreId).changes;
    }
    return added;
  }

  // ──────────────────────────────────────────────────────────────────
  // Source mappings
  // ──────────────────────────────────────────────────────────────────

  upsertSource(input: SourceUpsert): { mapping: SourceMapping; created: boolean } {
    const payload = input.rawPayload === undefined ? null : JSON.stringify(input.rawPayload);
    try {
      const existing = this.getSource(input.platform, input.sourceId);
      if (existing) {
        // Ownership stays put; only the listing's own fields are refreshed
        this.db.prepare(`
          UPDATE source_mappings SET url = ?, raw_payload = COALESCE(?, raw_payload), updated_at = datetime('now')
          WHERE id = ?
        `).run(input.url ?? existing.url, payload, existing.id);
        return { mapping: this.requireSource(input.platform, input.sourceId), created: false };
      }

      this.db.prepare(`
        INSERT INTO source_mappings (item_id, platform, source_id, url, raw_payload)
        VALUES (?, ?, ?, ?, ?)
      `).run(input.itemId, input.platform, input.sourceId, input.url, payload);
      return { mapping: this.requireSource(input.platform, input.sourceId), created: true };
    } catch (err) {
      throw toStoreError(err);
    }
  }

  getSource(platform: Platform, sourceId: string): SourceMapping | undefined {
    const row = this.db.prepare<[string, string], SourceRow>(
      'SELECT * FROM source_mappings WHERE platform = ? AND source_id = ?'
    ).get(platform, sourceId);
    return row ? rowToSource(row) : undefined;
  }

  getSourcesForItem(itemId: number): SourceMapping[] {
    return this.db.prepare<[number], SourceRow>(
      'SELECT * FROM source_mappings WHERE item_id = ? ORDER BY platform, source_id'
    ).all(itemId).map(rowToSource);
  }

  private requireSource(platform: Platform, sourceId: string): SourceMapping {
    const mapping = this.getSource(platform, sourceId);
    if (!mapping) throw new Error(`source_mappings ${platform}/${sourceId} vanished inside its own transaction`);
    return mapping;
  }

  // ──────────────────────────────────────────────────────────────────
  // Genres
  // ──────────────────────────────────────────────────────────────────

  getOrCreateGenre(name: string): Genre {
    try {
      this.db.prepare('INSERT INTO genres (name) VALUES (?) ON CONFLICT(name) DO NOTHING').run(name);
      const row = this.db.prepare<[string], Genre>('SELECT id, name FROM genres WHERE name = ?').get(name);
      if (!row) throw new Error(`genre "${name}" missing after insert`);
      return row;
    } catch (err) {
      throw toStoreError(err);
    }
  }

  listGenres(): Genre[] {
    return this.db.prepare<[], Genre>('SELECT id, name FROM genres ORDER BY name').all();
  }

  // ──────────────────────────────────────────────────────────────────
  // Ambiguity log
  // ──────────────────────────────────────────────────────────────────

  /** Skipped when the same listing already waits for review under this base title */
  recordAmbiguousMatch(input: AmbiguousMatchInput): void {
    this.db.prepare(`
      INSERT INTO ambiguous_matches (title, year, base_title, candidate_ids)
      SELECT ?, ?, ?, ?
      WHERE NOT EXISTS (
        SELECT 1 FROM ambiguous_matches
        WHERE title = ? AND year = ? AND base_title = ? AND reviewed = 0
      )
    `).run(
      input.title, input.year, input.baseTitle, JSON.stringify(input.candidateIds),
      input.title, input.year, input.baseTitle
    );
  }

  getPendingAmbiguousMatches(limit = 50): AmbiguousMatchRow[] {
    return this.db.prepare<[number], AmbiguousMatchRow>(
      'SELECT * FROM ambiguous_matches WHERE reviewed = 0 ORDER BY id DESC LIMIT ?'
    ).all(limit);
  }

  // ──────────────────────────────────────────────────────────────────
  // Stats
  // ──────────────────────────────────────────────────────────────────

  getStats(): CatalogStats {
    const items: Record<ContentKind, number> = { movie: 0, series: 0 };
    for (const r of this.db.prepare<[], { kind: string; n: number }>(
      'SELECT kind, COUNT(*) AS n FROM canonical_items GROUP BY kind'
    ).all()) {
      if (isContentKind(r.kind)) items[r.kind] = r.n;
    }

    const sources: Record<Platform, number> = { filimo: 0, namava: 0 };
    for (const r of this.db.prepare<[], { platform: string; n: number }>(
      'SELECT platform, COUNT(*) AS n FROM source_mappings GROUP BY platform'
    ).all()) {
      if (isPlatform(r.platform)) sources[r.platform] = r.n;
    }

    const genres = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM genres').get()?.n ?? 0;
    return { items, sources, genres };
  }

  close(): void {
    this.db.close();
  }
}
