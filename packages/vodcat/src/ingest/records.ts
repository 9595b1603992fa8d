/**
 * Crawler output → ScrapedRecord.
 * Crawlers emit snake_case JSON with loosely typed fields (numeric ids, years as
 * strings in Persian digits, empty genre names). Everything is coerced here so the
 * resolver only ever sees a typed record.
 */

import { ValidationError } from '../shared/errors.js';
import {
  isContentKind,
  isPlatform,
  type ContentKind,
  type Platform,
  type ScrapedRecord,
} from '../shared/types.js';

export interface CoerceDefaults {
  /** Used when the record names no platform (e.g. one crawler's dump) */
  platform?: Platform;
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(raw: RawRecord, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return undefined;
}

/** Persian (۰-۹) and Arabic-Indic (٠-٩) digits → ASCII */
export function toAsciiDigits(text: string): string {
  return text.replace(/[۰-۹٠-٩]/g, ch => {
    const code = ch.charCodeAt(0);
    return String(code >= 0x06f0 ? code - 0x06f0 : code - 0x0660);
  });
}

/** `filimo`, `Filimo`, `filimo_api`, `namava-spider` → platform */
export function platformFromName(name: string): Platform | undefined {
  const base = name.trim().toLowerCase().replace(/[-_ ](api|spider|crawler|scraper)$/, '');
  return isPlatform(base) ? base : undefined;
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function year(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const digits = toAsciiDigits(value.trim());
    if (/^\d+$/.test(digits)) return Number(digits);
  }
  throw new ValidationError(`release year "${String(value)}" is not a number`, 'releaseYear');
}

function kind(value: unknown): ContentKind | undefined {
  if (value === undefined) return undefined;
  const k = typeof value === 'string' ? value.trim().toLowerCase() : value;
  if (k === 'tv' || k === 'show') return 'series';
  if (isContentKind(k)) return k;
  throw new ValidationError(`unknown content kind "${String(value)}"`, 'kind');
}

function genres(value: unknown): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidationError('genres must be a list of names', 'genres');
  }
  const names: string[] = [];
  for (const entry of value) {
    const name = text(entry);
    if (name && !names.includes(name)) names.push(name);
  }
  return names;
}

export function coerceScrapedRecord(raw: unknown, defaults: CoerceDefaults = {}): ScrapedRecord {
  if (!isRecord(raw)) {
    throw new ValidationError('record must be a JSON object', 'record');
  }

  const title = text(pick(raw, 'title'));
  if (!title) throw new ValidationError('title is required', 'title');

  const releaseYearRaw = pick(raw, 'release_year', 'releaseYear', 'year');
  if (releaseYearRaw === undefined) throw new ValidationError('release year is required', 'releaseYear');

  const platformName = text(pick(raw, 'platform', 'spider'));
  let platform = defaults.platform;
  if (platformName) {
    platform = platformFromName(platformName);
    if (!platform) throw new ValidationError(`unknown platform "${platformName}"`, 'platform');
  }
  if (!platform) throw new ValidationError('platform is required', 'platform');

  const sourceId = text(pick(raw, 'source_id', 'sourceId'));
  if (!sourceId) throw new ValidationError('source id is required', 'sourceId');

  return {
    title,
    titleEn: text(pick(raw, 'title_en', 'titleEn')),
    releaseYear: year(releaseYearRaw),
    kind: kind(pick(raw, 'type', 'kind', 'content_kind')),
    genres: genres(pick(raw, 'genres')),
    platform,
    sourceId,
    url: text(pick(raw, 'url')),
    rawPayload: pick(raw, 'raw_data', 'raw_payload', 'rawPayload'),
  };
}

/**
 * A crawler dump: either one JSON array or JSON lines (one object per line).
 * Malformed lines are reported with their line number.
 */
export function parseRecordDump(content: string): unknown[] {
  const trimmed = content.trim();
  if (!trimmed) return [];

  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed)) throw new ValidationError('expected a JSON array of records', 'file');
    return parsed;
  }

  const records: unknown[] = [];
  const lines = trimmed.split(/\r?\n/);
  lines.forEach((line, i) => {
    if (!line.trim()) return;
    try {
      records.push(JSON.parse(line));
    } catch (err) {
      throw new ValidationError(`line ${i + 1}: ${err instanceof Error ? err.message : String(err)}`, 'file');
    }
  });
  return records;
}
