/**
 * vodcat shared types
 * Storage-agnostic: no SQLite or Redis imports here.
 */

// ============================================================================
// Configuration
// ============================================================================

export interface VodcatConfig {
  // SQLite catalog store
  database: {
    path: string;
    busyTimeoutMs: number;
  };

  // Shared match cache (Redis). When disabled, an in-process cache is used.
  redis: {
    enabled: boolean;
    url: string;
    keyPrefix: string;
    connectTimeoutMs: number;
    commandTimeoutMs: number;
  };

  cache: {
    ttlSeconds: number;
    timeoutMs: number;
  };

  matching: MatchingConfig;

  resolver: {
    transientRetries: number;
    retryBaseDelayMs: number;
    conflictRetries: number;
  };

  ingest: {
    concurrency: number;
  };

  logging: {
    level: 'error' | 'warn' | 'info' | 'debug';
  };
}

export interface MatchingConfig {
  fuzzyThreshold: number;    // 0..1, accepted best score must be >= this
  yearTolerance: number;     // +/- years examined by the fuzzy strategy
  candidateLimit: number;    // max candidates examined by the fuzzy strategy
  variationBoost: number;    // effective score for titles the variation table relates
  variationsPath: string;    // JSON file: { "<base>": ["<alt>", ...] }
}

// ============================================================================
// Catalog
// ============================================================================

export const PLATFORMS = ['filimo', 'namava'] as const;
export type Platform = (typeof PLATFORMS)[number];

export const CONTENT_KINDS = ['movie', 'series'] as const;
export type ContentKind = (typeof CONTENT_KINDS)[number];

export const YEAR_MIN = 1900;
export const YEAR_MAX = 2030;

export function isPlatform(value: unknown): value is Platform {
  return typeof value === 'string' && (PLATFORMS as readonly string[]).includes(value);
}

export function isContentKind(value: unknown): value is ContentKind {
  return typeof value === 'string' && (CONTENT_KINDS as readonly string[]).includes(value);
}

/** The deduplicated work */
export interface CanonicalItem {
  id: number;
  title: string;
  titleEn: string | null;
  year: number;
  kind: ContentKind;
  genres: string[];
  createdAt: string;
  updatedAt: string;
}

/** One platform's listing of a canonical item */
export interface SourceMapping {
  id: number;
  itemId: number;
  platform: Platform;
  sourceId: string;
  url: string | null;
  rawPayload: unknown;
  createdAt: string;
  updatedAt: string;
}

export interface Genre {
  id: number;
  name: string;
}

/** One listing as handed over by a crawler */
export interface ScrapedRecord {
  title: string;
  titleEn?: string;
  releaseYear: number;
  kind?: ContentKind;
  genres?: string[];
  platform: Platform;
  sourceId: string;
  url?: string;
  rawPayload?: unknown;
}

// ============================================================================
// Resolution
// ============================================================================

export type MatchMethod = 'exact' | 'fuzzy' | 'variation';
export type ResolveMethod = MatchMethod | 'cache' | 'created';

export interface ResolveOutcome {
  item: CanonicalItem;
  contentCreated: boolean;
  sourceCreated: boolean;
  method: ResolveMethod;
  score: number;   // 1 for exact/cache/created, similarity for fuzzy
}
