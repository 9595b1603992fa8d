/**
 * CatalogRepository: the persistence boundary the resolver and strategies depend on.
 * Implementations must enforce uniqueness on (title, year), (title key, year) and
 * (platform, source id), and surface violations as UniquenessConflictError.
 */

import type {
  CanonicalItem,
  ContentKind,
  Genre,
  Platform,
  SourceMapping,
} from '../shared/types.js';

export interface NewItem {
  title: string;
  titleEn: string | null;
  year: number;
  kind: ContentKind;
  genreIds: number[];
}

export interface ItemBackfill {
  titleEn?: string | null;
  genreIds?: number[];
}

export interface SourceUpsert {
  itemId: number;
  platform: Platform;
  sourceId: string;
  url: string | null;
  rawPayload: unknown;
}

export interface CandidateQuery {
  minYear: number;
  maxYear: number;
  kind: ContentKind;
  limit: number;
}

export interface AmbiguousMatchInput {
  title: string;
  year: number;
  baseTitle: string;
  candidateIds: number[];
}

export interface CatalogRepository {
  /** Run fn atomically; a throw rolls back everything fn wrote */
  transaction<T>(fn: () => T): T;

  getItem(id: number): CanonicalItem | undefined;
  /** Items of exactly `year` whose title or English title normalises to `key`, by id */
  findItemsByKey(key: string, year: number): CanonicalItem[];
  /** Items of exactly `year` whose normalised titles contain `fragment`, by id */
  findItemsByKeyFragment(fragment: string, year: number): CanonicalItem[];
  /** Items in the year window with the given kind, by id, capped at `limit` */
  findCandidates(query: CandidateQuery): CanonicalItem[];
  /** The row occupying the unique slot a new (title, year) would need */
  findConflicting(title: string, year: number): CanonicalItem | undefined;

  createItem(input: NewItem): CanonicalItem;
  /** Fill only fields that are still empty; returns the item and whether anything changed */
  backfillItem(id: number, patch: ItemBackfill): { item: CanonicalItem; changed: boolean };

  upsertSource(input: SourceUpsert): { mapping: SourceMapping; created: boolean };
  getOrCreateGenre(name: string): Genre;
  recordAmbiguousMatch(input: AmbiguousMatchInput): void;
}
