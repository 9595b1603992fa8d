/**
 * ContentResolver: turns one scraped listing into (canonical item, source mapping).
 *
 * Per record: cache lookup → genre ids → one store transaction
 * (confirm cached id → match pipeline → create → backfill → upsert mapping) → cache write.
 * A uniqueness conflict rolls the transaction back and re-runs it; the re-run sees
 * the competing writer's committed row and links to it.
 */

import type { CatalogRepository } from '../db/types.js';
import type { MatchCache } from '../cache/match-cache.js';
import { MatchPipeline } from '../matching/pipeline.js';
import type { FuzzyOptions } from '../matching/strategies.js';
import type { VariationTable } from '../matching/variations.js';
import { UniquenessConflictError, ValidationError } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../shared/logger.js';
import {
  YEAR_MAX,
  YEAR_MIN,
  isContentKind,
  isPlatform,
  type CanonicalItem,
  type ContentKind,
  type Platform,
  type ResolveMethod,
  type ResolveOutcome,
  type ScrapedRecord,
} from '../shared/types.js';
import { GenreCache } from './genres.js';
import { withRetry } from './retry.js';

export interface ResolverRetryOptions {
  transientRetries: number;
  retryBaseDelayMs: number;
  conflictRetries: number;
}

export const DEFAULT_RETRY: ResolverRetryOptions = {
  transientRetries: 2,
  retryBaseDelayMs: 100,
  conflictRetries: 3,
};

export interface ResolverDeps {
  repo: CatalogRepository;
  cache: MatchCache;
  variations: VariationTable;
  matching: FuzzyOptions;
  retry?: Partial<ResolverRetryOptions>;
  logger?: Logger;
}

export interface ResolveContext {
  /** Shared across one ingestion run; a fresh memo is used when omitted */
  genres?: GenreCache;
  signal?: AbortSignal;
}

/** A ScrapedRecord after validation: trimmed, defaulted, bounded */
export interface ValidRecord {
  title: string;
  titleEn: string | null;
  year: number;
  kind: ContentKind;
  genres: string[];
  platform: Platform;
  sourceId: string;
  url: string | null;
  rawPayload: unknown;
}

function optionalText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function validateRecord(record: ScrapedRecord): ValidRecord {
  const title = record.title?.trim();
  if (!title) {
    throw new ValidationError('title is required', 'title');
  }
  if (!Number.isInteger(record.releaseYear) || record.releaseYear < YEAR_MIN || record.releaseYear > YEAR_MAX) {
    throw new ValidationError(
      `releaseYear must be an integer between ${YEAR_MIN} and ${YEAR_MAX}, got ${record.releaseYear}`,
      'releaseYear'
    );
  }
  if (!isPlatform(record.platform)) {
    throw new ValidationError(`unknown platform "${String(record.platform)}"`, 'platform');
  }
  const sourceId = record.sourceId?.trim();
  if (!sourceId) {
    throw new ValidationError('sourceId is required', 'sourceId');
  }
  const kind = record.kind ?? 'movie';
  if (!isContentKind(kind)) {
    throw new ValidationError(`unknown kind "${String(kind)}"`, 'kind');
  }

  return {
    title,
    titleEn: optionalText(record.titleEn),
    year: record.releaseYear,
    kind,
    genres: record.genres ?? [],
    platform: record.platform,
    sourceId,
    url: optionalText(record.url),
    rawPayload: record.rawPayload,
  };
}

export class ContentResolver {
  private readonly repo: CatalogRepository;
  private readonly cache: MatchCache;
  private readonly pipeline: MatchPipeline;
  private readonly retry: ResolverRetryOptions;
  private readonly logger: Logger;

  constructor(deps: ResolverDeps) {
    this.repo = deps.repo;
    this.cache = deps.cache;
    this.retry = { ...DEFAULT_RETRY, ...deps.retry };
    this.logger = deps.logger ?? defaultLogger;
    this.pipeline = MatchPipeline.create(deps.repo, deps.variations, deps.matching, {
      logger: this.logger,
      onAmbiguous: match => this.repo.recordAmbiguousMatch(match),
    });
  }

  async resolve(record: ScrapedRecord, ctx: ResolveContext = {}): Promise<ResolveOutcome> {
    const input = validateRecord(record);
    const genres = ctx.genres ?? new GenreCache(this.repo);

    const cachedId = await this.cache.get(input.title, input.year);

    const genreIds = await withRetry(() => genres.resolve(input.genres), {
      retries: this.retry.transientRetries,
      baseDelayMs: this.retry.retryBaseDelayMs,
      signal: ctx.signal,
      logger: this.logger,
      label: `genres for "${input.title}"`,
    });

    const outcome = await withRetry(() => this.resolveWithConflictRetry(input, cachedId, genreIds), {
      retries: this.retry.transientRetries,
      baseDelayMs: this.retry.retryBaseDelayMs,
      signal: ctx.signal,
      logger: this.logger,
      label: `resolve ${input.platform}/${input.sourceId}`,
    });

    await this.cache.set(input.title, input.year, outcome.item.id);
    return outcome;
  }

  private resolveWithConflictRetry(
    input: ValidRecord,
    cachedId: number | undefined,
    genreIds: number[]
  ): ResolveOutcome {
    for (let attempt = 0; ; attempt++) {
      try {
        return this.repo.transaction(() => this.resolveInTransaction(input, cachedId, genreIds, attempt > 0));
      } catch (err) {
        if (!(err instanceof UniquenessConflictError) || attempt >= this.retry.conflictRetries) throw err;
        this.logger.warn(
          `Uniqueness conflict on ${err.table} for "${input.title}" (${input.year}); ` +
          `re-running resolution (${attempt + 1}/${this.retry.conflictRetries})`
        );
      }
    }
  }

  private resolveInTransaction(
    input: ValidRecord,
    cachedId: number | undefined,
    genreIds: number[],
    afterConflict: boolean
  ): ResolveOutcome {
    let item: CanonicalItem | undefined;
    let method: ResolveMethod = 'cache';
    let score = 1;
    let contentCreated = false;

    if (cachedId !== undefined) {
      item = this.repo.getItem(cachedId);
      if (!item) this.logger.debug(`Cached item #${cachedId} for "${input.title}" is gone; matching afresh`);
    }

    if (!item) {
      const match = this.pipeline.run({
        title: input.title,
        titleEn: input.titleEn ?? undefined,
        year: input.year,
        kind: input.kind,
      });
      if (match) {
        ({ item, method, score } = match);
      }
    }

    if (!item && afterConflict) {
      item = this.repo.findConflicting(input.title, input.year);
      if (item) {
        method = 'exact';
        this.logger.info(`Linked "${input.title}" (${input.year}) to concurrently created #${item.id}`);
      }
    }

    if (!item) {
      item = this.repo.createItem({
        title: input.title,
        titleEn: input.titleEn,
        year: input.year,
        kind: input.kind,
        genreIds,
      });
      method = 'created';
      contentCreated = true;
      this.logger.info(`Created #${item.id} "${item.title}" (${item.year}, ${item.kind})`);
    } else {
      const backfill = this.repo.backfillItem(item.id, { titleEn: input.titleEn, genreIds });
      item = backfill.item;
      if (backfill.changed) this.logger.debug(`Backfilled metadata on #${item.id}`);
    }

    const { mapping, created: sourceCreated } = this.repo.upsertSource({
      itemId: item.id,
      platform: input.platform,
      sourceId: input.sourceId,
      url: input.url,
      rawPayload: input.rawPayload,
    });
    if (mapping.itemId !== item.id) {
      this.logger.warn(
        `${input.platform}/${input.sourceId} resolved to #${item.id} but stays linked to #${mapping.itemId}`
      );
    }

    return { item, contentCreated, sourceCreated, method, score };
  }
}
