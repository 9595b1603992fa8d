import { MatchCache, type CacheClient } from '../../cache/match-cache.js';
import { MemoryCacheClient } from '../../cache/memory.js';
import { CatalogDb } from '../../db/client.js';
import type { NewItem } from '../../db/types.js';
import { VariationTable } from '../../matching/variations.js';
import { ContentResolver, type ResolverRetryOptions } from '../../resolver/resolver.js';
import { DEFAULT_MATCHING } from '../../shared/config.js';
import { TransientStoreError, UniquenessConflictError } from '../../shared/errors.js';
import type { CanonicalItem, ScrapedRecord } from '../../shared/types.js';

export const variations = new VariationTable({
  'متری شیش و نیم': ['metri shish o nim', 'Just 6.5'],
});

export function record(overrides: Partial<ScrapedRecord> = {}): ScrapedRecord {
  return {
    title: 'درایو',
    titleEn: 'Drive',
    releaseYear: 2011,
    kind: 'movie',
    genres: ['Drama'],
    platform: 'filimo',
    sourceId: 'f-1',
    url: 'https://filimo.example/m/f-1',
    ...overrides,
  };
}

export interface Harness {
  db: CatalogDb;
  client: CacheClient;
  cache: MatchCache;
  resolver: ContentResolver;
  close(): Promise<void>;
}

export function createHarness(
  opts: { db?: CatalogDb; client?: CacheClient; retry?: Partial<ResolverRetryOptions> } = {}
): Harness {
  const db = opts.db ?? new CatalogDb(':memory:');
  const client = opts.client ?? new MemoryCacheClient({ checkPeriodSeconds: 0 });
  const cache = new MatchCache(client, { ttlSeconds: 60, timeoutMs: 200 });
  const resolver = new ContentResolver({
    repo: db,
    cache,
    variations,
    matching: DEFAULT_MATCHING,
    retry: { retryBaseDelayMs: 1, ...opts.retry },
  });
  return {
    db,
    client,
    cache,
    resolver,
    async close() {
      await client.quit();
      db.close();
    },
  };
}

/**
 * A catalog where another writer commits `competitor` while our first insert is
 * in flight: the insert fails on the unique key and the competitor's row is
 * there once our transaction has rolled back.
 */
export class RacingCatalog extends CatalogDb {
  winner?: CanonicalItem;
  conflicts = 0;

  constructor(private competitor: NewItem | undefined, private racesLeft = 1) {
    super(':memory:');
  }

  override createItem(input: NewItem): CanonicalItem {
    if (this.racesLeft > 0) {
      this.racesLeft--;
      this.conflicts++;
      throw new UniquenessConflictError(
        'UNIQUE constraint failed: canonical_items.title_key, canonical_items.year',
        'canonical_items'
      );
    }
    return super.createItem(input);
  }

  override transaction<T>(fn: () => T): T {
    try {
      return super.transaction(fn);
    } catch (err) {
      if (err instanceof UniquenessConflictError && this.competitor) {
        const competitor = this.competitor;
        this.competitor = undefined;
        this.winner = super.createItem(competitor);
      }
      throw err;
    }
  }
}

/**
 * Like RacingCatalog, but the competitor's row really is in the table when our
 * insert runs, so the conflict comes from SQLite's own unique index.
 */
export class CollidingCatalog extends CatalogDb {
  winner?: CanonicalItem;
  private collided = false;

  constructor(private competitor: NewItem) {
    super(':memory:');
  }

  override createItem(input: NewItem): CanonicalItem {
    if (!this.collided) {
      this.collided = true;
      super.createItem(this.competitor);
    }
    return super.createItem(input);
  }

  override transaction<T>(fn: () => T): T {
    try {
      return super.transaction(fn);
    } catch (err) {
      if (err instanceof UniquenessConflictError && !this.winner) {
        this.winner = super.createItem(this.competitor);
      }
      throw err;
    }
  }
}

/** A catalog whose write lock is held by someone else for the first `busyCount` transactions */
export class BusyCatalog extends CatalogDb {
  attempts = 0;

  constructor(private busyCount: number) {
    super(':memory:');
  }

  override transaction<T>(fn: () => T): T {
    this.attempts++;
    if (this.attempts <= this.busyCount) {
      throw new TransientStoreError('database is locked', 'SQLITE_BUSY');
    }
    return super.transaction(fn);
  }
}

export class FailingCacheClient implements CacheClient {
  async get(): Promise<string | null> {
    throw new Error('ECONNREFUSED');
  }
  async set(): Promise<void> {
    throw new Error('ECONNREFUSED');
  }
  async del(): Promise<void> {
    throw new Error('ECONNREFUSED');
  }
  async quit(): Promise<void> {}
}
