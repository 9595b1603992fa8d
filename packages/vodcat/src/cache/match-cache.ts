/**
 * MatchCache: (platform title, year) → canonical item id.
 * Advisory only: every failure or timeout is logged and reads as a miss.
 * Callers must confirm a hit against the catalog before trusting it.
 */

import { CacheError, errorMessage } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../shared/logger.js';

/** Minimal key-value surface the match cache needs */
export interface CacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
  quit(): Promise<void>;
}

export interface MatchCacheOptions {
  ttlSeconds: number;
  /** Upper bound for any single cache call. */
  timeoutMs: number;
  logger?: Logger;
}

export function matchCacheKey(platformTitle: string, year: number): string {
  return `match:${platformTitle.trim()}:${year}`;
}

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
    promise.then(
      value => { clearTimeout(timer); resolve(value); },
      (err: unknown) => { clearTimeout(timer); reject(err); }
    );
  });
}

export class MatchCache {
  private readonly logger: Logger;

  constructor(private readonly client: CacheClient, private readonly opts: MatchCacheOptions) {
    this.logger = opts.logger ?? defaultLogger;
  }

  get ttlSeconds(): number {
    return this.opts.ttlSeconds;
  }

  async get(platformTitle: string, year: number): Promise<number | undefined> {
    const key = matchCacheKey(platformTitle, year);
    const value = await this.guard('get', key, () => this.client.get(key));
    if (value === undefined || value === null) {
      this.logger.debug(`Cache MISS: ${key}`);
      return undefined;
    }

    const id = Number(value);
    if (!Number.isSafeInteger(id) || id <= 0) {
      this.logger.warn(`Cache entry ${key} holds "${value}", not an item id; ignoring`);
      return undefined;
    }
    this.logger.debug(`Cache HIT: ${key} → #${id}`);
    return id;
  }

  async set(platformTitle: string, year: number, itemId: number): Promise<void> {
    const key = matchCacheKey(platformTitle, year);
    await this.guard('set', key, () => this.client.set(key, String(itemId), this.opts.ttlSeconds));
  }

  async delete(platformTitle: string, year: number): Promise<void> {
    const key = matchCacheKey(platformTitle, year);
    await this.guard('del', key, () => this.client.del(key));
  }

  private async guard<T>(
    operation: CacheError['operation'],
    key: string,
    fn: () => Promise<T>
  ): Promise<T | undefined> {
    try {
      return await withTimeout(fn(), this.opts.timeoutMs, `cache ${operation} ${key}`);
    } catch (err) {
      const error = new CacheError(errorMessage(err), operation, err);
      this.logger.warn(`Cache ${operation} failed for ${key}: ${error.message}`);
      return undefined;
    }
  }
}
