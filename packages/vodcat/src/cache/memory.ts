import NodeCache from 'node-cache';

import type { CacheClient } from './match-cache.js';

/**
 * In-process cache client for single-process runs (redis.enabled: false).
 * Entries are not shared across workers, which only costs extra lookups.
 */
export class MemoryCacheClient implements CacheClient {
  private cache: NodeCache;

  constructor(opts: { checkPeriodSeconds?: number } = {}) {
    this.cache = new NodeCache({
      stdTTL: 0,
      checkperiod: opts.checkPeriodSeconds ?? 60, // 0 disables the expiry sweep timer
      useClones: false,
    });
  }

  async get(key: string): Promise<string | null> {
    return this.cache.get<string>(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.cache.set(key, value, ttlSeconds);
  }

  async del(key: string): Promise<void> {
    this.cache.del(key);
  }

  async quit(): Promise<void> {
    this.cache.close();
  }

  get size(): number {
    return this.cache.keys().length;
  }
}
