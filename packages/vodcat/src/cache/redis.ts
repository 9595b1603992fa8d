import Redis, { type RedisOptions } from 'ioredis';

import { errorMessage } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../shared/logger.js';
import type { VodcatConfig } from '../shared/types.js';
import type { CacheClient } from './match-cache.js';

/**
 * Connection options for the shared match cache.
 * Short timeouts and a single retry: a slow cache must degrade to a miss, not stall ingestion.
 */
export function buildRedisOptions(cfg: VodcatConfig['redis']): RedisOptions {
  return {
    keyPrefix: cfg.keyPrefix || undefined,
    connectTimeout: cfg.connectTimeoutMs,
    commandTimeout: cfg.commandTimeoutMs,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: true,
    retryStrategy: (times) => {
      if (times > 3) return null;
      return Math.min(times * 500, 2000);
    },
    reconnectOnError: (err) => {
      const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT'];
      return targetErrors.some(e => err.message.includes(e));
    },
  };
}

export class RedisCacheClient implements CacheClient {
  constructor(private readonly redis: Redis) {}

  static fromConfig(cfg: VodcatConfig['redis'], logger: Logger = defaultLogger): RedisCacheClient {
    const redis = new Redis(cfg.url, buildRedisOptions(cfg));
    redis.on('error', (err: Error) => {
      logger.warn(`Redis connection error: ${err.message}`);
    });
    return new RedisCacheClient(redis);
  }

  /** Resolves once the connection is usable; callers fall back to an in-process cache on failure */
  async connect(): Promise<void> {
    await this.redis.connect();
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async quit(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (err) {
      defaultLogger.debug(`Redis quit failed (${errorMessage(err)}); disconnecting`);
      this.redis.disconnect();
    }
  }
}
