/**
 * Shared wiring for CLI commands: config → store, cache, variation table, resolver.
 */

import fs from 'node:fs';
import path from 'node:path';

import { MatchCache, type CacheClient } from '../cache/match-cache.js';
import { MemoryCacheClient } from '../cache/memory.js';
import { RedisCacheClient } from '../cache/redis.js';
import { CatalogDb } from '../db/client.js';
import { VariationTable } from '../matching/variations.js';
import { ContentResolver } from '../resolver/resolver.js';
import { loadConfig } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger, setLogLevel } from '../shared/logger.js';
import type { VodcatConfig } from '../shared/types.js';

export interface CatalogContext {
  config: VodcatConfig;
  db: CatalogDb;
  variations: VariationTable;
  cache: MatchCache;
  resolver: ContentResolver;
  close(): Promise<void>;
}

export interface ContextOptions {
  configPath?: string;
  dbPath?: string;
  /** false → in-process cache even when Redis is enabled in config */
  useRedis?: boolean;
}

function loadVariations(filePath: string): VariationTable {
  if (!fs.existsSync(filePath)) {
    logger.warn(`Variation table not found at ${filePath}; variation matching disabled`);
    return VariationTable.empty();
  }
  const table = VariationTable.fromFile(filePath);
  logger.debug(`Loaded ${table.size} variation bases from ${filePath}`);
  return table;
}

async function openCacheClient(config: VodcatConfig, useRedis: boolean): Promise<CacheClient> {
  if (useRedis && config.redis.enabled) {
    const client = RedisCacheClient.fromConfig(config.redis, logger);
    try {
      await client.connect();
      return client;
    } catch (err) {
      logger.warn(`Redis unavailable (${errorMessage(err)}); using in-process match cache`);
      await client.quit();
    }
  }
  return new MemoryCacheClient();
}

export async function openCatalog(baseDir: string, opts: ContextOptions = {}): Promise<CatalogContext> {
  const config = loadConfig(baseDir, opts.configPath);
  setLogLevel(process.env.VODCAT_LOG_LEVEL ?? config.logging.level);

  const dbPath = opts.dbPath ? path.resolve(opts.dbPath) : config.database.path;
  const db = new CatalogDb(dbPath, { busyTimeoutMs: config.database.busyTimeoutMs });

  const variations = loadVariations(config.matching.variationsPath);
  const cacheClient = await openCacheClient(config, opts.useRedis ?? true);
  const cache = new MatchCache(cacheClient, { ...config.cache, logger });
  const resolver = new ContentResolver({
    repo: db,
    cache,
    variations,
    matching: config.matching,
    retry: config.resolver,
    logger,
  });

  return {
    config,
    db,
    variations,
    cache,
    resolver,
    async close() {
      await cacheClient.quit();
      db.close();
    },
  };
}
