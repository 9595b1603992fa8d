export * from './shared/types.js';
export * from './shared/errors.js';
export { loadConfig, buildConfig, DEFAULT_MATCHING } from './shared/config.js';
export { logger, setLogLevel, type Logger } from './shared/logger.js';

export { normalize, STOP_WORDS } from './matching/normalize.js';
export { titleSimilarity, sequenceRatio, jaroWinkler } from './matching/similarity.js';
export { VariationTable, type VariationData } from './matching/variations.js';
export { ExactStrategy, FuzzyStrategy, VariationStrategy, type FuzzyOptions } from './matching/strategies.js';
export { MatchPipeline } from './matching/pipeline.js';
export type { MatchInput, MatchStrategy, StrategyMatch } from './matching/types.js';

export { MatchCache, matchCacheKey, type CacheClient, type MatchCacheOptions } from './cache/match-cache.js';
export { MemoryCacheClient } from './cache/memory.js';
export { RedisCacheClient, buildRedisOptions } from './cache/redis.js';

export { CatalogDb, type CatalogStats } from './db/client.js';
export type * from './db/types.js';

export { ContentResolver, validateRecord, type ResolveContext, type ResolverDeps } from './resolver/resolver.js';
export { GenreCache } from './resolver/genres.js';
export { withRetry } from './resolver/retry.js';

export { coerceScrapedRecord, parseRecordDump, platformFromName } from './ingest/records.js';
export { runIngestion, type IngestOptions, type IngestResult } from './ingest/run.js';
