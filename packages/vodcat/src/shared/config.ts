/**
 * Configuration loader for vodcat
 * Loads from YAML config file with environment variable expansion.
 * Every setting has a default, so running without a config file is valid.
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';

import type { MatchingConfig, VodcatConfig } from './types.js';

type Raw = Record<string, unknown>;

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export const DEFAULT_MATCHING: Omit<MatchingConfig, 'variationsPath'> = {
  fuzzyThreshold: 0.9,
  yearTolerance: 1,
  candidateLimit: 100,
  variationBoost: 0.95,
};

const DEFAULT_RESOLVER: VodcatConfig['resolver'] = {
  transientRetries: 2,
  retryBaseDelayMs: 100,
  conflictRetries: 3,
};

const DEFAULT_CACHE: VodcatConfig['cache'] = {
  ttlSeconds: 7200,  // 2 hours
  timeoutMs: 500,
};

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
function deepExpand(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(deepExpand);
  if (isRecord(obj)) {
    const out: Raw = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v);
    }
    return out;
  }
  return expandEnv(obj);
}

function firstExisting(candidates: (string | undefined)[]): string | null {
  for (const candidate of candidates) {
    if (candidate && fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Find config file from multiple candidate locations
 */
function findConfigFile(baseDir: string): string | null {
  return firstExisting([
    process.env.VODCAT_CONFIG,
    path.join(baseDir, 'config/config.yaml'),
    path.join(process.cwd(), 'vodcat.yaml'),
    path.join(process.cwd(), 'config/vodcat.yaml'),
  ]);
}

/**
 * Find secrets file (Redis credentials etc.) from multiple candidate locations
 */
function findSecretsFile(baseDir: string): string | null {
  return firstExisting([
    process.env.VODCAT_SECRETS,
    path.join(baseDir, 'config/secrets.yaml'),
    path.join(process.cwd(), 'secrets.yaml'),
  ]);
}

/**
 * Deep merge two objects (secrets override config)
 */
function deepMerge(target: Raw, source: Raw): Raw {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== null && sourceValue !== '') {
      result[key] = sourceValue;
    }
  }

  return result;
}

function readYaml(filePath: string): Raw {
  const parsed = deepExpand(parse(fs.readFileSync(filePath, 'utf-8')));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`${filePath}: expected a mapping at the top level`);
  }
  return parsed;
}

// ── Typed readers ──────────────────────────────────────────────────
// Values expanded from ${VAR} arrive as strings, so numbers and booleans accept both forms.

function section(raw: Raw, key: string): Raw {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function isUnset(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

function numberOr(sec: Raw, key: string, fallback: number, label: string): number {
  const value = sec[key];
  if (isUnset(value)) return fallback;
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw new Error(`${label} must be a number`);
  }
  return n;
}

function stringOr(sec: Raw, key: string, fallback: string): string {
  const value = sec[key];
  if (isUnset(value)) return fallback;
  return String(value);
}

function boolOr(sec: Raw, key: string, fallback: boolean, label: string): boolean {
  const value = sec[key];
  if (isUnset(value)) return fallback;
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new Error(`${label} must be true or false`);
}

function logLevelOr(sec: Raw, fallback: VodcatConfig['logging']['level']): VodcatConfig['logging']['level'] {
  const value = stringOr(sec, 'level', fallback);
  const level = LOG_LEVELS.find(l => l === value);
  if (!level) {
    throw new Error(`logging.level must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

function resolveDbPath(baseDir: string, dbPath: string): string {
  return dbPath === ':memory:' ? dbPath : path.resolve(baseDir, dbPath);
}

/**
 * Build config from an already-parsed object, applying defaults and validating ranges
 */
export function buildConfig(raw: Raw, baseDir: string): VodcatConfig {
  const database = section(raw, 'database');
  const redis = section(raw, 'redis');
  const cache = section(raw, 'cache');
  const matching = section(raw, 'matching');
  const resolver = section(raw, 'resolver');
  const ingest = section(raw, 'ingest');
  const logging = section(raw, 'logging');

  const config: VodcatConfig = {
    database: {
      path: resolveDbPath(baseDir, stringOr(database, 'path', 'data/vodcat.sqlite')),
      busyTimeoutMs: numberOr(database, 'busyTimeoutMs', 5000, 'database.busyTimeoutMs'),
    },
    redis: {
      enabled: boolOr(redis, 'enabled', true, 'redis.enabled'),
      url: stringOr(redis, 'url', process.env.REDIS_URL ?? 'redis://localhost:6379/0'),
      keyPrefix: stringOr(redis, 'keyPrefix', ''),
      connectTimeoutMs: numberOr(redis, 'connectTimeoutMs', 2000, 'redis.connectTimeoutMs'),
      commandTimeoutMs: numberOr(redis, 'commandTimeoutMs', 500, 'redis.commandTimeoutMs'),
    },
    cache: {
      ttlSeconds: numberOr(cache, 'ttlSeconds', DEFAULT_CACHE.ttlSeconds, 'cache.ttlSeconds'),
      timeoutMs: numberOr(cache, 'timeoutMs', DEFAULT_CACHE.timeoutMs, 'cache.timeoutMs'),
    },
    matching: {
      fuzzyThreshold: numberOr(matching, 'fuzzyThreshold', DEFAULT_MATCHING.fuzzyThreshold, 'matching.fuzzyThreshold'),
      yearTolerance: numberOr(matching, 'yearTolerance', DEFAULT_MATCHING.yearTolerance, 'matching.yearTolerance'),
      candidateLimit: numberOr(matching, 'candidateLimit', DEFAULT_MATCHING.candidateLimit, 'matching.candidateLimit'),
      variationBoost: numberOr(matching, 'variationBoost', DEFAULT_MATCHING.variationBoost, 'matching.variationBoost'),
      variationsPath: path.resolve(baseDir, stringOr(matching, 'variationsPath', 'data/variations.json')),
    },
    resolver: {
      transientRetries: numberOr(resolver, 'transientRetries', DEFAULT_RESOLVER.transientRetries, 'resolver.transientRetries'),
      retryBaseDelayMs: numberOr(resolver, 'retryBaseDelayMs', DEFAULT_RESOLVER.retryBaseDelayMs, 'resolver.retryBaseDelayMs'),
      conflictRetries: numberOr(resolver, 'conflictRetries', DEFAULT_RESOLVER.conflictRetries, 'resolver.conflictRetries'),
    },
    ingest: {
      concurrency: numberOr(ingest, 'concurrency', 4, 'ingest.concurrency'),
    },
    logging: {
      level: logLevelOr(logging, 'info'),
    },
  };

  const m = config.matching;
  if (m.fuzzyThreshold < 0 || m.fuzzyThreshold > 1) {
    throw new Error('matching.fuzzyThreshold must be between 0 and 1');
  }
  if (m.variationBoost < 0 || m.variationBoost > 1) {
    throw new Error('matching.variationBoost must be between 0 and 1');
  }
  if (!Number.isInteger(m.yearTolerance) || m.yearTolerance < 0) {
    throw new Error('matching.yearTolerance must be a non-negative integer');
  }
  if (!Number.isInteger(m.candidateLimit) || m.candidateLimit < 1) {
    throw new Error('matching.candidateLimit must be a positive integer');
  }
  if (!Number.isInteger(config.ingest.concurrency) || config.ingest.concurrency < 1) {
    throw new Error('ingest.concurrency must be a positive integer');
  }
  if (config.cache.ttlSeconds <= 0) {
    throw new Error('cache.ttlSeconds must be positive');
  }
  if (config.resolver.transientRetries < 0 || config.resolver.conflictRetries < 0) {
    throw new Error('resolver retry counts must not be negative');
  }

  return config;
}

/**
 * Load and validate configuration
 */
export function loadConfig(baseDir: string, explicitPath?: string): VodcatConfig {
  if (explicitPath && !fs.existsSync(explicitPath)) {
    throw new Error(`Config file not found: ${explicitPath}`);
  }
  const configPath = explicitPath ?? findConfigFile(baseDir);
  let merged: Raw = configPath ? readYaml(configPath) : {};

  // Load secrets file if present and merge with config
  const secretsPath = findSecretsFile(baseDir);
  if (secretsPath) {
    merged = deepMerge(merged, readYaml(secretsPath));
  }

  return buildConfig(merged, baseDir);
}
