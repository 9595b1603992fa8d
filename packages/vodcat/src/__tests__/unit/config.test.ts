import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { buildConfig, loadConfig } from '../../shared/config.js';

describe('buildConfig', () => {
  it('applies defaults to an empty config', () => {
    const config = buildConfig({}, '/srv/vodcat');
    expect(config.matching).toEqual({
      fuzzyThreshold: 0.9,
      yearTolerance: 1,
      candidateLimit: 100,
      variationBoost: 0.95,
      variationsPath: path.resolve('/srv/vodcat', 'data/variations.json'),
    });
    expect(config.database.path).toBe(path.resolve('/srv/vodcat', 'data/vodcat.sqlite'));
    expect(config.cache).toEqual({ ttlSeconds: 7200, timeoutMs: 500 });
    expect(config.resolver).toEqual({ transientRetries: 2, retryBaseDelayMs: 100, conflictRetries: 3 });
    expect(config.ingest.concurrency).toBe(4);
  });

  it('keeps an in-memory database path as is', () => {
    const config = buildConfig({ database: { path: ':memory:' } }, '/srv/vodcat');
    expect(config.database.path).toBe(':memory:');
  });

  it('accepts numbers given as strings', () => {
    const config = buildConfig({ matching: { fuzzyThreshold: '0.85' }, redis: { enabled: 'false' } }, '/srv');
    expect(config.matching.fuzzyThreshold).toBe(0.85);
    expect(config.redis.enabled).toBe(false);
  });

  it('rejects out-of-range values', () => {
    expect(() => buildConfig({ matching: { fuzzyThreshold: 1.5 } }, '/srv'))
      .toThrow('matching.fuzzyThreshold must be between 0 and 1');
    expect(() => buildConfig({ matching: { yearTolerance: -1 } }, '/srv'))
      .toThrow('matching.yearTolerance must be a non-negative integer');
    expect(() => buildConfig({ matching: { candidateLimit: 0 } }, '/srv'))
      .toThrow('matching.candidateLimit must be a positive integer');
    expect(() => buildConfig({ cache: { ttlSeconds: 'soon' } }, '/srv'))
      .toThrow('cache.ttlSeconds must be a number');
    expect(() => buildConfig({ logging: { level: 'verbose' } }, '/srv'))
      .toThrow('logging.level must be one of error, warn, info, debug');
  });
});

describe('loadConfig', () => {
  let dir: string;
  const savedEnv = { ...process.env };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vodcat-config-'));
    delete process.env.VODCAT_CONFIG;
    delete process.env.VODCAT_SECRETS;
  });

  afterEach(() => {
    process.env = { ...savedEnv };
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('expands ${VAR} and merges the secrets file', () => {
    fs.mkdirSync(path.join(dir, 'config'));
    fs.writeFileSync(path.join(dir, 'config/config.yaml'), [
      'matching:',
      '  yearTolerance: ${VODCAT_TEST_TOLERANCE}',
      'redis:',
      '  url: redis://localhost:6379/0',
    ].join('\n'));
    fs.writeFileSync(path.join(dir, 'config/secrets.yaml'), 'redis:\n  url: redis://:test-secret@cache:6379/1\n');
    process.env.VODCAT_TEST_TOLERANCE = '2';

    const config = loadConfig(dir);
    expect(config.matching.yearTolerance).toBe(2);
    expect(config.redis.url).toBe('redis://:test-secret@cache:6379/1');
  });

  it('falls back to defaults when an expanded variable is unset', () => {
    fs.mkdirSync(path.join(dir, 'config'));
    fs.writeFileSync(path.join(dir, 'config/config.yaml'), 'ingest:\n  concurrency: ${VODCAT_TEST_UNSET}\n');
    delete process.env.VODCAT_TEST_UNSET;

    expect(loadConfig(dir).ingest.concurrency).toBe(4);
  });

  it('ships an example whose cache keys carry no prefix', () => {
    delete process.env.REDIS_URL;
    const example = path.resolve(__dirname, '../../../config/config.example.yaml');

    const config = loadConfig(dir, example);
    expect(config.redis.keyPrefix).toBe('');
    expect(config.ingest.concurrency).toBe(4);
  });

  it('throws for an explicit path that does not exist', () => {
    const missing = path.join(dir, 'nope.yaml');
    expect(() => loadConfig(dir, missing)).toThrow(`Config file not found: ${missing}`);
  });
});
