import { MatchCache, matchCacheKey, type CacheClient } from '../../cache/match-cache.js';
import { MemoryCacheClient } from '../../cache/memory.js';

class FailingClient implements CacheClient {
  calls = 0;
  async get(): Promise<string | null> {
    this.calls++;
    throw new Error('connection refused');
  }
  async set(): Promise<void> {
    this.calls++;
    throw new Error('connection refused');
  }
  async del(): Promise<void> {
    this.calls++;
    throw new Error('connection refused');
  }
  async quit(): Promise<void> {}
}

class HangingClient implements CacheClient {
  get(): Promise<string | null> {
    return new Promise<string | null>(() => undefined);
  }
  set(): Promise<void> {
    return new Promise<void>(() => undefined);
  }
  del(): Promise<void> {
    return new Promise<void>(() => undefined);
  }
  async quit(): Promise<void> {}
}

describe('matchCacheKey', () => {
  it('combines the platform title and year', () => {
    expect(matchCacheKey(' درایو ', 2011)).toBe('match:درایو:2011');
  });
});

describe('MatchCache', () => {
  let client: MemoryCacheClient;
  let cache: MatchCache;

  beforeEach(() => {
    client = new MemoryCacheClient({ checkPeriodSeconds: 0 });
    cache = new MatchCache(client, { ttlSeconds: 60, timeoutMs: 100 });
  });

  afterEach(async () => {
    await client.quit();
  });

  it('stores item ids under the title and year', async () => {
    await cache.set('Drive', 2011, 42);
    expect(await client.get('match:Drive:2011')).toBe('42');
    expect(await cache.get('Drive', 2011)).toBe(42);
    expect(await cache.get('Drive', 2012)).toBeUndefined();
  });

  it('deletes entries', async () => {
    await cache.set('Drive', 2011, 42);
    await cache.delete('Drive', 2011);
    expect(await cache.get('Drive', 2011)).toBeUndefined();
  });

  it('treats values that are not item ids as a miss', async () => {
    await client.set('match:Drive:2011', 'not-a-number', 60);
    expect(await cache.get('Drive', 2011)).toBeUndefined();
    await client.set('match:Drive:2011', '-3', 60);
    expect(await cache.get('Drive', 2011)).toBeUndefined();
  });

  it('turns client failures into misses and no-ops', async () => {
    const failing = new FailingClient();
    const degraded = new MatchCache(failing, { ttlSeconds: 60, timeoutMs: 100 });

    await expect(degraded.get('Drive', 2011)).resolves.toBeUndefined();
    await expect(degraded.set('Drive', 2011, 1)).resolves.toBeUndefined();
    await expect(degraded.delete('Drive', 2011)).resolves.toBeUndefined();
    expect(failing.calls).toBe(3);
  });

  it('gives up on a client that never answers', async () => {
    const slow = new MatchCache(new HangingClient(), { ttlSeconds: 60, timeoutMs: 20 });
    const started = Date.now();
    await expect(slow.get('Drive', 2011)).resolves.toBeUndefined();
    await expect(slow.set('Drive', 2011, 1)).resolves.toBeUndefined();
    expect(Date.now() - started).toBeLessThan(1000);
  });
});
