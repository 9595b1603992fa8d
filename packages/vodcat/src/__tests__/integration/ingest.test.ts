import { runIngestion } from '../../ingest/run.js';
import { TransientStoreError } from '../../shared/errors.js';
import type { ResolveOutcome, ScrapedRecord } from '../../shared/types.js';
import { createHarness, type Harness } from '../helpers/catalog.js';

const dump: unknown[] = [
  {
    title: 'درایو',
    title_en: 'Drive',
    release_year: '۲۰۱۱',
    genres: ['Drama', 'Crime'],
    source_id: 101,
    raw_data: { id: 101 },
  },
  { title: 'Drive', year: 2011, source_id: 'n-101', platform: 'namava_api', genres: ['Crime'] },
  { title: 'درایو', title_en: 'Drive', release_year: 2011, source_id: '101' },
  { year: 2011, source_id: '102' },
];

describe('runIngestion', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  afterEach(async () => {
    await h.close();
  });

  it('resolves a crawler dump and counts what happened', async () => {
    const result = await runIngestion(dump, h.resolver, h.db, { concurrency: 2, defaults: { platform: 'filimo' } });

    expect(result).toMatchObject({
      total: 4,
      created: 1,
      matched: 2,
      linked: 2,
      relinked: 1,
      skipped: 1,
      errored: 0,
      cancelled: 0,
    });
    expect(result.errors).toEqual([{ index: 3, sourceId: undefined, error: 'title is required' }]);
    expect(h.db.getStats()).toEqual({ items: { movie: 1, series: 0 }, sources: { filimo: 1, namava: 1 }, genres: 2 });
  });

  it('reports progress for every record', async () => {
    const seen: number[] = [];
    await runIngestion(dump, h.resolver, h.db, {
      concurrency: 1,
      defaults: { platform: 'filimo' },
      onProgress: p => seen.push(p.done),
    });
    expect(seen).toEqual([1, 2, 3, 4]);
  });

  it('keeps going after a store failure', async () => {
    const drive = await h.resolver.resolve({ title: 'Drive', releaseYear: 2011, platform: 'filimo', sourceId: 'f-1' });
    const resolver = {
      async resolve(record: ScrapedRecord): Promise<ResolveOutcome> {
        if (record.sourceId === 'boom') throw new TransientStoreError('database is locked', 'SQLITE_BUSY');
        return { item: drive.item, contentCreated: false, sourceCreated: false, method: 'cache', score: 1 };
      },
    };

    const result = await runIngestion(
      [
        { title: 'Drive', year: 2011, source_id: 'boom' },
        { title: 'Drive', year: 2011, source_id: 'f-1' },
      ],
      resolver,
      h.db,
      { defaults: { platform: 'filimo' } }
    );

    expect(result.errored).toBe(1);
    expect(result.matched).toBe(1);
    expect(result.errors).toEqual([{ index: 0, sourceId: 'filimo/boom', error: 'database is locked' }]);
  });

  it('starts nothing once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runIngestion(dump, h.resolver, h.db, {
      defaults: { platform: 'filimo' },
      signal: controller.signal,
    });

    expect(result.cancelled).toBe(4);
    expect(result.created + result.matched + result.skipped + result.errored).toBe(0);
    expect(h.db.getStats().items.movie).toBe(0);
  });

  it.each([Number.NaN, 0, -2, 1.5])('falls back to the default worker count for concurrency %p', async concurrency => {
    const result = await runIngestion(dump, h.resolver, h.db, { concurrency, defaults: { platform: 'filimo' } });

    expect(result).toMatchObject({ created: 1, matched: 2, skipped: 1, cancelled: 0 });
    expect(h.db.getStats().items.movie).toBe(1);
  });

  it('handles an empty dump', async () => {
    const result = await runIngestion([], h.resolver, h.db);
    expect(result.total).toBe(0);
    expect(result.errors).toEqual([]);
  });
});
