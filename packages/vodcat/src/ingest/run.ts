/**
 * Batch ingestion: coerce and resolve a crawler dump with a bounded worker pool.
 * One bad record never stops the run; it is counted and reported.
 */

import { GenreCache } from '../resolver/genres.js';
import type { ContentResolver } from '../resolver/resolver.js';
import type { CatalogRepository } from '../db/types.js';
import { ValidationError, errorMessage } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../shared/logger.js';
import { coerceScrapedRecord, type CoerceDefaults } from './records.js';

export interface IngestOptions {
  concurrency?: number;
  defaults?: CoerceDefaults;
  signal?: AbortSignal;
  logger?: Logger;
  onProgress?: (p: IngestProgress) => void;
}

export interface IngestProgress {
  done: number;
  total: number;
  created: number;
  errored: number;
}

export interface IngestError {
  index: number;
  sourceId?: string;
  error: string;
}

export interface IngestResult {
  total: number;
  created: number;    // new canonical items
  matched: number;    // linked to an existing item
  linked: number;     // new source mappings
  relinked: number;   // existing source mappings refreshed
  skipped: number;    // failed validation
  errored: number;    // failed in the store
  cancelled: number;  // never started because the run was aborted
  errors: IngestError[];
  durationSec: number;
}

async function runPool(tasks: (() => Promise<void>)[], concurrency: number, signal?: AbortSignal): Promise<void> {
  let idx = 0;

  async function worker(): Promise<void> {
    while (idx < tasks.length && !signal?.aborted) {
      const myIdx = idx++;
      await tasks[myIdx]();
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, tasks.length) }, worker);
  await Promise.all(workers);
}

export const DEFAULT_CONCURRENCY = 4;

export async function runIngestion(
  records: readonly unknown[],
  resolver: Pick<ContentResolver, 'resolve'>,
  repo: Pick<CatalogRepository, 'getOrCreateGenre'>,
  opts: IngestOptions = {}
): Promise<IngestResult> {
  const logger = opts.logger ?? defaultLogger;
  const concurrency =
    opts.concurrency !== undefined && Number.isInteger(opts.concurrency) && opts.concurrency >= 1
      ? opts.concurrency
      : DEFAULT_CONCURRENCY;
  const genres = new GenreCache(repo);
  const startTime = Date.now();

  const result: IngestResult = {
    total: records.length,
    created: 0,
    matched: 0,
    linked: 0,
    relinked: 0,
    skipped: 0,
    errored: 0,
    cancelled: 0,
    errors: [],
    durationSec: 0,
  };
  let started = 0;
  let done = 0;

  const tasks = records.map((raw, index) => async () => {
    started++;
    let sourceId: string | undefined;
    try {
      const record = coerceScrapedRecord(raw, opts.defaults);
      sourceId = `${record.platform}/${record.sourceId}`;
      const outcome = await resolver.resolve(record, { genres, signal: opts.signal });

      if (outcome.contentCreated) result.created++;
      else result.matched++;
      if (outcome.sourceCreated) result.linked++;
      else result.relinked++;
    } catch (err) {
      if (opts.signal?.aborted) {
        result.cancelled++;
      } else if (err instanceof ValidationError) {
        result.skipped++;
        result.errors.push({ index, sourceId, error: err.message });
        logger.warn(`Skipping record ${index}${sourceId ? ` (${sourceId})` : ''}: ${err.message}`);
      } else {
        result.errored++;
        result.errors.push({ index, sourceId, error: errorMessage(err) });
        logger.error(`Record ${index}${sourceId ? ` (${sourceId})` : ''} failed: ${errorMessage(err)}`);
      }
    } finally {
      done++;
      opts.onProgress?.({ done, total: records.length, created: result.created, errored: result.errored });
    }
  });

  await runPool(tasks, concurrency, opts.signal);

  result.cancelled += records.length - started;
  result.durationSec = (Date.now() - startTime) / 1000;

  logger.info(
    `Ingestion finished: ${result.total} records, ${result.created} created, ${result.matched} matched, ` +
    `${result.linked} linked, ${result.relinked} relinked, ${result.skipped} skipped, ` +
    `${result.errored} errored, ${result.cancelled} cancelled in ${result.durationSec.toFixed(1)}s`
  );
  return result;
}
