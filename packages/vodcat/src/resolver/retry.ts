import { TransientStoreError } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../shared/logger.js';

export interface RetryOptions {
  /** Extra attempts after the first one */
  retries: number;
  baseDelayMs: number;
  signal?: AbortSignal;
  logger?: Logger;
  label?: string;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Run fn, retrying only TransientStoreError with exponential backoff
 * (base, 2×base, 4×base…). The signal is checked before every attempt.
 */
export async function withRetry<T>(fn: () => T | Promise<T>, opts: RetryOptions): Promise<T> {
  const logger = opts.logger ?? defaultLogger;
  const label = opts.label ?? 'store operation';

  for (let attempt = 0; ; attempt++) {
    opts.signal?.throwIfAborted();
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransientStoreError) || attempt >= opts.retries) throw err;

      const delay = opts.baseDelayMs * Math.pow(2, attempt);
      logger.warn(
        `${label} hit ${err.code}; retrying (${attempt + 1}/${opts.retries}) after ${delay}ms`
      );
      await sleep(delay);
    }
  }
}
