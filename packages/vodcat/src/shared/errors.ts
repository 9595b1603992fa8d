/**
 * Error taxonomy for resolution.
 * Cache failures never leave MatchCache; conflicts and transient store errors
 * reach the caller only once their retries are used up.
 */

export class ValidationError extends Error {
  constructor(message: string, public field: string) {
    super(message);
    this.name = 'ValidationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Busy/locked/timeout against the catalog store: safe to retry */
export class TransientStoreError extends Error {
  constructor(message: string, public code: string, public originalError?: unknown) {
    super(message);
    this.name = 'TransientStoreError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** A unique constraint rejected an insert: another writer got there first */
export class UniquenessConflictError extends Error {
  constructor(message: string, public table: string, public originalError?: unknown) {
    super(message);
    this.name = 'UniquenessConflictError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class CacheError extends Error {
  constructor(message: string, public operation: 'get' | 'set' | 'del', public originalError?: unknown) {
    super(message);
    this.name = 'CacheError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
