import type { ImportResult } from '@root/types/import.types.js'

export type SyncErrorCode =
  | 'MALFORMED_RECORD'
  | 'PERSISTENCE_ERROR'
  | 'FETCH_TRANSIENT'
  | 'TRAKT_API_ERROR'
  | 'IMPORT_PARTIAL_FAILURE'
  | 'SYNC_IN_PROGRESS'

/**
 * Base class of every error raised by the sync pipeline.
 * `statusCode` is what the HTTP error handler answers with.
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: SyncErrorCode,
    public readonly statusCode = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

export type RawRecordKind = 'watch' | 'rating'

/**
 * A fetched record has the wrong shape. Fatal to the run: nothing is committed.
 */
export class MalformedRecordError extends SyncError {
  constructor(
    public readonly kind: RawRecordKind,
    public readonly index: number,
    public readonly field: string,
    reason: string,
  ) {
    super(
      `Malformed ${kind} record at index ${index}: ${field} ${reason}`,
      'MALFORMED_RECORD',
      422,
    )
  }
}

/**
 * The history store could not be read or written.
 */
export class PersistenceError extends SyncError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, 'PERSISTENCE_ERROR', 500, { cause })
  }
}

/**
 * Network, rate-limit or server-side hiccup while fetching. Safe to retry.
 */
export class FetchTransientError extends SyncError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryAfterMs?: number,
    cause?: unknown,
  ) {
    super(message, 'FETCH_TRANSIENT', 502, { cause })
  }
}

/**
 * The tracker answered with a non-retryable error (bad token, missing route).
 */
export class TraktApiError extends SyncError {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message, 'TRAKT_API_ERROR', 502)
  }
}

/**
 * One or more records were rejected by the destination. Reported, never fatal.
 */
export class ImportPartialFailure extends SyncError {
  constructor(
    public readonly failures: readonly ImportResult[],
    public readonly attempted: number,
  ) {
    super(
      `${failures.length} of ${attempted} records failed to import`,
      'IMPORT_PARTIAL_FAILURE',
      207,
    )
  }
}

export class SyncInProgressError extends SyncError {
  constructor() {
    super('A history sync is already running', 'SYNC_IN_PROGRESS', 409)
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError
}

/**
 * Whether the pipeline may retry the failed call.
 */
export function isTransientError(error: unknown): error is FetchTransientError {
  return error instanceof FetchTransientError
}
