/**
 * History Sync Types
 *
 * Shapes shared by the fetcher, reconciliation engine, history store and
 * importers. Timestamps are ISO-8601 UTC strings (`Date#toISOString` form),
 * so lexical order matches chronological order.
 */

/**
 * One watch event as fetched from the remote tracker, before the ratings join.
 */
export interface WatchHistoryRecord {
  externalId: string
  title: string
  year: number
  /** Null when the tracker sent no timestamp; the reconciler rejects it */
  watchedAt: string | null
}

/**
 * One per-title rating on the 0-10 source scale.
 */
export interface RatingRecord {
  externalId: string
  rating: number | null
  ratedAt?: string | null
  /** Descriptive fields, only used by the diagnostic snapshot */
  title?: string
  year?: number
}

/**
 * A single viewing held inside a history entry.
 */
export interface WatchEvent {
  watchedAt: string
  /** Raw 0-10 rating attached when the event was recorded */
  rating: number | null
  /**
   * Only the UTC day is known (history files that stored `YYYY-MM-DD`);
   * `watchedAt` then holds midnight of that day
   */
  dayPrecision?: boolean
}

/**
 * Canonical per-movie record of the merged history.
 * `watches` is kept ascending by `watchedAt` and holds every known viewing.
 */
export interface HistoryEntry {
  externalId: string
  title: string
  year: number
  watches: readonly WatchEvent[]
}

/**
 * Full watch history keyed by external id.
 */
export type MergedHistory = ReadonlyMap<string, HistoryEntry>

/**
 * One watch/rating event, the unit handed to importers.
 */
export interface WatchRecord {
  externalId: string
  title: string
  year: number
  rating: number | null
  watchedAt: string
  isRewatch: boolean
}

/**
 * View over a merged history, derived on demand and never stored.
 */
export interface SyncState {
  previouslyKnownIds: ReadonlySet<string>
  lastSyncAt: string | null
}

export interface ReconcileOptions {
  /** Upper bound of the destination rating scale */
  ratingScaleMax: number
  /** Treat two watches of the same movie on the same UTC day as one event */
  collapseSameDayDuplicates: boolean
}

export interface ReconcileResult {
  updated: MergedHistory
  /** New events ordered oldest first, ratings already on the destination scale */
  newRecords: WatchRecord[]
}

/**
 * Supplies the complete remote history. Both calls enumerate every page
 * before resolving.
 */
export interface HistoryFetcher {
  fetchWatchHistory(): Promise<WatchHistoryRecord[]>
  fetchRatings(): Promise<RatingRecord[]>
}

/**
 * Durable home of the merged history. Assumes a single writer.
 */
export interface HistoryStore {
  load(): Promise<MergedHistory>
  save(updated: MergedHistory): Promise<void>
}

/**
 * Write-only CSV artifacts produced by a sync run
 */
export interface SyncArtifactWriter {
  writeFetchSnapshots(
    watchHistory: readonly WatchHistoryRecord[],
    ratings: readonly RatingRecord[],
  ): Promise<void>
  /** Replace the incremental file with the records of the current run */
  writeIncrementalExport(records: readonly WatchRecord[]): Promise<string>
  /** Replace the list of records the destination rejected */
  writeFailedImports(records: readonly WatchRecord[]): Promise<string>
}
