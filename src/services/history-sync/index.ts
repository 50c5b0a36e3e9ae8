/**
 * History Sync Module
 *
 * Pure reconciliation core plus the fetch retry policy used by the pipeline.
 */

export {
  computeRetryDelay,
  type FetchRetryOptions,
  withFetchRetry,
} from './fetch-retry.js'
export {
  convertOptionalRating,
  convertRating,
  DEFAULT_RATING_SCALE_MAX,
  SOURCE_RATING_MAX,
} from './rating-converter.js'
export {
  groupWatchHistory,
  indexRatings,
  reconcile,
  selectNewWatches,
} from './reconciler.js'
export {
  compareWatchRecords,
  currentRating,
  type DedupOptions,
  dedupeWatches,
  deriveSyncState,
  firstWatch,
  isRewatchOf,
  lastWatch,
  mergeEntries,
  normalizeTimestamp,
  resolveDayPrecision,
  sameMovie,
  toCalendarDay,
  toWatchRecords,
  watchKey,
} from './record-model.js'
