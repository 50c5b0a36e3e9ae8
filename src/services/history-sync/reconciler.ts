/**
 * Reconciler Module
 *
 * Joins fetched ratings with fetched watch history, merges the result into
 * the previous history and decides which viewings still need importing.
 * The previous history is an explicit argument and is never mutated; any
 * failure leaves it exactly as the caller handed it in.
 */

import type {
  HistoryEntry,
  MergedHistory,
  RatingRecord,
  ReconcileOptions,
  ReconcileResult,
  WatchEvent,
  WatchHistoryRecord,
  WatchRecord,
} from '@root/types/history.types.js'
import { MalformedRecordError } from '@utils/errors.js'
import { convertOptionalRating, SOURCE_RATING_MAX } from './rating-converter.js'
import {
  compareWatchRecords,
  type DedupOptions,
  dedupeWatches,
  deriveSyncState,
  isRewatchOf,
  lastWatch,
  mergeEntries,
  normalizeTimestamp,
  resolveDayPrecision,
  watchKey,
} from './record-model.js'

function requireExternalId(
  value: unknown,
  kind: 'watch' | 'rating',
  index: number,
): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new MalformedRecordError(kind, index, 'externalId', 'is missing')
  }
  return value.trim()
}

function requireWatchedAt(value: unknown, index: number): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new MalformedRecordError('watch', index, 'watchedAt', 'is missing')
  }
  const normalized = normalizeTimestamp(value)
  if (!normalized) {
    throw new MalformedRecordError(
      'watch',
      index,
      'watchedAt',
      `is not a valid timestamp (${value})`,
    )
  }
  return normalized
}

function validateRating(value: unknown, index: number): number | null {
  if (value === null || value === undefined) {
    return null
  }
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < 0 ||
    value > SOURCE_RATING_MAX
  ) {
    throw new MalformedRecordError(
      'rating',
      index,
      'rating',
      `must be an integer between 0 and ${SOURCE_RATING_MAX}`,
    )
  }
  return value
}

/**
 * Index ratings by external id. Ratings are per title; when one id appears
 * more than once the latest `ratedAt` wins, input order breaking ties.
 */
export function indexRatings(
  rawRatings: readonly RatingRecord[],
): Map<string, number | null> {
  const latest = new Map<string, { rating: number | null; ratedAt: string }>()

  rawRatings.forEach((record, index) => {
    const externalId = requireExternalId(record.externalId, 'rating', index)
    const rating = validateRating(record.rating, index)
    const ratedAt = record.ratedAt ? (normalizeTimestamp(record.ratedAt) ?? '') : ''
    const known = latest.get(externalId)
    if (!known || ratedAt >= known.ratedAt) {
      latest.set(externalId, { rating, ratedAt })
    }
  })

  return new Map([...latest].map(([id, { rating }]) => [id, rating]))
}

/**
 * Join watch events with ratings and group them into one entry per movie,
 * viewings ascending and de-duplicated. Title and year come from the most
 * recent viewing.
 */
export function groupWatchHistory(
  rawWatchHistory: readonly WatchHistoryRecord[],
  ratings: ReadonlyMap<string, number | null>,
  options: DedupOptions,
): Map<string, HistoryEntry> {
  const grouped = new Map<
    string,
    { events: WatchEvent[]; latest: WatchHistoryRecord; latestAt: string }
  >()

  rawWatchHistory.forEach((record, index) => {
    const externalId = requireExternalId(record.externalId, 'watch', index)
    const watchedAt = requireWatchedAt(record.watchedAt, index)
    const event: WatchEvent = {
      watchedAt,
      rating: ratings.get(externalId) ?? null,
    }

    const group = grouped.get(externalId)
    if (!group) {
      grouped.set(externalId, {
        events: [event],
        latest: record,
        latestAt: watchedAt,
      })
      return
    }
    group.events.push(event)
    if (watchedAt > group.latestAt) {
      group.latest = record
      group.latestAt = watchedAt
    }
  })

  const entries = new Map<string, HistoryEntry>()
  for (const [externalId, { events, latest }] of grouped) {
    entries.set(externalId, {
      externalId,
      title: latest.title,
      year: latest.year,
      watches: dedupeWatches(externalId, events, options),
    })
  }
  return entries
}

/**
 * Viewings of `incoming` that still need importing: all of them for an
 * unknown movie, otherwise only those newer than the last known viewing
 * whose key is not already known.
 */
export function selectNewWatches(
  existing: HistoryEntry | undefined,
  incoming: HistoryEntry,
  options: DedupOptions,
): readonly WatchEvent[] {
  if (!existing) {
    return incoming.watches
  }

  const knownKeys = new Set(
    existing.watches.map((event) =>
      watchKey(existing.externalId, event.watchedAt, options),
    ),
  )
  const lastKnown = lastWatch(existing).watchedAt

  return incoming.watches.filter(
    (event) =>
      event.watchedAt > lastKnown &&
      !knownKeys.has(watchKey(incoming.externalId, event.watchedAt, options)),
  )
}

/**
 * Reconcile a fresh fetch against the previous history.
 *
 * @param previous - History as loaded from the store; left untouched
 * @param rawWatchHistory - Every fetched viewing
 * @param rawRatings - Every fetched per-title rating on the 0-10 scale
 * @returns The updated history (raw ratings) and the new records, oldest
 * first, with ratings converted to the destination scale
 * @throws {MalformedRecordError} When a fetched record lacks its id or
 * timestamp, or carries an out-of-range rating
 */
export function reconcile(
  previous: MergedHistory,
  rawWatchHistory: readonly WatchHistoryRecord[],
  rawRatings: readonly RatingRecord[],
  options: ReconcileOptions,
): ReconcileResult {
  const ratings = indexRatings(rawRatings)
  const fetched = groupWatchHistory(rawWatchHistory, ratings, options)

  const { previouslyKnownIds } = deriveSyncState(previous)
  const updated = new Map(previous)
  const newRecords: WatchRecord[] = []

  for (const [externalId, incoming] of fetched) {
    const stored = previouslyKnownIds.has(externalId)
      ? previous.get(externalId)
      : undefined
    // Date-only viewings from older history files match by UTC day
    const existing = stored && resolveDayPrecision(stored, incoming, options)
    const merged = mergeEntries(existing, incoming, options)
    updated.set(externalId, merged)

    for (const event of selectNewWatches(existing, incoming, options)) {
      newRecords.push({
        externalId,
        title: incoming.title,
        year: incoming.year,
        rating: convertOptionalRating(event.rating, options.ratingScaleMax),
        watchedAt: event.watchedAt,
        isRewatch: isRewatchOf(merged, event.watchedAt),
      })
    }
  }

  newRecords.sort(compareWatchRecords)

  return { updated, newRecords }
}
