/**
 * Record Model
 *
 * Identity, ordering, de-duplication and merge rules for watch records.
 * Everything here is pure: inputs are never mutated, new values are returned.
 */

import type {
  HistoryEntry,
  MergedHistory,
  SyncState,
  WatchEvent,
  WatchRecord,
} from '@root/types/history.types.js'

export interface DedupOptions {
  collapseSameDayDuplicates: boolean
}

/**
 * Parse a timestamp into canonical ISO-8601 UTC form.
 *
 * @returns The normalized timestamp, or null when the value is not a date
 */
export function normalizeTimestamp(value: string): string | null {
  const parsed = new Date(value)
  if (Number.isNaN(parsed.getTime())) {
    return null
  }
  return parsed.toISOString()
}

/**
 * UTC calendar day (`YYYY-MM-DD`) of a normalized timestamp
 */
export function toCalendarDay(watchedAt: string): string {
  return watchedAt.slice(0, 10)
}

/**
 * De-duplication key of one viewing: the exact timestamp, or its UTC day when
 * same-day duplicates collapse.
 */
export function watchKey(
  externalId: string,
  watchedAt: string,
  options: DedupOptions,
): string {
  const instant = options.collapseSameDayDuplicates
    ? toCalendarDay(watchedAt)
    : watchedAt
  return `${externalId}|${instant}`
}

/**
 * Two records describe the same movie when their external ids match,
 * whatever their other metadata says.
 */
export function sameMovie(
  a: Pick<WatchRecord, 'externalId'>,
  b: Pick<WatchRecord, 'externalId'>,
): boolean {
  return a.externalId === b.externalId
}

/**
 * Oldest first; ties broken by external id so the order is deterministic.
 */
export function compareWatchRecords(
  a: Pick<WatchRecord, 'externalId' | 'watchedAt'>,
  b: Pick<WatchRecord, 'externalId' | 'watchedAt'>,
): number {
  if (a.watchedAt !== b.watchedAt) {
    return a.watchedAt < b.watchedAt ? -1 : 1
  }
  if (a.externalId === b.externalId) {
    return 0
  }
  return a.externalId < b.externalId ? -1 : 1
}

function compareWatchEvents(a: WatchEvent, b: WatchEvent): number {
  if (a.watchedAt === b.watchedAt) return 0
  return a.watchedAt < b.watchedAt ? -1 : 1
}

/**
 * Sort viewings ascending and drop the ones sharing a key with an earlier one.
 */
export function dedupeWatches(
  externalId: string,
  watches: readonly WatchEvent[],
  options: DedupOptions,
): WatchEvent[] {
  const seen = new Set<string>()
  const result: WatchEvent[] = []
  for (const event of [...watches].sort(compareWatchEvents)) {
    const key = watchKey(externalId, event.watchedAt, options)
    if (seen.has(key)) continue
    seen.add(key)
    result.push(event)
  }
  return result
}

export function firstWatch(entry: HistoryEntry): WatchEvent {
  const first = entry.watches[0]
  if (!first) {
    throw new Error(`History entry ${entry.externalId} has no watches`)
  }
  return first
}

export function lastWatch(entry: HistoryEntry): WatchEvent {
  const last = entry.watches[entry.watches.length - 1]
  if (!last) {
    throw new Error(`History entry ${entry.externalId} has no watches`)
  }
  return last
}

/**
 * A viewing is a rewatch unless it is the earliest one known for the movie.
 */
export function isRewatchOf(entry: HistoryEntry, watchedAt: string): boolean {
  return watchedAt > firstWatch(entry).watchedAt
}

/**
 * Most recent non-empty rating of the movie
 */
export function currentRating(entry: HistoryEntry): number | null {
  for (let i = entry.watches.length - 1; i >= 0; i--) {
    const rating = entry.watches[i]?.rating
    if (rating !== null && rating !== undefined) {
      return rating
    }
  }
  return null
}

/**
 * Replace stored day-precision viewings with the exact fetched viewing of the
 * same UTC day, earliest first, so a date-only row and the tracker's
 * timestamp for it count as one viewing. The stored rating is kept; days the
 * fetch does not mention stay day-precision.
 */
export function resolveDayPrecision(
  existing: HistoryEntry,
  incoming: HistoryEntry,
  options: DedupOptions,
): HistoryEntry {
  if (!existing.watches.some((event) => event.dayPrecision)) {
    return existing
  }

  const exactKeys = new Set(
    existing.watches
      .filter((event) => !event.dayPrecision)
      .map((event) => watchKey(existing.externalId, event.watchedAt, options)),
  )
  const candidatesByDay = new Map<string, WatchEvent[]>()
  for (const event of [...incoming.watches].sort(compareWatchEvents)) {
    if (exactKeys.has(watchKey(existing.externalId, event.watchedAt, options))) {
      continue
    }
    const day = toCalendarDay(event.watchedAt)
    candidatesByDay.set(day, [...(candidatesByDay.get(day) ?? []), event])
  }

  const watches = existing.watches.map((event): WatchEvent => {
    if (!event.dayPrecision) return event
    const match = candidatesByDay.get(toCalendarDay(event.watchedAt))?.shift()
    if (!match) return event
    return { watchedAt: match.watchedAt, rating: event.rating ?? match.rating }
  })

  return {
    ...existing,
    watches: dedupeWatches(existing.externalId, watches, options),
  }
}

/**
 * Merge a freshly fetched entry into the known one.
 *
 * The result holds the union of both watch lists. When both sides know the
 * same viewing, the stored one survives and only takes the incoming rating if
 * it has one. Title and year come from whichever side saw the latest viewing,
 * the incoming side winning ties.
 */
export function mergeEntries(
  existing: HistoryEntry | undefined,
  incoming: HistoryEntry,
  options: DedupOptions,
): HistoryEntry {
  if (!existing) {
    return {
      ...incoming,
      watches: dedupeWatches(incoming.externalId, incoming.watches, options),
    }
  }

  const { externalId } = existing
  const byKey = new Map<string, WatchEvent>()
  for (const event of dedupeWatches(externalId, existing.watches, options)) {
    byKey.set(watchKey(externalId, event.watchedAt, options), event)
  }
  for (const event of dedupeWatches(externalId, incoming.watches, options)) {
    const key = watchKey(externalId, event.watchedAt, options)
    const known = byKey.get(key)
    if (!known) {
      byKey.set(key, event)
    } else if (event.rating !== null && event.rating !== known.rating) {
      byKey.set(key, { ...known, rating: event.rating })
    }
  }

  const incomingIsCurrent =
    lastWatch(incoming).watchedAt >= lastWatch(existing).watchedAt
  const current = incomingIsCurrent ? incoming : existing

  return {
    externalId,
    title: current.title,
    year: current.year,
    watches: [...byKey.values()].sort(compareWatchEvents),
  }
}

/**
 * Expand an entry into one record per viewing, rewatch flags derived from
 * the full watch list and ratings left on the source scale.
 */
export function toWatchRecords(entry: HistoryEntry): WatchRecord[] {
  return entry.watches.map((event) => ({
    externalId: entry.externalId,
    title: entry.title,
    year: entry.year,
    rating: event.rating,
    watchedAt: event.watchedAt,
    isRewatch: isRewatchOf(entry, event.watchedAt),
  }))
}

/**
 * Known ids and the latest known viewing, computed from the history itself.
 * The reconciler takes its known-id check from here.
 */
export function deriveSyncState(history: MergedHistory): SyncState {
  let lastSyncAt: string | null = null
  for (const entry of history.values()) {
    const { watchedAt } = lastWatch(entry)
    if (lastSyncAt === null || watchedAt > lastSyncAt) {
      lastSyncAt = watchedAt
    }
  }
  return {
    previouslyKnownIds: new Set(history.keys()),
    lastSyncAt,
  }
}
