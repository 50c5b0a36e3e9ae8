import type { HistoryEntry } from '@root/types/history.types.js'
import {
  compareWatchRecords,
  currentRating,
  dedupeWatches,
  deriveSyncState,
  isRewatchOf,
  mergeEntries,
  normalizeTimestamp,
  sameMovie,
  toWatchRecords,
  watchKey,
} from '@services/history-sync/record-model.js'
import { describe, expect, it } from 'vitest'

const exact = { collapseSameDayDuplicates: false }
const collapse = { collapseSameDayDuplicates: true }

function entry(
  externalId: string,
  watches: Array<[string, number | null]>,
  title = `Movie ${externalId}`,
  year = 2000,
): HistoryEntry {
  return {
    externalId,
    title,
    year,
    watches: watches.map(([watchedAt, rating]) => ({ watchedAt, rating })),
  }
}

describe('record-model', () => {
  describe('normalizeTimestamp', () => {
    it('normalizes an offset timestamp to UTC', () => {
      expect(normalizeTimestamp('2024-01-01T02:00:00+02:00')).toBe(
        '2024-01-01T00:00:00.000Z',
      )
    })

    it('reads a bare date as UTC midnight', () => {
      expect(normalizeTimestamp('2024-06-01')).toBe('2024-06-01T00:00:00.000Z')
    })

    it('returns null for something that is not a date', () => {
      expect(normalizeTimestamp('yesterday-ish')).toBeNull()
    })
  })

  describe('watchKey', () => {
    it('uses the exact instant by default', () => {
      expect(watchKey('tt1', '2024-01-01T20:00:00.000Z', exact)).toBe(
        'tt1|2024-01-01T20:00:00.000Z',
      )
    })

    it('uses the UTC day when same-day duplicates collapse', () => {
      expect(watchKey('tt1', '2024-01-01T20:00:00.000Z', collapse)).toBe(
        'tt1|2024-01-01',
      )
    })
  })

  it('treats records with the same external id as the same movie', () => {
    expect(sameMovie({ externalId: 'tt1' }, { externalId: 'tt1' })).toBe(true)
    expect(sameMovie({ externalId: 'tt1' }, { externalId: 'tt2' })).toBe(false)
  })

  it('orders records by time, then by id', () => {
    const records = [
      { externalId: 'tt2', watchedAt: '2024-01-02T00:00:00.000Z' },
      { externalId: 'tt3', watchedAt: '2024-01-01T00:00:00.000Z' },
      { externalId: 'tt1', watchedAt: '2024-01-02T00:00:00.000Z' },
    ]
    expect(
      [...records].sort(compareWatchRecords).map((r) => r.externalId),
    ).toEqual(['tt3', 'tt1', 'tt2'])
  })

  describe('dedupeWatches', () => {
    const sameDay = [
      { watchedAt: '2024-01-01T21:00:00.000Z', rating: null },
      { watchedAt: '2024-01-01T09:00:00.000Z', rating: 6 },
      { watchedAt: '2024-01-01T09:00:00.000Z', rating: 6 },
    ]

    it('drops exact duplicates and sorts ascending', () => {
      expect(dedupeWatches('tt1', sameDay, exact)).toEqual([
        { watchedAt: '2024-01-01T09:00:00.000Z', rating: 6 },
        { watchedAt: '2024-01-01T21:00:00.000Z', rating: null },
      ])
    })

    it('keeps only the earliest viewing of a day when collapsing', () => {
      expect(dedupeWatches('tt1', sameDay, collapse)).toEqual([
        { watchedAt: '2024-01-01T09:00:00.000Z', rating: 6 },
      ])
    })
  })

  it('derives rewatch status from the full watch list', () => {
    const movie = entry('tt1', [
      ['2024-01-01T00:00:00.000Z', 8],
      ['2024-06-01T00:00:00.000Z', 8],
    ])
    expect(isRewatchOf(movie, '2024-01-01T00:00:00.000Z')).toBe(false)
    expect(isRewatchOf(movie, '2024-06-01T00:00:00.000Z')).toBe(true)
    expect(toWatchRecords(movie).map((r) => r.isRewatch)).toEqual([false, true])
  })

  it('reports the latest non-empty rating as current', () => {
    const movie = entry('tt1', [
      ['2024-01-01T00:00:00.000Z', 6],
      ['2024-03-01T00:00:00.000Z', 9],
      ['2024-06-01T00:00:00.000Z', null],
    ])
    expect(currentRating(movie)).toBe(9)
    expect(currentRating(entry('tt2', [['2024-01-01T00:00:00.000Z', null]]))).toBeNull()
  })

  describe('mergeEntries', () => {
    it('returns the incoming entry for an unknown movie', () => {
      const incoming = entry('tt1', [['2024-01-01T00:00:00.000Z', 8]])
      expect(mergeEntries(undefined, incoming, exact)).toEqual(incoming)
    })

    it('keeps the union of both watch lists', () => {
      const existing = entry('tt1', [['2023-01-01T00:00:00.000Z', 6]])
      const incoming = entry('tt1', [['2024-01-01T00:00:00.000Z', 8]])
      expect(mergeEntries(existing, incoming, exact).watches).toEqual([
        { watchedAt: '2023-01-01T00:00:00.000Z', rating: 6 },
        { watchedAt: '2024-01-01T00:00:00.000Z', rating: 8 },
      ])
    })

    it('lets a known viewing take a new rating but not lose one', () => {
      const existing = entry('tt1', [
        ['2024-01-01T00:00:00.000Z', 6],
        ['2024-02-01T00:00:00.000Z', 7],
      ])
      const incoming = entry('tt1', [
        ['2024-01-01T00:00:00.000Z', 9],
        ['2024-02-01T00:00:00.000Z', null],
      ])
      expect(mergeEntries(existing, incoming, exact).watches).toEqual([
        { watchedAt: '2024-01-01T00:00:00.000Z', rating: 9 },
        { watchedAt: '2024-02-01T00:00:00.000Z', rating: 7 },
      ])
    })

    it('takes title and year from the side with the latest viewing', () => {
      const existing = entry('tt1', [['2024-06-01T00:00:00.000Z', null]], 'Stored', 1999)
      const stale = entry('tt1', [['2024-01-01T00:00:00.000Z', null]], 'Older', 1998)
      const fresh = entry('tt1', [['2024-06-01T00:00:00.000Z', null]], 'Renamed', 2000)

      expect(mergeEntries(existing, stale, exact)).toMatchObject({ title: 'Stored', year: 1999 })
      expect(mergeEntries(existing, fresh, exact)).toMatchObject({ title: 'Renamed', year: 2000 })
    })

    it('keeps the stored viewing when a same-day copy arrives under collapse', () => {
      const existing = entry('tt1', [['2024-01-01T20:00:00.000Z', 8]])
      const incoming = entry('tt1', [['2024-01-01T08:00:00.000Z', null]])
      expect(mergeEntries(existing, incoming, collapse).watches).toEqual([
        { watchedAt: '2024-01-01T20:00:00.000Z', rating: 8 },
      ])
    })

    it('does not mutate its inputs', () => {
      const existing = entry('tt1', [['2023-01-01T00:00:00.000Z', 6]])
      const incoming = entry('tt1', [['2024-01-01T00:00:00.000Z', 8]])
      const before = structuredClone(existing)
      mergeEntries(existing, incoming, exact)
      expect(existing).toEqual(before)
    })
  })

  it('derives known ids and the last viewing from a history', () => {
    const history = new Map([
      ['tt1', entry('tt1', [['2024-01-01T00:00:00.000Z', null]])],
      ['tt2', entry('tt2', [['2024-03-01T00:00:00.000Z', null]])],
    ])
    const state = deriveSyncState(history)
    expect([...state.previouslyKnownIds]).toEqual(['tt1', 'tt2'])
    expect(state.lastSyncAt).toBe('2024-03-01T00:00:00.000Z')
    expect(deriveSyncState(new Map()).lastSyncAt).toBeNull()
  })
})
