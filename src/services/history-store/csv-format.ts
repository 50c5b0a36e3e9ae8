/**
 * CSV Format
 *
 * Conversions between history values and the rows of the CSV artifacts.
 */

import type {
  HistoryEntry,
  MergedHistory,
  RatingRecord,
  WatchEvent,
  WatchHistoryRecord,
  WatchRecord,
} from '@root/types/history.types.js'
import {
  HISTORY_COLUMNS,
  type HistoryCsvRow,
  HistoryCsvSchema,
  LETTERBOXD_IMPORT_COLUMNS,
  RATINGS_SNAPSHOT_COLUMNS,
  WATCHED_SNAPSHOT_COLUMNS,
} from '@schemas/history/history-csv.schema.js'
import {
  compareWatchRecords,
  dedupeWatches,
  normalizeTimestamp,
  SOURCE_RATING_MAX,
  toCalendarDay,
  toWatchRecords,
} from '@services/history-sync/index.js'
import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'

/**
 * A history file could not be turned back into a history
 */
export class HistoryFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'HistoryFormatError'
  }
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/

function formatRating(rating: number | null): string {
  return rating === null ? '' : String(rating)
}

function toHistoryRow(
  record: WatchRecord,
  watchedDate: string = record.watchedAt,
): HistoryCsvRow {
  return {
    Title: record.title,
    Year: String(record.year),
    Rating10: formatRating(record.rating),
    Rewatch: String(record.isRewatch),
    ExternalID: record.externalId,
    WatchedDate: watchedDate,
  }
}

/**
 * Serialize the merged history, one row per known viewing, oldest first.
 */
export function serializeHistory(history: MergedHistory): string {
  const rows = [...history.values()]
    .flatMap((entry) =>
      toWatchRecords(entry).map((record, index) => ({
        record,
        // Day-precision viewings keep their date-only form
        watchedDate: entry.watches[index]?.dayPrecision
          ? toCalendarDay(record.watchedAt)
          : record.watchedAt,
      })),
    )
    .sort((a, b) => compareWatchRecords(a.record, b.record))

  return stringify(
    rows.map(({ record, watchedDate }) => toHistoryRow(record, watchedDate)),
    { header: true, columns: [...HISTORY_COLUMNS] },
  )
}

function parseRating(value: string, line: number): number | null {
  if (value.trim() === '') {
    return null
  }
  const rating = Number(value)
  if (!Number.isInteger(rating) || rating < 0 || rating > SOURCE_RATING_MAX) {
    throw new HistoryFormatError(
      `Row ${line}: Rating10 "${value}" is not an integer between 0 and ${SOURCE_RATING_MAX}`,
    )
  }
  return rating
}

/**
 * Parse a history file back into entries. The Rewatch column is ignored:
 * rewatch status is derived from the watch list.
 *
 * @throws {HistoryFormatError} When a row lacks its id or date, or carries an
 * unreadable value
 */
export function parseHistory(content: string): Map<string, HistoryEntry> {
  const rawRows: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
    trim: true,
  })
  const result = HistoryCsvSchema.safeParse(rawRows)
  if (!result.success) {
    const issue = result.error.issues[0]
    const row = typeof issue?.path[0] === 'number' ? issue.path[0] + 2 : '?'
    throw new HistoryFormatError(
      `Row ${row}: ${issue?.message ?? 'invalid history row'}`,
    )
  }

  const grouped = new Map<
    string,
    { title: string; year: number; latest: string; watches: WatchEvent[] }
  >()

  result.data.forEach((row, index) => {
    // +2: header line and 1-based numbering
    const line = index + 2
    const watchedAt = normalizeTimestamp(row.WatchedDate)
    if (!watchedAt) {
      throw new HistoryFormatError(
        `Row ${line}: WatchedDate "${row.WatchedDate}" is not a valid date`,
      )
    }
    const event: WatchEvent = {
      watchedAt,
      rating: parseRating(row.Rating10, line),
      ...(DATE_ONLY.test(row.WatchedDate) ? { dayPrecision: true } : {}),
    }
    const year = Number.parseInt(row.Year, 10) || 0

    const group = grouped.get(row.ExternalID)
    if (!group) {
      grouped.set(row.ExternalID, {
        title: row.Title,
        year,
        latest: watchedAt,
        watches: [event],
      })
      return
    }
    group.watches.push(event)
    if (watchedAt >= group.latest) {
      group.title = row.Title
      group.year = year
      group.latest = watchedAt
    }
  })

  const history = new Map<string, HistoryEntry>()
  for (const [externalId, group] of grouped) {
    history.set(externalId, {
      externalId,
      title: group.title,
      year: group.year,
      watches: dedupeWatches(externalId, group.watches, {
        collapseSameDayDuplicates: false,
      }),
    })
  }
  return history
}

/**
 * Incremental export: same columns as the history, dates as `YYYY-MM-DD`.
 * Ratings are written as given, i.e. already converted by the reconciler.
 */
export function serializeIncrementalExport(
  records: readonly WatchRecord[],
): string {
  return stringify(
    records.map((record) =>
      toHistoryRow(record, toCalendarDay(record.watchedAt)),
    ),
    { header: true, columns: [...HISTORY_COLUMNS] },
  )
}

/**
 * Rows in the layout the Letterboxd diary importer reads
 */
export function serializeLetterboxdImport(
  records: readonly WatchRecord[],
): string {
  return stringify(
    records.map((record) => ({
      Title: record.title,
      Year: String(record.year),
      Rating: formatRating(record.rating),
      Rewatch: String(record.isRewatch),
      imdbID: record.externalId,
      WatchedDate: toCalendarDay(record.watchedAt),
    })),
    { header: true, columns: [...LETTERBOXD_IMPORT_COLUMNS] },
  )
}

export function serializeWatchedSnapshot(
  records: readonly WatchHistoryRecord[],
): string {
  return stringify(
    records.map((record) => ({
      Title: record.title,
      Year: String(record.year),
      ExternalID: record.externalId,
      WatchedDate: record.watchedAt ?? '',
    })),
    { header: true, columns: [...WATCHED_SNAPSHOT_COLUMNS] },
  )
}

export function serializeRatingsSnapshot(
  records: readonly RatingRecord[],
): string {
  return stringify(
    records.map((record) => ({
      Title: record.title ?? '',
      Year: record.year === undefined ? '' : String(record.year),
      ExternalID: record.externalId,
      Rating10: formatRating(record.rating),
      RatingDate: record.ratedAt ?? '',
    })),
    { header: true, columns: [...RATINGS_SNAPSHOT_COLUMNS] },
  )
}
