import { z } from 'zod'

/** Column order of the history file and the incremental export */
export const HISTORY_COLUMNS = [
  'Title',
  'Year',
  'Rating10',
  'Rewatch',
  'ExternalID',
  'WatchedDate',
] as const

export const WATCHED_SNAPSHOT_COLUMNS = [
  'Title',
  'Year',
  'ExternalID',
  'WatchedDate',
] as const

export const RATINGS_SNAPSHOT_COLUMNS = [
  'Title',
  'Year',
  'ExternalID',
  'Rating10',
  'RatingDate',
] as const

/** Columns understood by the Letterboxd diary importer */
export const LETTERBOXD_IMPORT_COLUMNS = [
  'Title',
  'Year',
  'Rating',
  'Rewatch',
  'imdbID',
  'WatchedDate',
] as const

export type HistoryCsvRow = Record<(typeof HISTORY_COLUMNS)[number], string>

/**
 * One row of the persisted history. Files written before the ExternalID
 * column existed name it `imdbID`; both are accepted.
 */
export const HistoryCsvRowSchema = z
  .object({
    Title: z.string().default(''),
    Year: z.string().default(''),
    Rating10: z.string().default(''),
    Rewatch: z.string().default(''),
    ExternalID: z.string().optional(),
    imdbID: z.string().optional(),
    WatchedDate: z.string().min(1, 'WatchedDate is required'),
  })
  .transform(({ imdbID, ExternalID, ...row }) => ({
    ...row,
    ExternalID: ExternalID || imdbID || '',
  }))
  .refine((row) => row.ExternalID !== '', {
    message: 'ExternalID is required',
    path: ['ExternalID'],
  })

export const HistoryCsvSchema = z.array(HistoryCsvRowSchema)
