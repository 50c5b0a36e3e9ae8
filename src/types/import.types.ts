import type { WatchRecord } from './history.types.js'

export type ImportMode = 'csv' | 'webhook'

/**
 * Outcome of importing one record on the destination side
 */
export interface ImportResult {
  externalId: string
  watchedAt: string
  success: boolean
  error?: string
}

/**
 * Destination-side import boundary. Does not need to be all-or-nothing:
 * every record gets its own result.
 */
export interface ImportAdapter {
  readonly name: string
  importRecords(records: readonly WatchRecord[]): Promise<ImportResult[]>
}
