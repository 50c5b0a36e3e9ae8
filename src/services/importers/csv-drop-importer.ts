/**
 * CSV Drop Importer
 *
 * Writes the new records as a Letterboxd diary import file into a drop
 * directory, one timestamped file per run, for a manual or external upload.
 */

import { join } from 'node:path'
import type { WatchRecord } from '@root/types/history.types.js'
import type { ImportAdapter, ImportResult } from '@root/types/import.types.js'
import { serializeLetterboxdImport } from '@services/history-store/index.js'
import { writeFileAtomic } from '@utils/atomic-write.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * `letterboxd-import-20240102T030405Z.csv` for 2024-01-02T03:04:05.678Z
 */
export function dropFileName(now: Date): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '')
  return `letterboxd-import-${stamp}.csv`
}

export class CsvDropImporter implements ImportAdapter {
  readonly name = 'csv'

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'CSV_IMPORT')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly dropDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async importRecords(records: readonly WatchRecord[]): Promise<ImportResult[]> {
    if (records.length === 0) {
      return []
    }

    const path = join(this.dropDir, dropFileName(this.now()))
    try {
      await writeFileAtomic(path, serializeLetterboxdImport(records))
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err)
      this.log.error({ path, error }, 'Unable to write import file')
      return records.map((record) => ({
        externalId: record.externalId,
        watchedAt: record.watchedAt,
        success: false,
        error,
      }))
    }

    this.log.info(`Wrote ${records.length} records to ${path}`)
    return records.map((record) => ({
      externalId: record.externalId,
      watchedAt: record.watchedAt,
      success: true,
    }))
  }
}
