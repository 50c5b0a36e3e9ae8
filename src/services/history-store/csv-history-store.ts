/**
 * CSV History Store
 *
 * Keeps the merged history in `merged.csv` and writes the per-run artifacts
 * (`export.csv`, `failed-import.csv`, `ratings.csv`, `watched.csv`) next to it.
 * Every write replaces its file atomically. One writer at a time is assumed:
 * two overlapping runs would each save over the other's progress.
 */

import { constants } from 'node:fs'
import { access, mkdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import type {
  HistoryStore,
  MergedHistory,
  RatingRecord,
  SyncArtifactWriter,
  WatchHistoryRecord,
  WatchRecord,
} from '@root/types/history.types.js'
import { writeFileAtomic } from '@utils/atomic-write.js'
import { PersistenceError } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  parseHistory,
  serializeHistory,
  serializeIncrementalExport,
  serializeRatingsSnapshot,
  serializeWatchedSnapshot,
} from './csv-format.js'

export const HISTORY_FILE = 'merged.csv'
export const EXPORT_FILE = 'export.csv'
export const FAILED_IMPORT_FILE = 'failed-import.csv'
export const RATINGS_SNAPSHOT_FILE = 'ratings.csv'
export const WATCHED_SNAPSHOT_FILE = 'watched.csv'

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class CsvHistoryStore implements HistoryStore, SyncArtifactWriter {
  /** Creates a fresh service logger that inherits current log level */
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'HISTORY_STORE')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly csvDir: string,
  ) {}

  get historyPath(): string {
    return join(this.csvDir, HISTORY_FILE)
  }

  /**
   * Load the merged history. A missing file is a first run, not an error.
   *
   * @throws {PersistenceError} When the file exists but cannot be read or parsed
   */
  async load(): Promise<MergedHistory> {
    let content: string
    try {
      content = await readFile(this.historyPath, 'utf-8')
    } catch (error) {
      if (isMissingFileError(error)) {
        this.log.info(
          `No previous history at ${this.historyPath}, starting from an empty history`,
        )
        return new Map()
      }
      throw new PersistenceError(
        `Unable to read history file ${this.historyPath}`,
        this.historyPath,
        error,
      )
    }

    try {
      const history = parseHistory(content)
      this.log.debug(`Loaded ${history.size} movies from ${this.historyPath}`)
      return history
    } catch (error) {
      throw new PersistenceError(
        `History file ${this.historyPath} is corrupt: ${error instanceof Error ? error.message : String(error)}`,
        this.historyPath,
        error,
      )
    }
  }

  /**
   * Persist the full history. Either the whole new history becomes visible
   * or the previous file stays in place.
   *
   * @throws {PersistenceError} When the file cannot be written
   */
  async save(updated: MergedHistory): Promise<void> {
    await this.writeArtifact(this.historyPath, serializeHistory(updated))
    this.log.info(`Saved ${updated.size} movies to ${this.historyPath}`)
  }

  async writeIncrementalExport(records: readonly WatchRecord[]): Promise<string> {
    const path = join(this.csvDir, EXPORT_FILE)
    await this.writeArtifact(path, serializeIncrementalExport(records))
    this.log.info(`Wrote ${records.length} new records to ${path}`)
    return path
  }

  async writeFailedImports(records: readonly WatchRecord[]): Promise<string> {
    const path = join(this.csvDir, FAILED_IMPORT_FILE)
    await this.writeArtifact(path, serializeIncrementalExport(records))
    return path
  }

  /**
   * Raw fetch snapshots, kept for diagnostics only and never read back.
   */
  async writeFetchSnapshots(
    watchHistory: readonly WatchHistoryRecord[],
    ratings: readonly RatingRecord[],
  ): Promise<void> {
    await Promise.all([
      this.writeArtifact(
        join(this.csvDir, WATCHED_SNAPSHOT_FILE),
        serializeWatchedSnapshot(watchHistory),
      ),
      this.writeArtifact(
        join(this.csvDir, RATINGS_SNAPSHOT_FILE),
        serializeRatingsSnapshot(ratings),
      ),
    ])
  }

  /**
   * Whether the CSV directory exists (or can be created) and is writable
   */
  async isWritable(): Promise<boolean> {
    try {
      await mkdir(this.csvDir, { recursive: true })
      await access(this.csvDir, constants.W_OK)
      return true
    } catch (error) {
      this.log.warn({ error, csvDir: this.csvDir }, 'CSV directory is not writable')
      return false
    }
  }

  private async writeArtifact(path: string, content: string): Promise<void> {
    try {
      await writeFileAtomic(path, content)
    } catch (error) {
      throw new PersistenceError(`Unable to write ${path}`, path, error)
    }
  }
}
