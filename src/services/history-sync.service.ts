/**
 * History Sync Service
 *
 * Runs one sync: fetch the full remote history, reconcile it against the
 * stored history, persist the result, then hand the new records to the
 * importer. The store is saved before the import, so records the destination
 * rejects stay known and are listed in `failed-import.csv` instead of being
 * offered again on the next run.
 */

import type {
  HistoryFetcher,
  HistoryStore,
  RatingRecord,
  ReconcileOptions,
  SyncArtifactWriter,
  WatchHistoryRecord,
  WatchRecord,
} from '@root/types/history.types.js'
import type { ImportAdapter, ImportResult } from '@root/types/import.types.js'
import type {
  ImportSummary,
  SyncRunResult,
} from '@schemas/sync/sync.schema.js'
import { reconcile, withFetchRetry } from '@services/history-sync/index.js'
import {
  ImportPartialFailure,
  isSyncError,
  SyncInProgressError,
} from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface HistorySyncOptions extends ReconcileOptions {
  fetchMaxAttempts: number
  fetchRetryBaseDelayMs: number
}

export interface HistorySyncDeps {
  fetcher: HistoryFetcher
  store: HistoryStore & SyncArtifactWriter
  importer: ImportAdapter
}

interface RunProgress {
  fetched: SyncRunResult['fetched']
  knownMovies: number
  newRecords: number
  rewatches: number
  exportPath: string | null
}

function recordKey(record: Pick<WatchRecord, 'externalId' | 'watchedAt'>) {
  return `${record.externalId}|${record.watchedAt}`
}

export class HistorySyncService {
  private running = false
  private last: SyncRunResult | null = null

  /** Creates a fresh service logger that inherits current log level */
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'HISTORY_SYNC')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly deps: HistorySyncDeps,
    private readonly options: HistorySyncOptions,
  ) {}

  get isRunning(): boolean {
    return this.running
  }

  /** Outcome of the most recent run, failed runs included */
  get lastResult(): SyncRunResult | null {
    return this.last
  }

  /**
   * Run one sync to completion.
   *
   * @returns The run outcome; a partial import failure is reported here
   * @throws {SyncInProgressError} When another run is active in this process
   * @throws {SyncError} When fetching, reconciling, exporting or saving fails;
   * the stored history is left as it was
   */
  async run(): Promise<SyncRunResult> {
    if (this.running) {
      throw new SyncInProgressError()
    }
    this.running = true

    const startedAt = new Date()
    const progress: RunProgress = {
      fetched: { watchEvents: 0, ratings: 0 },
      knownMovies: 0,
      newRecords: 0,
      rewatches: 0,
      exportPath: null,
    }

    try {
      const summary = await this.execute(progress)
      const partial = summary !== null && summary.failed > 0
      const failure = partial
        ? new ImportPartialFailure(
            summary.failures.map((f) => ({ ...f, success: false })),
            summary.attempted,
          )
        : null

      this.last = this.buildResult(startedAt, progress, {
        status: partial ? 'partial' : 'success',
        import: summary,
        error: failure ? { code: failure.code, message: failure.message } : null,
      })
      this.log.info(
        {
          newRecords: progress.newRecords,
          rewatches: progress.rewatches,
          durationMs: this.last.durationMs,
        },
        partial ? 'History sync finished with import failures' : 'History sync finished',
      )
      return this.last
    } catch (error) {
      this.last = this.buildResult(startedAt, progress, {
        status: 'failed',
        import: null,
        error: {
          code: isSyncError(error) ? error.code : 'INTERNAL_ERROR',
          message: error instanceof Error ? error.message : String(error),
        },
      })
      this.log.error({ error }, 'History sync failed')
      throw error
    } finally {
      this.running = false
    }
  }

  private async execute(progress: RunProgress): Promise<ImportSummary | null> {
    const { fetcher, store } = this.deps

    // Both collections must be complete before anything is reconciled
    const watchHistory = await this.fetchWithRetry('Fetching watch history', () =>
      fetcher.fetchWatchHistory(),
    )
    const ratings = await this.fetchWithRetry('Fetching ratings', () =>
      fetcher.fetchRatings(),
    )
    progress.fetched = {
      watchEvents: watchHistory.length,
      ratings: ratings.length,
    }

    await this.writeSnapshots(watchHistory, ratings)

    const previous = await store.load()
    const { updated, newRecords } = reconcile(previous, watchHistory, ratings, {
      ratingScaleMax: this.options.ratingScaleMax,
      collapseSameDayDuplicates: this.options.collapseSameDayDuplicates,
    })
    progress.knownMovies = updated.size
    progress.newRecords = newRecords.length
    progress.rewatches = newRecords.filter((record) => record.isRewatch).length
    this.log.info(
      `Reconciled ${watchHistory.length} watch events: ${newRecords.length} new (${progress.rewatches} rewatches)`,
    )

    // The export goes first: once the history is saved its records count as
    // known, so nothing may fail between the save and the import
    progress.exportPath = await store.writeIncrementalExport(newRecords)
    await store.save(updated)

    if (newRecords.length === 0) {
      this.log.info('No new records to import')
      return null
    }
    return this.importNewRecords(newRecords)
  }

  private fetchWithRetry<T>(label: string, operation: () => Promise<T>) {
    return withFetchRetry(operation, {
      maxAttempts: this.options.fetchMaxAttempts,
      baseDelayMs: this.options.fetchRetryBaseDelayMs,
      log: this.log,
      label,
    })
  }

  /** Snapshots are diagnostics; failing to write them never stops a run */
  private async writeSnapshots(
    watchHistory: readonly WatchHistoryRecord[],
    ratings: readonly RatingRecord[],
  ): Promise<void> {
    try {
      await this.deps.store.writeFetchSnapshots(watchHistory, ratings)
    } catch (error) {
      this.log.warn({ error }, 'Unable to write fetch snapshots')
    }
  }

  private async importNewRecords(
    records: readonly WatchRecord[],
  ): Promise<ImportSummary> {
    const { importer, store } = this.deps
    const results = await importer.importRecords(records)

    const byKey = new Map<string, ImportResult>(
      results.map((result) => [recordKey(result), result]),
    )
    const failedRecords: WatchRecord[] = []
    const failures: ImportSummary['failures'] = []
    for (const record of records) {
      const result = byKey.get(recordKey(record))
      if (result?.success) continue
      failedRecords.push(record)
      failures.push({
        externalId: record.externalId,
        watchedAt: record.watchedAt,
        error: result ? (result.error ?? 'Rejected by destination') : 'No import result returned',
      })
    }

    let failedPath: string | null = null
    if (failedRecords.length > 0) {
      this.log.warn(
        `${failedRecords.length} of ${records.length} records failed to import through ${importer.name}`,
      )
      try {
        failedPath = await store.writeFailedImports(failedRecords)
      } catch (error) {
        this.log.warn({ error }, 'Unable to write the failed import list')
      }
    }

    return {
      adapter: importer.name,
      attempted: records.length,
      succeeded: records.length - failedRecords.length,
      failed: failedRecords.length,
      failedPath,
      failures,
    }
  }

  private buildResult(
    startedAt: Date,
    progress: RunProgress,
    outcome: Pick<SyncRunResult, 'status' | 'import' | 'error'>,
  ): SyncRunResult {
    const finishedAt = new Date()
    return {
      ...outcome,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      fetched: progress.fetched,
      knownMovies: progress.knownMovies,
      newRecords: progress.newRecords,
      rewatches: progress.rewatches,
      exportPath: progress.exportPath,
    }
  }
}
