/**
 * Webhook Importer
 *
 * Posts each new diary entry to a user-configured endpoint that performs the
 * destination-side import. Every record is sent on its own, so one rejected
 * entry never blocks the others.
 */

import {
  type ImportWebhookPayload,
  ImportWebhookPayloadSchema,
} from '@schemas/import/import-webhook.schema.js'
import type { WatchRecord } from '@root/types/history.types.js'
import type { ImportAdapter, ImportResult } from '@root/types/import.types.js'
import { toCalendarDay } from '@services/history-sync/index.js'
import { createServiceLogger } from '@utils/logger.js'
import { USER_AGENT } from '@utils/version.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'

export interface WebhookImporterOptions {
  url: string
  /** Requests in flight at once */
  concurrency: number
  timeoutMs?: number
}

export function toWebhookPayload(record: WatchRecord): ImportWebhookPayload {
  return {
    event: 'diary.entry',
    timestamp: new Date().toISOString(),
    data: {
      externalId: record.externalId,
      title: record.title,
      year: record.year,
      rating: record.rating,
      watchedAt: record.watchedAt,
      watchedDate: toCalendarDay(record.watchedAt),
      isRewatch: record.isRewatch,
    },
  }
}

export class WebhookImporter implements ImportAdapter {
  readonly name = 'webhook'

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'WEBHOOK_IMPORT')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly options: WebhookImporterOptions,
  ) {}

  async importRecords(records: readonly WatchRecord[]): Promise<ImportResult[]> {
    if (records.length === 0) {
      return []
    }

    // Limit concurrent requests so a large backlog does not flood the endpoint
    const limit = pLimit(this.options.concurrency)
    const results = await Promise.all(
      records.map((record) => limit(() => this.send(record))),
    )

    const failed = results.filter((result) => !result.success).length
    if (failed > 0) {
      this.log.warn(
        { total: records.length, failed },
        'Some records were rejected by the import webhook',
      )
    } else {
      this.log.info(`Imported ${records.length} records through the webhook`)
    }
    return results
  }

  private async send(record: WatchRecord): Promise<ImportResult> {
    const base = { externalId: record.externalId, watchedAt: record.watchedAt }

    const parsed = ImportWebhookPayloadSchema.safeParse(toWebhookPayload(record))
    if (!parsed.success) {
      const error = `Invalid payload: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
      this.log.error({ externalId: record.externalId, error }, 'Webhook payload validation failed')
      return { ...base, success: false, error }
    }

    try {
      const response = await fetch(this.options.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': USER_AGENT,
        },
        body: JSON.stringify(parsed.data),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 10000),
      })

      if (!response.ok) {
        const error = `HTTP ${response.status}: ${response.statusText}`
        this.log.warn({ externalId: record.externalId, error }, 'Webhook request failed')
        return { ...base, success: false, error }
      }

      this.log.debug({ externalId: record.externalId }, 'Record delivered')
      return { ...base, success: true }
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err)
      this.log.error({ externalId: record.externalId, error }, 'Webhook request error')
      return { ...base, success: false, error }
    }
  }
}
