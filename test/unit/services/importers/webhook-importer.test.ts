import type { WatchRecord } from '@root/types/history.types.js'
import {
  toWebhookPayload,
  WebhookImporter,
} from '@services/importers/webhook-importer.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'
import { server } from '../../../setup/msw-setup.js'

const WEBHOOK_URL = 'https://importer.test/diary'

function record(externalId: string, watchedAt: string): WatchRecord {
  return {
    externalId,
    title: `Movie ${externalId}`,
    year: 2001,
    rating: 3,
    watchedAt,
    isRewatch: false,
  }
}

describe('WebhookImporter', () => {
  it('builds a diary payload with the calendar day', () => {
    const payload = toWebhookPayload(record('tt1', '2024-06-01T20:00:00.000Z'))
    expect(payload).toMatchObject({
      event: 'diary.entry',
      data: {
        externalId: 'tt1',
        title: 'Movie tt1',
        year: 2001,
        rating: 3,
        watchedAt: '2024-06-01T20:00:00.000Z',
        watchedDate: '2024-06-01',
        isRewatch: false,
      },
    })
  })

  it('posts every record and reports each outcome', async () => {
    const received: unknown[] = []
    server.use(
      http.post(WEBHOOK_URL, async ({ request }) => {
        const body = await request.json()
        received.push(body)
        const rejected =
          typeof body === 'object' &&
          body !== null &&
          'data' in body &&
          typeof body.data === 'object' &&
          body.data !== null &&
          'externalId' in body.data &&
          body.data.externalId === 'tt2'
        return rejected
          ? new HttpResponse(null, { status: 422, statusText: 'Unprocessable Entity' })
          : HttpResponse.json({ ok: true })
      }),
    )

    const log = createMockLogger()
    const importer = new WebhookImporter(log, { url: WEBHOOK_URL, concurrency: 2 })
    const results = await importer.importRecords([
      record('tt1', '2024-01-01T00:00:00.000Z'),
      record('tt2', '2024-01-02T00:00:00.000Z'),
      record('tt3', '2024-01-03T00:00:00.000Z'),
    ])

    expect(received).toHaveLength(3)
    expect(results).toEqual([
      { externalId: 'tt1', watchedAt: '2024-01-01T00:00:00.000Z', success: true },
      {
        externalId: 'tt2',
        watchedAt: '2024-01-02T00:00:00.000Z',
        success: false,
        error: 'HTTP 422: Unprocessable Entity',
      },
      { externalId: 'tt3', watchedAt: '2024-01-03T00:00:00.000Z', success: true },
    ])
    expect(log.warn).toHaveBeenCalledWith(
      { total: 3, failed: 1 },
      'Some records were rejected by the import webhook',
    )
  })

  it('reports a network failure per record', async () => {
    server.use(http.post(WEBHOOK_URL, () => HttpResponse.error()))

    const importer = new WebhookImporter(createMockLogger(), { url: WEBHOOK_URL, concurrency: 1 })
    const [result] = await importer.importRecords([record('tt1', '2024-01-01T00:00:00.000Z')])

    expect(result?.success).toBe(false)
    expect(result?.error).toEqual(expect.any(String))
  })

  it('keeps no more requests in flight than allowed', async () => {
    let inFlight = 0
    let peak = 0
    server.use(
      http.post(WEBHOOK_URL, async () => {
        inFlight++
        peak = Math.max(peak, inFlight)
        await new Promise((resolve) => setTimeout(resolve, 10))
        inFlight--
        return HttpResponse.json({ ok: true })
      }),
    )

    const importer = new WebhookImporter(createMockLogger(), { url: WEBHOOK_URL, concurrency: 2 })
    await importer.importRecords(
      ['tt1', 'tt2', 'tt3', 'tt4', 'tt5'].map((id, i) =>
        record(id, `2024-01-0${i + 1}T00:00:00.000Z`),
      ),
    )

    expect(peak).toBeLessThanOrEqual(2)
  })
})
