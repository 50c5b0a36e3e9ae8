import type { TraktServiceOptions } from '@root/types/trakt.types.js'
import {
  parseRetryAfter,
  TraktService,
  toExternalId,
} from '@services/trakt.service.js'
import { FetchTransientError, TraktApiError } from '@utils/errors.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'
import {
  historyItem,
  ratingItem,
  TRAKT_API_URL,
  traktMovie,
} from '../../mocks/trakt-api-handlers.js'
import { server } from '../../setup/msw-setup.js'

const options: TraktServiceOptions = {
  apiUrl: TRAKT_API_URL,
  clientId: 'test-client-id',
  accessToken: 'test-secret',
  pageSize: 2,
  timeoutMs: 5000,
}

const heat = traktMovie('Heat', 1995, 'tt0000001', 10)
const ronin = traktMovie('Ronin', 1998, 'tt0000002', 11)

describe('TraktService', () => {
  describe('fetchWatchHistory', () => {
    it('walks every page until an empty one', async () => {
      const pages: Record<string, unknown[]> = {
        '1': [
          historyItem(1, '2024-01-01T20:00:00.000Z', heat),
          historyItem(2, '2024-02-01T20:00:00.000Z', ronin),
        ],
        '2': [historyItem(3, '2024-03-01T20:00:00.000Z', heat)],
      }
      const requested: string[] = []
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/history/movies`, ({ request }) => {
          const url = new URL(request.url)
          const page = url.searchParams.get('page') ?? ''
          requested.push(`${page}/${url.searchParams.get('limit')}`)
          return HttpResponse.json(pages[page] ?? [])
        }),
      )

      const service = new TraktService(createMockLogger(), options)
      const history = await service.fetchWatchHistory()

      expect(requested).toEqual(['1/2', '2/2', '3/2'])
      expect(history).toEqual([
        { externalId: 'tt0000001', title: 'Heat', year: 1995, watchedAt: '2024-01-01T20:00:00.000Z' },
        { externalId: 'tt0000002', title: 'Ronin', year: 1998, watchedAt: '2024-02-01T20:00:00.000Z' },
        { externalId: 'tt0000001', title: 'Heat', year: 1995, watchedAt: '2024-03-01T20:00:00.000Z' },
      ])
    })

    it('stops at the last page announced by the pagination header', async () => {
      let calls = 0
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/history/movies`, () => {
          calls++
          return HttpResponse.json(
            [historyItem(calls, '2024-01-01T20:00:00.000Z', heat)],
            { headers: { 'X-Pagination-Page-Count': '1' } },
          )
        }),
      )

      const service = new TraktService(createMockLogger(), options)
      await expect(service.fetchWatchHistory()).resolves.toHaveLength(1)
      expect(calls).toBe(1)
    })

    it('passes a viewing without a date through for validation', async () => {
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/history/movies`, () =>
          HttpResponse.json([{ id: 4, type: 'movie', movie: heat }], {
            headers: { 'X-Pagination-Page-Count': '1' },
          }),
        ),
      )

      const service = new TraktService(createMockLogger(), options)

      await expect(service.fetchWatchHistory()).resolves.toEqual([
        { externalId: 'tt0000001', title: 'Heat', year: 1995, watchedAt: null },
      ])
    })

    it('sends the API key, version and bearer token', async () => {
      let headers: Headers | undefined
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/history/movies`, ({ request }) => {
          headers = request.headers
          return HttpResponse.json([])
        }),
      )

      await new TraktService(createMockLogger(), options).fetchWatchHistory()

      expect(headers?.get('trakt-api-key')).toBe('test-client-id')
      expect(headers?.get('trakt-api-version')).toBe('2')
      expect(headers?.get('authorization')).toBe('Bearer test-secret')
    })
  })

  describe('fetchRatings', () => {
    it('maps ratings onto external ids', async () => {
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/ratings/movies`, () =>
          HttpResponse.json([ratingItem(8, '2024-01-02T00:00:00.000Z', heat)]),
        ),
      )

      const ratings = await new TraktService(createMockLogger(), options).fetchRatings()

      expect(ratings).toEqual([
        {
          externalId: 'tt0000001',
          rating: 8,
          ratedAt: '2024-01-02T00:00:00.000Z',
          title: 'Heat',
          year: 1995,
        },
      ])
    })
  })

  describe('error mapping', () => {
    it('treats rate limiting as transient and honours Retry-After', async () => {
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/ratings/movies`, () =>
          new HttpResponse(null, {
            status: 429,
            statusText: 'Too Many Requests',
            headers: { 'Retry-After': '2' },
          }),
        ),
      )

      const error = await new TraktService(createMockLogger(), options)
        .fetchRatings()
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(FetchTransientError)
      expect(error).toMatchObject({ status: 429, retryAfterMs: 2000 })
    })

    it('treats server errors as transient', async () => {
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/ratings/movies`, () =>
          new HttpResponse(null, { status: 503, statusText: 'Service Unavailable' }),
        ),
      )

      const error = await new TraktService(createMockLogger(), options)
        .fetchRatings()
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(FetchTransientError)
      expect(error).toMatchObject({
        message: 'Trakt API error: 503 Service Unavailable',
        status: 503,
      })
    })

    it('treats network failures as transient', async () => {
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/ratings/movies`, () => HttpResponse.error()),
      )

      await expect(
        new TraktService(createMockLogger(), options).fetchRatings(),
      ).rejects.toBeInstanceOf(FetchTransientError)
    })

    it('does not retry an authorization failure', async () => {
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/ratings/movies`, () =>
          new HttpResponse(null, { status: 401, statusText: 'Unauthorized' }),
        ),
      )

      const error = await new TraktService(createMockLogger(), options)
        .fetchRatings()
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(TraktApiError)
      expect(error).toMatchObject({
        message: 'Trakt API error: 401 Unauthorized',
        status: 401,
      })
    })

    it('rejects a response of the wrong shape', async () => {
      server.use(
        http.get(`${TRAKT_API_URL}/users/me/ratings/movies`, () =>
          HttpResponse.json({ unexpected: true }),
        ),
      )

      await expect(
        new TraktService(createMockLogger(), options).fetchRatings(),
      ).rejects.toThrow('Unexpected response from Trakt for /users/me/ratings/movies')
    })

    it('fails before any request without credentials', async () => {
      const service = new TraktService(createMockLogger(), { ...options, accessToken: '' })
      await expect(service.fetchRatings()).rejects.toMatchObject({
        code: 'TRAKT_API_ERROR',
        status: 401,
      })
    })
  })

  it('falls back to the Trakt id when a movie has no IMDb id', () => {
    expect(toExternalId(traktMovie('Obscure', 2010, null, 42))).toBe('trakt:42')
    expect(toExternalId(heat)).toBe('tt0000001')
  })

  it('reads Retry-After seconds', () => {
    expect(parseRetryAfter('5')).toBe(5000)
    expect(parseRetryAfter(null)).toBeUndefined()
    expect(parseRetryAfter('soon')).toBeUndefined()
  })
})
