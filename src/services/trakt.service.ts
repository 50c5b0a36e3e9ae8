/**
 * Trakt Service
 *
 * Reads the authenticated user's movie watch history and ratings from the
 * Trakt API v2. Implements the {@link HistoryFetcher} boundary: both calls
 * enumerate every page before resolving, and failures are classified as
 * retryable ({@link FetchTransientError}) or not ({@link TraktApiError}).
 */

import type {
  HistoryFetcher,
  RatingRecord,
  WatchHistoryRecord,
} from '@root/types/history.types.js'
import type { TraktServiceOptions } from '@root/types/trakt.types.js'
import {
  type TraktMovie,
  TraktHistoryPageSchema,
  TraktRatingsSchema,
} from '@schemas/trakt/trakt.schema.js'
import { FetchTransientError, TraktApiError } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import { USER_AGENT } from '@utils/version.js'
import type { FastifyBaseLogger } from 'fastify'
import type { z } from 'zod'

const TRAKT_API_VERSION = '2'

/**
 * Stable id of a Trakt movie: its IMDb id, or `trakt:<id>` for the few
 * titles Trakt has no IMDb mapping for.
 */
export function toExternalId(movie: TraktMovie): string {
  return movie.ids.imdb || `trakt:${movie.ids.trakt}`
}

/**
 * Parse a Retry-After header given in seconds
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined
  const seconds = Number.parseInt(value, 10)
  return Number.isNaN(seconds) ? undefined : seconds * 1000
}

export class TraktService implements HistoryFetcher {
  /** Creates a fresh service logger that inherits current log level */
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'TRAKT')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly options: TraktServiceOptions,
  ) {}

  /**
   * Fetch every movie viewing, page by page, until Trakt returns an empty
   * page or the last page announced by `X-Pagination-Page-Count`.
   */
  async fetchWatchHistory(): Promise<WatchHistoryRecord[]> {
    const records: WatchHistoryRecord[] = []

    for (let page = 1; ; page++) {
      const { data, pageCount } = await this.request(
        `/users/me/history/movies?page=${page}&limit=${this.options.pageSize}`,
        TraktHistoryPageSchema,
      )
      if (data.length === 0) break

      for (const item of data) {
        records.push({
          externalId: toExternalId(item.movie),
          title: item.movie.title,
          year: item.movie.year ?? 0,
          watchedAt: item.watched_at ?? null,
        })
      }

      this.log.debug(`Fetched history page ${page} (${data.length} items)`)
      if (pageCount !== null && page >= pageCount) break
    }

    this.log.info(`Fetched ${records.length} watch events from Trakt`)
    return records
  }

  /**
   * Fetch every movie rating. Trakt returns the full list when no page is
   * requested.
   */
  async fetchRatings(): Promise<RatingRecord[]> {
    const { data } = await this.request(
      '/users/me/ratings/movies',
      TraktRatingsSchema,
    )

    const ratings = data.map((item) => ({
      externalId: toExternalId(item.movie),
      rating: item.rating,
      ratedAt: item.rated_at ?? null,
      title: item.movie.title,
      year: item.movie.year ?? 0,
    }))

    this.log.info(`Fetched ${ratings.length} ratings from Trakt`)
    return ratings
  }

  private get headers(): Record<string, string> {
    return {
      'User-Agent': USER_AGENT,
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'trakt-api-version': TRAKT_API_VERSION,
      'trakt-api-key': this.options.clientId,
      Authorization: `Bearer ${this.options.accessToken}`,
    }
  }

  private async request<T extends z.ZodType>(
    path: string,
    schema: T,
  ): Promise<{ data: z.infer<T>; pageCount: number | null }> {
    if (!this.options.clientId || !this.options.accessToken) {
      throw new TraktApiError(
        'Trakt credentials are not configured (traktClientId, traktAccessToken)',
        401,
      )
    }

    const url = `${this.options.apiUrl.replace(/\/+$/, '')}${path}`
    let response: Response
    try {
      response = await fetch(url, {
        headers: this.headers,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new FetchTransientError(
        `Trakt request ${path} failed: ${reason}`,
        undefined,
        undefined,
        error,
      )
    }

    if (response.status === 429 || response.status >= 500) {
      throw new FetchTransientError(
        `Trakt API error: ${response.status} ${response.statusText}`,
        response.status,
        parseRetryAfter(response.headers.get('Retry-After')),
      )
    }

    if (!response.ok) {
      throw new TraktApiError(
        `Trakt API error: ${response.status} ${response.statusText}`,
        response.status,
      )
    }

    const body: unknown = await response.json()
    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      this.log.error(
        { issues: parsed.error.issues.slice(0, 5), path },
        'Unexpected Trakt response shape',
      )
      throw new TraktApiError(
        `Unexpected response from Trakt for ${path}`,
        response.status,
      )
    }

    const pageCountHeader = response.headers.get('X-Pagination-Page-Count')
    const pageCount = pageCountHeader
      ? Number.parseInt(pageCountHeader, 10)
      : Number.NaN

    return {
      data: parsed.data,
      pageCount: Number.isNaN(pageCount) ? null : pageCount,
    }
  }
}
