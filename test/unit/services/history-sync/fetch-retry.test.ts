import {
  computeRetryDelay,
  withFetchRetry,
} from '@services/history-sync/fetch-retry.js'
import { FetchTransientError, TraktApiError } from '@utils/errors.js'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'

describe('fetch-retry', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('computeRetryDelay', () => {
    it('doubles the base delay on every retry', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0.5)
      expect(computeRetryDelay(0, 1000)).toBe(1000)
      expect(computeRetryDelay(1, 1000)).toBe(2000)
      expect(computeRetryDelay(2, 1000)).toBe(4000)
    })

    it('prefers an explicit Retry-After', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0.5)
      expect(computeRetryDelay(2, 1000, 30000)).toBe(30000)
    })

    it('stays within 10% jitter of the base wait', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0)
      expect(computeRetryDelay(0, 1000)).toBe(900)
      vi.spyOn(Math, 'random').mockReturnValue(0.9999)
      expect(computeRetryDelay(0, 1000)).toBeCloseTo(1100, 0)
    })
  })

  describe('withFetchRetry', () => {
    const baseOptions = { maxAttempts: 3, baseDelayMs: 0, label: 'Fetching watch history' }

    it('retries a transient failure and returns the later result', async () => {
      vi.spyOn(Math, 'random').mockReturnValue(0.5)
      const log = createMockLogger()
      const operation = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new FetchTransientError('boom', 503))
        .mockResolvedValueOnce('done')

      await expect(withFetchRetry(operation, { ...baseOptions, log })).resolves.toBe('done')
      expect(operation).toHaveBeenCalledTimes(2)
      expect(log.warn).toHaveBeenCalledWith(
        { error: 'boom', status: 503 },
        'Fetching watch history failed, retrying after 0ms (attempt 2/3)',
      )
    })

    it('does not retry a non-transient failure', async () => {
      const log = createMockLogger()
      const operation = vi
        .fn<() => Promise<string>>()
        .mockRejectedValue(new TraktApiError('Trakt API error: 401 Unauthorized', 401))

      await expect(withFetchRetry(operation, { ...baseOptions, log })).rejects.toBeInstanceOf(
        TraktApiError,
      )
      expect(operation).toHaveBeenCalledTimes(1)
      expect(log.warn).not.toHaveBeenCalled()
    })

    it('gives up after the last attempt with the last error', async () => {
      const log = createMockLogger()
      const operation = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new FetchTransientError('first', 502))
        .mockRejectedValueOnce(new FetchTransientError('second', 502))
        .mockRejectedValueOnce(new FetchTransientError('third', 502))

      await expect(withFetchRetry(operation, { ...baseOptions, log })).rejects.toThrow('third')
      expect(operation).toHaveBeenCalledTimes(3)
      expect(log.warn).toHaveBeenCalledTimes(2)
    })

    it('waits the backoff delay between attempts', async () => {
      vi.useFakeTimers()
      vi.spyOn(Math, 'random').mockReturnValue(0.5)
      try {
        const log = createMockLogger()
        const operation = vi
          .fn<() => Promise<string>>()
          .mockRejectedValueOnce(new FetchTransientError('slow down', 429))
          .mockResolvedValueOnce('done')

        const pending = withFetchRetry(operation, {
          ...baseOptions,
          baseDelayMs: 1000,
          log,
        })

        await vi.advanceTimersByTimeAsync(999)
        expect(operation).toHaveBeenCalledTimes(1)
        await vi.advanceTimersByTimeAsync(1)
        await expect(pending).resolves.toBe('done')
        expect(operation).toHaveBeenCalledTimes(2)
      } finally {
        vi.useRealTimers()
      }
    })
  })
})
