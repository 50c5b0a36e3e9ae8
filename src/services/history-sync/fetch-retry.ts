import { isTransientError } from '@utils/errors.js'
import type { FastifyBaseLogger } from 'fastify'

export interface FetchRetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number
  /** Wait before the first retry; doubles on every further retry */
  baseDelayMs: number
  log: FastifyBaseLogger
  /** Operation name used in log lines */
  label: string
}

/**
 * Backoff before retry number `retry` (0-based): an explicit Retry-After wins,
 * otherwise exponential (1x, 2x, 4x ...) with ±10% jitter.
 */
export function computeRetryDelay(
  retry: number,
  baseDelayMs: number,
  retryAfterMs?: number,
): number {
  const baseWaitTime = retryAfterMs ?? 2 ** retry * baseDelayMs
  const jitter = baseWaitTime * 0.1
  return Math.max(0, baseWaitTime + (Math.random() * 2 - 1) * jitter)
}

/**
 * Run a fetch with a bounded retry on {@link FetchTransientError}.
 * Any other error, and the last transient one, propagate unchanged.
 */
export async function withFetchRetry<T>(
  operation: () => Promise<T>,
  options: FetchRetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, log, label } = options

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation()
    } catch (error) {
      if (!isTransientError(error) || attempt >= maxAttempts) {
        throw error
      }

      const waitTime = computeRetryDelay(
        attempt - 1,
        baseDelayMs,
        error.retryAfterMs,
      )
      log.warn(
        { error: error.message, status: error.status },
        `${label} failed, retrying after ${Math.round(waitTime)}ms (attempt ${attempt + 1}/${maxAttempts})`,
      )
      await new Promise((resolve) => setTimeout(resolve, waitTime))
    }
  }
}
