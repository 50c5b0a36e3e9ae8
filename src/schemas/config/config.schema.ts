import type { Config } from '@root/types/config.types.js'
import { z } from 'zod'

/**
 * Runtime config as validated after `@fastify/env` has applied defaults and
 * coerced types. Rules spanning several keys live here.
 */
export const ConfigSchema: z.ZodType<Config> = z
  .object({
    port: z.number().int().positive(),
    logLevel: z.enum([
      'fatal',
      'error',
      'warn',
      'info',
      'debug',
      'trace',
      'silent',
    ]),
    closeGraceDelay: z.number().int().nonnegative(),
    rateLimitMax: z.number().int().positive(),
    csvDir: z.string(),
    traktApiUrl: z.string().url(),
    traktClientId: z.string(),
    traktAccessToken: z.string(),
    traktPageSize: z.number().int().min(1).max(1000),
    traktTimeoutMs: z.number().int().positive(),
    fetchMaxAttempts: z.number().int().min(1),
    fetchRetryBaseDelayMs: z.number().int().nonnegative(),
    ratingScaleMax: z
      .number()
      .int()
      .positive({ message: 'ratingScaleMax must be a positive integer' }),
    collapseSameDayDuplicates: z.boolean(),
    scheduledSync: z.boolean(),
    syncIntervalHours: z.number().positive(),
    importMode: z.enum(['csv', 'webhook']),
    importWebhookUrl: z.string(),
    importWebhookConcurrency: z.number().int().min(1),
  })
  .superRefine((config, ctx) => {
    if (config.importMode !== 'webhook') return
    if (!z.string().url().safeParse(config.importWebhookUrl).success) {
      ctx.addIssue({
        code: 'custom',
        path: ['importWebhookUrl'],
        message: 'importWebhookUrl must be a valid URL when importMode is webhook',
      })
    }
  })

/**
 * One readable line per issue, e.g. `ratingScaleMax: must be positive`
 */
export function formatConfigIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ')
}
