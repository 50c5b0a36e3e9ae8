import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import { z } from 'zod'

export const ImportFailureSchema = z.object({
  externalId: z.string(),
  watchedAt: z.string(),
  error: z.string(),
})

export const ImportSummarySchema = z.object({
  adapter: z.string(),
  attempted: z.number(),
  succeeded: z.number(),
  failed: z.number(),
  failedPath: z.string().nullable(),
  failures: z.array(ImportFailureSchema),
})

export const SyncRunResultSchema = z.object({
  status: z.enum(['success', 'partial', 'failed']),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number(),
  fetched: z.object({
    watchEvents: z.number(),
    ratings: z.number(),
  }),
  knownMovies: z.number(),
  newRecords: z.number(),
  rewatches: z.number(),
  exportPath: z.string().nullable(),
  import: ImportSummarySchema.nullable(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
    })
    .nullable(),
})

export const SyncScheduleSchema = z.object({
  name: z.string(),
  config: z.object({
    days: z.number().optional(),
    hours: z.number().optional(),
    minutes: z.number().optional(),
    seconds: z.number().optional(),
    runImmediately: z.boolean().optional(),
  }),
  lastRun: z
    .object({
      time: z.string(),
      status: z.enum(['completed', 'failed']),
      error: z.string().optional(),
    })
    .nullable(),
  nextRun: z.string().nullable(),
})

export type ImportFailure = z.infer<typeof ImportFailureSchema>
export type ImportSummary = z.infer<typeof ImportSummarySchema>
export type SyncRunResult = z.infer<typeof SyncRunResultSchema>
export type SyncSchedule = z.infer<typeof SyncScheduleSchema>

// Re-export shared schemas
export { ErrorSchema }
