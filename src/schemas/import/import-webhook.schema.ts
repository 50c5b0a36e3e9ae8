import { z } from 'zod'

/** One diary entry as posted to the import webhook */
export const ImportWebhookRecordSchema = z.object({
  externalId: z.string().min(1),
  title: z.string(),
  year: z.number().int(),
  rating: z.number().int().nonnegative().nullable(),
  watchedAt: z.string().datetime(),
  watchedDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  isRewatch: z.boolean(),
})

export const ImportWebhookPayloadSchema = z.object({
  event: z.literal('diary.entry'),
  timestamp: z.string().datetime(),
  data: ImportWebhookRecordSchema,
})

export type ImportWebhookRecord = z.infer<typeof ImportWebhookRecordSchema>
export type ImportWebhookPayload = z.infer<typeof ImportWebhookPayloadSchema>
