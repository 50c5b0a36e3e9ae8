import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'unhealthy']),
  timestamp: z.string().datetime(),
  checks: z.object({
    storage: z.enum(['ok', 'failed']),
    sync: z.enum(['idle', 'running']),
  }),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
