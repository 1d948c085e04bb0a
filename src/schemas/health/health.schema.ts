import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['ok', 'lagging', 'starting']),
  timestamp: z.string().datetime(),
  /** Seconds since the last completed sync pass, null before the first */
  lastSyncAgeSeconds: z.number().nullable(),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
