import { SYNC_MODES } from '@root/types/config.types.js'
import { z } from 'zod'

const JobStatusSchema = z.object({
  name: z.string(),
  intervalSeconds: z.number(),
  running: z.boolean(),
  lastRun: z
    .object({
      time: z.number(),
      status: z.enum(['completed', 'failed']),
      error: z.string().optional(),
      durationMs: z.number(),
    })
    .nullable(),
})

export const StatusResponseSchema = z.object({
  watchlistSize: z.number().int(),
  trackedItems: z.number().int(),
  /** Epoch ms, 0 when it has never happened */
  lastSuccessfulSync: z.number(),
  lastDeepScan: z.number(),
  lastLibraryDiscovery: z.number(),
  readOnly: z.boolean(),
  clients: z.object({
    audible: z.boolean(),
    audiobookshelf: z.boolean(),
  }),
  config: z.object({
    intervalSeconds: z.number(),
    mode: z.enum(SYNC_MODES),
    dryRun: z.boolean(),
  }),
  jobs: z.array(JobStatusSchema),
})

export type StatusResponse = z.infer<typeof StatusResponseSchema>
