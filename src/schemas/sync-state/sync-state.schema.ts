import { z } from 'zod'

const epochMs = z.number().nonnegative()

export const SyncStatusSchema = z.object({
  asin: z.string().min(1),
  lastSeenAudiblePositionMs: z.number().int().nonnegative().default(0),
  lastSeenAbsPositionSeconds: z.number().nonnegative().default(0),
  lastChangeDetectedAudibleAt: epochMs.default(0),
  lastChangeDetectedAbsAt: epochMs.default(0),
  lastPushedToAudibleAt: epochMs.default(0),
  lastPushedToAbsAt: epochMs.default(0),
  lastSyncResult: z.enum(['ok', 'error']).default('ok'),
  errorCount: z.number().int().nonnegative().default(0),
})

export const SyncStateSchema = z.object({
  watchlist: z.array(z.string().min(1)).default([]),
  items: z.record(z.string(), SyncStatusSchema).default({}),
  lastSuccessfulSync: epochMs.default(0),
  lastDeepScan: epochMs.default(0),
  lastLibraryDiscovery: epochMs.default(0),
})

export type SyncStatus = z.infer<typeof SyncStatusSchema>
export type SyncState = z.infer<typeof SyncStateSchema>

/**
 * A zeroed status for an identifier seen for the first time.
 */
export function createSyncStatus(asin: string): SyncStatus {
  return {
    asin,
    lastSeenAudiblePositionMs: 0,
    lastSeenAbsPositionSeconds: 0,
    lastChangeDetectedAudibleAt: 0,
    lastChangeDetectedAbsAt: 0,
    lastPushedToAudibleAt: 0,
    lastPushedToAbsAt: 0,
    lastSyncResult: 'ok',
    errorCount: 0,
  }
}
