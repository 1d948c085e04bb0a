import type { ReconcileResult, SyncItem } from '@root/types/sync.types.js'
import type {
  AudibleProgressSource,
  AudiobookshelfProgressSource,
} from '@root/types/progress-source.types.js'
import type { PushedPositions } from '@services/sync-state.service.js'
import type { FastifyBaseLogger } from 'fastify'

export interface AppliedPushes {
  /** Positions the remotes accepted */
  pushed: PushedPositions
  failed: number
  attempted: number
}

/**
 * Sends the engine's push targets for one item to the remotes.
 */
export async function applyPushes(
  item: SyncItem,
  result: ReconcileResult,
  audible: AudibleProgressSource,
  abs: AudiobookshelfProgressSource,
  log: FastifyBaseLogger,
): Promise<AppliedPushes> {
  const applied: AppliedPushes = { pushed: {}, failed: 0, attempted: 0 }

  if (result.pushToAudibleMs !== null) {
    applied.attempted++
    if (await audible.updatePosition(item.asin, result.pushToAudibleMs)) {
      applied.pushed.audibleMs = result.pushToAudibleMs
    } else {
      applied.failed++
    }
  }

  if (result.pushToAbsSeconds !== null) {
    applied.attempted++
    if (!item.absItemId) {
      log.warn(`No Audiobookshelf item id for ${item.asin}, cannot push`)
      applied.failed++
    } else if (
      await abs.updateProgress(item.absItemId, result.pushToAbsSeconds)
    ) {
      applied.pushed.absSeconds = result.pushToAbsSeconds
    } else {
      applied.failed++
    }
  }

  return applied
}
