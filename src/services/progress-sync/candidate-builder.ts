import type { SyncItem } from '@root/types/sync.types.js'
import type {
  AbsProgress,
  AudiobookshelfProgressSource,
} from '@root/types/progress-source.types.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'

/**
 * Merges the id sources of one pass in order of first appearance.
 */
export function collectCandidates(...sources: Iterable<string>[]): string[] {
  const candidates = new Set<string>()
  for (const source of sources) {
    for (const asin of source) {
      candidates.add(asin)
    }
  }
  return Array.from(candidates)
}

export interface BuiltSyncItems {
  items: SyncItem[]
  /** Candidates without an Audiobookshelf item this pass */
  unresolved: string[]
}

/**
 * Builds the Audiobookshelf side of every candidate. Items missing from the
 * in-progress listing are resolved through the library and their progress
 * fetched individually; a resolved item without progress sits at zero.
 */
export async function buildSyncItems(
  candidates: string[],
  inProgress: Map<string, AbsProgress>,
  abs: AudiobookshelfProgressSource,
  concurrency: number,
  log: FastifyBaseLogger,
): Promise<BuiltSyncItems> {
  const limit = pLimit(concurrency)

  const built = await Promise.all(
    candidates.map((asin) =>
      limit(async (): Promise<SyncItem | null> => {
        const known = inProgress.get(asin)
        if (known) {
          return {
            asin,
            absPositionSeconds: known.positionSeconds,
            absUpdatedAt: known.updatedAt,
            durationSeconds: known.durationSeconds,
            absItemId: known.itemId,
          }
        }

        const itemId = await abs.resolveItemId(asin)
        if (!itemId) {
          return null
        }
        const progress = await abs.getItemProgress(itemId)
        return {
          asin,
          absPositionSeconds: progress?.positionSeconds ?? 0,
          absUpdatedAt: progress?.updatedAt ?? 0,
          durationSeconds: progress?.durationSeconds,
          absItemId: itemId,
        }
      }),
    ),
  )

  const items: SyncItem[] = []
  const unresolved: string[] = []
  built.forEach((item, index) => {
    if (item) {
      items.push(item)
    } else {
      unresolved.push(candidates[index])
    }
  })

  if (unresolved.length > 0) {
    log.debug(
      `No Audiobookshelf item for ${unresolved.length} candidates: ${unresolved.join(', ')}`,
    )
  }
  return { items, unresolved }
}
