/**
 * Reconciliation Engine
 *
 * Decides, for one audiobook per call, whether a position has to be pushed to
 * Audible or to Audiobookshelf. Works on changes rather than absolute
 * positions: each side's reading is compared against the last one seen, and
 * only sides that moved beyond the tolerance take part.
 *
 * Per item the flow is: change observed -> single-side push or conflict
 * resolved -> cooldown filter -> idle. Nothing carries over between calls
 * except the persisted {@link SyncStatus}.
 */
import type { SyncStatus } from '@schemas/sync-state/sync-state.schema.js'
import type {
  ReconcileOutcome,
  ReconcileResult,
  ReconciliationConfig,
  SyncItem,
} from '@root/types/sync.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  absSecondsToAudibleMs,
  audibleMsToAbsSeconds,
  detectAbsChange,
  detectAudibleChange,
  resolveConflict,
  shouldSuppressPush,
} from './reconciliation/index.js'

/**
 * Where the engine reads and updates per-item state.
 */
export interface SyncStatusSource {
  getStatus(asin: string): SyncStatus
}

interface ProposedPush {
  audibleMs: number | null
  absSeconds: number | null
  outcome: ReconcileOutcome
}

export class ReconciliationEngine {
  private readonly log: FastifyBaseLogger
  private readonly config: ReconciliationConfig

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly statuses: SyncStatusSource,
    config: ReconciliationConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.log = createServiceLogger(baseLog, 'RECONCILE')
    this.config = Object.freeze({ ...config })
  }

  /**
   * Reconciles one item given both sides' current positions.
   *
   * Mutates the item's status: last-seen positions and detection times of
   * changed sides, and the push time of a side that is pushed to. The push
   * time is recorded when the push is proposed, before the remote confirms it.
   *
   * @param item - Audiobookshelf-side reading for this pass
   * @param currentAudibleMs - Audible position, null when unknown
   * @param currentAbsSeconds - Audiobookshelf position, null when unknown
   * @returns At most one non-null push target
   */
  reconcile(
    item: SyncItem,
    currentAudibleMs: number | null,
    currentAbsSeconds: number | null,
  ): ReconcileResult {
    const { asin } = item
    const status = this.statuses.getStatus(asin)
    const now = this.now()
    const { toleranceSeconds } = this.config

    const audibleChange = detectAudibleChange(
      status,
      currentAudibleMs,
      toleranceSeconds,
      now,
    )
    if (audibleChange) {
      this.log.info(
        `Change detected on Audible for ${asin}: ${audibleChange.fromSeconds.toFixed(1)}s -> ${audibleChange.toSeconds.toFixed(1)}s`,
      )
    }

    const absChange = detectAbsChange(
      status,
      currentAbsSeconds,
      toleranceSeconds,
      item.absUpdatedAt,
      now,
    )
    if (absChange) {
      this.log.info(
        `Change detected on Audiobookshelf for ${asin}: ${absChange.fromSeconds.toFixed(1)}s -> ${absChange.toSeconds.toFixed(1)}s`,
      )
    }

    if (!audibleChange && !absChange) {
      return {
        pushToAudibleMs: null,
        pushToAbsSeconds: null,
        outcome: 'unchanged',
        suppressedByCooldown: false,
      }
    }

    if (this.config.mode !== 'bidirectional') {
      return {
        ...this.proposeOneWay(
          audibleChange !== null,
          absChange !== null,
          currentAudibleMs,
          currentAbsSeconds,
        ),
        suppressedByCooldown: false,
      }
    }

    const proposed = this.proposeBidirectional(
      status,
      audibleChange !== null,
      absChange !== null,
      currentAudibleMs,
      currentAbsSeconds,
    )
    return this.applyCooldown(status, proposed, now)
  }

  /**
   * Fixed-direction modes: a change on the source side goes to the
   * destination when the destination knows the book; anything else is ignored.
   */
  private proposeOneWay(
    audibleChanged: boolean,
    absChanged: boolean,
    currentAudibleMs: number | null,
    currentAbsSeconds: number | null,
  ): ProposedPush {
    const none: ProposedPush = {
      audibleMs: null,
      absSeconds: null,
      outcome: 'one-way',
    }

    if (this.config.mode === 'audible-to-abs') {
      if (audibleChanged && currentAudibleMs !== null && currentAbsSeconds !== null) {
        return { ...none, absSeconds: audibleMsToAbsSeconds(currentAudibleMs) }
      }
      return none
    }

    if (absChanged && currentAbsSeconds !== null && currentAudibleMs !== null) {
      return { ...none, audibleMs: absSecondsToAudibleMs(currentAbsSeconds) }
    }
    return none
  }

  private proposeBidirectional(
    status: SyncStatus,
    audibleChanged: boolean,
    absChanged: boolean,
    currentAudibleMs: number | null,
    currentAbsSeconds: number | null,
  ): ProposedPush {
    const { asin } = status

    // Only push to a side that knows the book, there is nothing to reconcile otherwise
    if (audibleChanged && !absChanged) {
      return {
        audibleMs: null,
        absSeconds:
          currentAudibleMs !== null && currentAbsSeconds !== null
            ? audibleMsToAbsSeconds(currentAudibleMs)
            : null,
        outcome: 'single-side',
      }
    }

    if (absChanged && !audibleChanged) {
      return {
        audibleMs:
          currentAbsSeconds !== null && currentAudibleMs !== null
            ? absSecondsToAudibleMs(currentAbsSeconds)
            : null,
        absSeconds: null,
        outcome: 'single-side',
      }
    }

    // Both sides moved, so both positions are known
    if (currentAudibleMs === null || currentAbsSeconds === null) {
      return { audibleMs: null, absSeconds: null, outcome: 'unchanged' }
    }

    const audibleSeconds = audibleMsToAbsSeconds(currentAudibleMs)
    this.log.info(
      `Conflict detected for ${asin}. Audible: ${audibleSeconds}s, Audiobookshelf: ${currentAbsSeconds}s`,
    )

    const resolution = resolveConflict({
      detectedAudibleAt: status.lastChangeDetectedAudibleAt,
      detectedAbsAt: status.lastChangeDetectedAbsAt,
      audibleSeconds,
      absSeconds: currentAbsSeconds,
      minTimeDeltaMs: this.config.conflictMinTimeDeltaMs,
    })

    const outcome: ReconcileOutcome =
      resolution.strategy === 'newer' ? 'conflict-newer' : 'conflict-furthest'
    const winnerName =
      resolution.winner === 'audible' ? 'Audible' : 'Audiobookshelf'
    this.log.info(
      resolution.strategy === 'newer'
        ? `Resolving conflict for ${asin}: ${winnerName} is newer by ${(Math.abs(resolution.timeDiffMs) / 1000).toFixed(1)}s`
        : `Resolving conflict for ${asin}: ${winnerName} is further ahead`,
    )

    if (resolution.winner === 'audible') {
      return { audibleMs: null, absSeconds: audibleSeconds, outcome }
    }
    return {
      audibleMs: absSecondsToAudibleMs(currentAbsSeconds),
      absSeconds: null,
      outcome,
    }
  }

  /**
   * Drops a proposed push when its side was pushed to recently, unless the
   * jump is large. A push that survives stamps the side's push time.
   */
  private applyCooldown(
    status: SyncStatus,
    proposed: ProposedPush,
    now: number,
  ): ReconcileResult {
    const { asin } = status
    const { cooldownMs } = this.config
    let pushToAudibleMs = proposed.audibleMs
    let pushToAbsSeconds = proposed.absSeconds
    let suppressedByCooldown = false

    if (pushToAudibleMs !== null) {
      this.log.info(
        `Preparing to push ${(pushToAudibleMs / 1000).toFixed(1)}s to Audible for ${asin}`,
      )
      const suppress = shouldSuppressPush({
        lastPushedAt: status.lastPushedToAudibleAt,
        now,
        cooldownMs,
        changeMs: Math.abs(pushToAudibleMs - status.lastSeenAudiblePositionMs),
      })
      if (suppress) {
        this.log.info(`Skipping push to Audible for ${asin} due to cooldown`)
        pushToAudibleMs = null
        suppressedByCooldown = true
      } else {
        status.lastPushedToAudibleAt = now
      }
    }

    if (pushToAbsSeconds !== null) {
      this.log.info(
        `Preparing to push ${pushToAbsSeconds.toFixed(1)}s to Audiobookshelf for ${asin}`,
      )
      const suppress = shouldSuppressPush({
        lastPushedAt: status.lastPushedToAbsAt,
        now,
        cooldownMs,
        changeMs:
          Math.abs(pushToAbsSeconds - status.lastSeenAbsPositionSeconds) * 1000,
      })
      if (suppress) {
        this.log.info(
          `Skipping push to Audiobookshelf for ${asin} due to cooldown`,
        )
        pushToAbsSeconds = null
        suppressedByCooldown = true
      } else {
        status.lastPushedToAbsAt = now
      }
    }

    return {
      pushToAudibleMs,
      pushToAbsSeconds,
      outcome: proposed.outcome,
      suppressedByCooldown,
    }
  }
}
