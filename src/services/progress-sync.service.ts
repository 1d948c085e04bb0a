/**
 * Progress Sync Service
 *
 * Drives the two periodic jobs. The sync pass gathers candidates from the
 * watchlist and both services, reconciles each one and pushes the result.
 * The discovery pass widens the watchlist from the Audible library.
 *
 * Remote reads happen before the store is entered; reconciliation, pushes
 * and every store mutation run inside one exclusive unit ending in a save.
 * The watchlist is touched only once every candidate has been reconciled.
 */
import type {
  AudibleProgressSource,
  AudiobookshelfProgressSource,
} from '@root/types/progress-source.types.js'
import type {
  DiscoveryResult,
  SyncPassResult,
} from '@root/types/sync.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  buildSyncItems,
  collectCandidates,
} from './progress-sync/candidate-builder.js'
import { applyPushes } from './progress-sync/update-applier.js'
import type { ReconciliationEngine } from './reconciliation.service.js'
import type { SyncStateStore } from './sync-state.service.js'

export interface ProgressSyncOptions {
  recentlyPlayedLimit: number
  /** 0 disables the deep scan */
  deepScanIntervalMs: number
  discoveryIntervalMs: number
  fetchConcurrency: number
}

export class ProgressSyncService {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly store: SyncStateStore,
    private readonly engine: ReconciliationEngine,
    private readonly audible: AudibleProgressSource,
    private readonly abs: AudiobookshelfProgressSource,
    private readonly options: ProgressSyncOptions,
    private readonly now: () => number = Date.now,
  ) {
    this.log = createServiceLogger(baseLog, 'PROGRESS_SYNC')
  }

  /**
   * One sync cycle over the watchlist plus everything currently active on
   * either side. Skipped, without counting as a completed pass, until both
   * clients are ready.
   */
  async runSyncPass(): Promise<SyncPassResult> {
    if (!this.audible.isReady() || !this.abs.isReady()) {
      this.log.debug('Waiting for both services to be ready, skipping sync')
      return {
        candidates: 0,
        skipped: 0,
        pushedToAudible: 0,
        pushedToAbs: 0,
        failedPushes: 0,
        saved: false,
      }
    }

    const [inProgress, recentlyPlayed] = await Promise.all([
      this.abs.getInProgress(),
      this.audible.getRecentlyPlayed(this.options.recentlyPlayedLimit),
    ])

    const candidates = collectCandidates(
      this.store.getWatchlist(),
      inProgress.keys(),
      recentlyPlayed,
    )

    const result: SyncPassResult = {
      candidates: candidates.length,
      skipped: 0,
      pushedToAudible: 0,
      pushedToAbs: 0,
      failedPushes: 0,
      saved: false,
    }

    if (candidates.length === 0) {
      this.log.debug('No candidates to sync')
      result.saved = await this.store.exclusive(async () => {
        this.store.markSyncCompleted(this.now())
        return this.store.save()
      })
      return result
    }

    this.log.info(`Syncing ${candidates.length} candidates`)
    const [audiblePositions, built] = await Promise.all([
      this.audible.getLastPositions(candidates),
      buildSyncItems(
        candidates,
        inProgress,
        this.abs,
        this.options.fetchConcurrency,
        this.log,
      ),
    ])
    result.skipped = built.unresolved.length

    result.saved = await this.store.exclusive(async () => {
      for (const item of built.items) {
        try {
          const position = audiblePositions.get(item.asin)
          const decision = this.engine.reconcile(
            item,
            position?.positionMs ?? null,
            item.absPositionSeconds,
          )

          const applied = await applyPushes(
            item,
            decision,
            this.audible,
            this.abs,
            this.log,
          )
          if (applied.attempted === 0) continue

          this.store.recordPushed(item.asin, applied.pushed)
          this.store.recordPushResult(item.asin, applied.failed === 0)
          if (applied.pushed.audibleMs !== undefined) result.pushedToAudible++
          if (applied.pushed.absSeconds !== undefined) result.pushedToAbs++
          result.failedPushes += applied.failed
        } catch (error) {
          this.log.error({ error }, `Failed to sync ${item.asin}`)
          this.store.recordPushResult(item.asin, false)
          result.failedPushes++
        }
      }

      // Touched after reconciling, so a candidate evicted here leaves with
      // its status instead of being reconciled against a fresh one
      this.store.touchWatchlist(recentlyPlayed)
      this.store.touchWatchlist(inProgress.keys())

      this.store.markSyncCompleted(this.now())
      return this.store.save()
    })

    this.log.info(
      `Sync pass complete. Pushed to Audible: ${result.pushedToAudible}, to Audiobookshelf: ${result.pushedToAbs}, failed: ${result.failedPushes}, skipped: ${result.skipped}`,
    )
    return result
  }

  /**
   * Slow discovery: a periodic deep scan of the Audible library and a check
   * for recent purchases, each saved on its own.
   */
  async runDiscoveryPass(): Promise<DiscoveryResult> {
    const result: DiscoveryResult = {
      deepScanned: null,
      discovered: null,
      saved: false,
    }
    if (!this.audible.isReady()) {
      this.log.debug('Audible is not ready, skipping discovery')
      return result
    }

    const { deepScanIntervalMs, discoveryIntervalMs } = this.options

    const deepScanStart = this.now()
    if (
      deepScanIntervalMs > 0 &&
      deepScanStart - this.store.getLastDeepScan() > deepScanIntervalMs
    ) {
      this.log.info('Starting deep scan')
      const found = await this.audible.deepScanInProgress()
      result.deepScanned = found.length
      const saved = await this.store.exclusive(async () => {
        this.store.touchWatchlist(found)
        this.store.markDeepScan(deepScanStart)
        return this.store.save()
      })
      if (saved) result.saved = true
      if (found.length > 0) {
        this.log.info(`Deep scan added ${found.length} items to the watchlist`)
      }
    }

    const discoveryStart = this.now()
    if (
      discoveryStart - this.store.getLastLibraryDiscovery() >
      discoveryIntervalMs
    ) {
      this.log.debug('Checking for new purchases')
      const purchased = await this.audible.getNewlyPurchased(
        discoveryStart - discoveryIntervalMs * 2,
      )
      result.discovered = purchased.length
      const saved = await this.store.exclusive(async () => {
        this.store.touchWatchlist(purchased)
        this.store.markLibraryDiscovery(discoveryStart)
        return this.store.save()
      })
      if (saved) result.saved = true
      if (purchased.length > 0) {
        this.log.info(
          `Added ${purchased.length} recent purchases to the watchlist`,
        )
      }
    }

    return result
  }
}
