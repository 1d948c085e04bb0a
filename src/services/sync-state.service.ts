/**
 * Sync State Store
 *
 * Owns the persisted sync state: the watchlist, one status per tracked ASIN and
 * the aggregate pass timestamps. State is loaded wholesale at startup and
 * written wholesale after each successful pass.
 *
 * Responsible for:
 * - Loading the snapshot, falling back to empty state when it is missing or corrupt
 * - Atomic, lock-guarded snapshot writes that skip on contention
 * - Switching to read-only for the rest of the process after a failed write
 * - Lazily creating per-item statuses and dropping them when the watchlist evicts their id
 * - Serialising mutation-plus-save units across the periodic jobs
 */
import { readFile } from 'node:fs/promises'
import {
  createSyncStatus,
  type SyncState,
  SyncStateSchema,
  type SyncStatus,
} from '@schemas/sync-state/sync-state.schema.js'
import type { SyncStateSummary } from '@root/types/sync.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'
import {
  isErrnoCode,
  writeSnapshotAtomic,
} from './sync-state/snapshot-writer.js'
import { Watchlist } from './sync-state/watchlist.js'

export interface SyncStateStoreOptions {
  statePath: string
  persistEnabled: boolean
  watchlistMaxSize: number
}

/** Positions just written to a side, recorded once the remote accepted them */
export interface PushedPositions {
  audibleMs?: number
  absSeconds?: number
}

export class SyncStateStore {
  private readonly log: FastifyBaseLogger
  private watchlist: Watchlist
  private readonly statuses = new Map<string, SyncStatus>()
  private lastSuccessfulSync = 0
  private lastDeepScan = 0
  private lastLibraryDiscovery = 0
  private readOnly = false
  private loaded = false
  private readonly mutex = pLimit(1)

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly options: SyncStateStoreOptions,
  ) {
    this.log = createServiceLogger(baseLog, 'SYNC_STATE')
    this.watchlist = new Watchlist(options.watchlistMaxSize)
  }

  get isLoaded(): boolean {
    return this.loaded
  }

  get isReadOnly(): boolean {
    return this.readOnly
  }

  /**
   * Reads the snapshot from disk. A missing, unreadable or invalid file leaves
   * the store empty; startup never fails because of it.
   */
  async load(): Promise<void> {
    const { statePath } = this.options

    try {
      let raw: string
      try {
        raw = await readFile(statePath, 'utf8')
      } catch (error) {
        if (isErrnoCode(error, 'ENOENT')) {
          this.log.info(`No state file found at ${statePath}, starting fresh`)
        } else {
          this.log.error(
            { error },
            `Failed to read state from ${statePath}, starting fresh`,
          )
        }
        return
      }

      let parsed: unknown
      try {
        parsed = JSON.parse(raw)
      } catch (error) {
        this.log.error(
          { error },
          `State file ${statePath} is not valid JSON, starting fresh`,
        )
        return
      }

      const result = SyncStateSchema.safeParse(parsed)
      if (!result.success) {
        this.log.error(
          { issues: result.error.issues },
          `State file ${statePath} failed validation, starting fresh`,
        )
        return
      }

      this.apply(result.data)
      this.log.info(
        `Loaded state with ${this.watchlist.size} watchlist entries and ${this.statuses.size} tracked items`,
      )
    } finally {
      this.loaded = true
    }
  }

  /**
   * Writes the current state as a full snapshot.
   *
   * @returns true when a snapshot was written
   */
  async save(): Promise<boolean> {
    if (!this.options.persistEnabled || this.readOnly) {
      return false
    }

    const { statePath } = this.options
    // Serialised before the first await so concurrent mutations cannot leak in
    const contents = JSON.stringify(this.toSnapshot(), null, 2)

    try {
      const result = await writeSnapshotAtomic(statePath, contents, this.log)
      if (result === 'locked') {
        this.log.warn(
          'Could not acquire lock for state save, skipping this cycle',
        )
        return false
      }
      this.log.debug(`Saved state to ${statePath}`)
      return true
    } catch (error) {
      this.readOnly = true
      this.log.error(
        { error },
        `Failed to save state to ${statePath}, persistence disabled until restart`,
      )
      return false
    }
  }

  /**
   * Runs `fn` after every previously queued unit has settled. Both periodic
   * jobs wrap their state mutations and the following save in here.
   */
  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex(fn)
  }

  /**
   * Returns the status for an ASIN, creating a zeroed one on first access.
   */
  getStatus(asin: string): SyncStatus {
    let status = this.statuses.get(asin)
    if (!status) {
      status = createSyncStatus(asin)
      this.statuses.set(asin, status)
    }
    return status
  }

  /**
   * Marks ASINs as recently active. Statuses of ids trimmed from the head of
   * the watchlist are dropped with them.
   *
   * @returns The evicted ASINs
   */
  touchWatchlist(asins: Iterable<string>): string[] {
    const evicted = this.watchlist.touch(asins)
    for (const asin of evicted) {
      this.statuses.delete(asin)
    }
    if (evicted.length > 0) {
      this.log.debug(`Evicted ${evicted.length} items from the watchlist`)
    }
    return evicted
  }

  getWatchlist(): string[] {
    return this.watchlist.toArray()
  }

  /**
   * Moves the last-seen position of each pushed side to the value just written,
   * so the next pass does not read our own write back as a change.
   */
  recordPushed(asin: string, pushed: PushedPositions): void {
    const status = this.getStatus(asin)
    if (pushed.audibleMs !== undefined) {
      status.lastSeenAudiblePositionMs = pushed.audibleMs
    }
    if (pushed.absSeconds !== undefined) {
      status.lastSeenAbsPositionSeconds = pushed.absSeconds
    }
  }

  recordPushResult(asin: string, ok: boolean): void {
    const status = this.getStatus(asin)
    status.lastSyncResult = ok ? 'ok' : 'error'
    status.errorCount = ok ? 0 : status.errorCount + 1
  }

  getLastSuccessfulSync(): number {
    return this.lastSuccessfulSync
  }

  getLastDeepScan(): number {
    return this.lastDeepScan
  }

  getLastLibraryDiscovery(): number {
    return this.lastLibraryDiscovery
  }

  markSyncCompleted(at: number = Date.now()): void {
    this.lastSuccessfulSync = at
  }

  markDeepScan(at: number = Date.now()): void {
    this.lastDeepScan = at
  }

  markLibraryDiscovery(at: number = Date.now()): void {
    this.lastLibraryDiscovery = at
  }

  getSummary(): SyncStateSummary {
    return {
      loaded: this.loaded,
      readOnly: this.readOnly,
      watchlistSize: this.watchlist.size,
      trackedItems: this.statuses.size,
      lastSuccessfulSync: this.lastSuccessfulSync,
      lastDeepScan: this.lastDeepScan,
      lastLibraryDiscovery: this.lastLibraryDiscovery,
    }
  }

  toSnapshot(): SyncState {
    const items: Record<string, SyncStatus> = {}
    for (const [asin, status] of this.statuses) {
      items[asin] = { ...status }
    }
    return {
      watchlist: this.watchlist.toArray(),
      items,
      lastSuccessfulSync: this.lastSuccessfulSync,
      lastDeepScan: this.lastDeepScan,
      lastLibraryDiscovery: this.lastLibraryDiscovery,
    }
  }

  private apply(state: SyncState): void {
    this.watchlist = new Watchlist(this.options.watchlistMaxSize)
    this.watchlist.touch(state.watchlist)

    // Statuses without a watchlist entry would never be evicted again
    this.statuses.clear()
    for (const [asin, status] of Object.entries(state.items)) {
      if (this.watchlist.has(asin)) {
        this.statuses.set(asin, { ...status, asin })
      }
    }

    this.lastSuccessfulSync = state.lastSuccessfulSync
    this.lastDeepScan = state.lastDeepScan
    this.lastLibraryDiscovery = state.lastLibraryDiscovery
  }
}
