import type { SyncMode } from './config.types.js'

/**
 * One candidate's Audiobookshelf-side reading for a single pass. Built fresh
 * by the sync driver each cycle and discarded afterwards.
 */
export interface SyncItem {
  asin: string
  /** Current Audiobookshelf position in seconds, null when unknown */
  absPositionSeconds: number | null
  /** Audiobookshelf's own lastUpdate for this progress, epoch ms, 0 when unknown */
  absUpdatedAt: number
  durationSeconds?: number
  absItemId?: string
}

/**
 * Immutable settings for the reconciliation engine, in the engine's units.
 */
export interface ReconciliationConfig {
  readonly toleranceSeconds: number
  readonly cooldownMs: number
  readonly conflictMinTimeDeltaMs: number
  readonly mode: SyncMode
}

export type ReconcileOutcome =
  | 'unchanged'
  | 'one-way'
  | 'single-side'
  | 'conflict-newer'
  | 'conflict-furthest'

export interface ReconcileResult {
  /** New Audible position in milliseconds, null when nothing is pushed */
  pushToAudibleMs: number | null
  /** New Audiobookshelf position in seconds, null when nothing is pushed */
  pushToAbsSeconds: number | null
  outcome: ReconcileOutcome
  /** Set when a proposed push was dropped by the cooldown */
  suppressedByCooldown: boolean
}

export interface SyncStateSummary {
  loaded: boolean
  readOnly: boolean
  watchlistSize: number
  trackedItems: number
  lastSuccessfulSync: number
  lastDeepScan: number
  lastLibraryDiscovery: number
}

export interface SyncPassResult {
  candidates: number
  skipped: number
  pushedToAudible: number
  pushedToAbs: number
  failedPushes: number
  saved: boolean
}

export interface DiscoveryResult {
  deepScanned: number | null
  discovered: number | null
  saved: boolean
}
