export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

/**
 * Which way positions are allowed to flow.
 *
 * - `bidirectional`: either side may win
 * - `audible-to-abs`: Audible is the source, Audiobookshelf only receives
 * - `abs-to-audible`: Audiobookshelf is the source, Audible only receives
 */
export const SYNC_MODES = [
  'bidirectional',
  'audible-to-abs',
  'abs-to-audible',
] as const

export type SyncMode = (typeof SYNC_MODES)[number]

export interface Config {
  // System Config
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  httpServerEnabled: boolean
  httpServerToken: string
  requestTimeoutSeconds: number
  dryRun: boolean
  // Audiobookshelf Config
  absBaseUrl: string
  absToken: string
  absUserId: string
  absLibraryId: string
  // Audible Config
  audibleLocale: string
  audibleAuthPath: string
  audibleAuthJsonB64: string
  audibleBatchSize: number
  audibleLibraryDiscoveryIntervalSeconds: number
  audibleDeepScanIntervalSeconds: number
  deepScanMaxInProgress: number
  audibleRecentlyPlayedLimit: number
  // Persistence Config
  statePath: string
  persistEnabled: boolean
  // Sync Config
  syncIntervalSeconds: number
  syncToleranceSeconds: number
  syncCooldownSeconds: number
  syncConflictMinTimeDeltaSeconds: number
  watchlistMaxSize: number
  syncMode: SyncMode
  fetchConcurrency: number
}
