import type { Config } from '@root/types/config.types.js'
import type { ReconciliationConfig } from '@root/types/sync.types.js'

/**
 * Converts the seconds-based application settings into the engine's frozen
 * configuration value.
 */
export function buildReconciliationConfig(
  config: Pick<
    Config,
    | 'syncToleranceSeconds'
    | 'syncCooldownSeconds'
    | 'syncConflictMinTimeDeltaSeconds'
    | 'syncMode'
  >,
): ReconciliationConfig {
  return Object.freeze({
    toleranceSeconds: config.syncToleranceSeconds,
    cooldownMs: config.syncCooldownSeconds * 1000,
    conflictMinTimeDeltaMs: config.syncConflictMinTimeDeltaSeconds * 1000,
    mode: config.syncMode,
  })
}

export function audibleMsToAbsSeconds(positionMs: number): number {
  return positionMs / 1000
}

export function absSecondsToAudibleMs(positionSeconds: number): number {
  return Math.trunc(positionSeconds * 1000)
}
