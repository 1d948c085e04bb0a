export {
  detectAbsChange,
  detectAudibleChange,
  type PositionChange,
} from './change-detector.js'
export {
  absSecondsToAudibleMs,
  audibleMsToAbsSeconds,
  buildReconciliationConfig,
} from './config.js'
export {
  type ConflictResolution,
  type ConflictWinner,
  resolveConflict,
} from './conflict-resolver.js'
export { COOLDOWN_OVERRIDE_MS, shouldSuppressPush } from './cooldown.js'
