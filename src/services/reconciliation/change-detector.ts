import type { SyncStatus } from '@schemas/sync-state/sync-state.schema.js'

export interface PositionChange {
  /** Previous last-seen position, in seconds */
  fromSeconds: number
  /** Newly observed position, in seconds */
  toSeconds: number
}

/**
 * Compares the current Audible position against the last one seen. When it
 * moved by more than the tolerance, the status is updated in place: last-seen
 * becomes the new position and the detection time becomes `now`.
 *
 * @returns The change, or null when the position is unknown or within tolerance
 */
export function detectAudibleChange(
  status: SyncStatus,
  currentMs: number | null,
  toleranceSeconds: number,
  now: number,
): PositionChange | null {
  if (currentMs === null) return null

  const fromSeconds = status.lastSeenAudiblePositionMs / 1000
  const toSeconds = currentMs / 1000
  if (Math.abs(toSeconds - fromSeconds) <= toleranceSeconds) return null

  status.lastSeenAudiblePositionMs = currentMs
  status.lastChangeDetectedAudibleAt = now
  return { fromSeconds, toSeconds }
}

/**
 * Audiobookshelf counterpart of {@link detectAudibleChange}. The detection
 * time is Audiobookshelf's own update timestamp when it reported one, which
 * may be earlier than `now`.
 */
export function detectAbsChange(
  status: SyncStatus,
  currentSeconds: number | null,
  toleranceSeconds: number,
  reportedUpdatedAt: number,
  now: number,
): PositionChange | null {
  if (currentSeconds === null) return null

  const fromSeconds = status.lastSeenAbsPositionSeconds
  if (Math.abs(currentSeconds - fromSeconds) <= toleranceSeconds) return null

  status.lastSeenAbsPositionSeconds = currentSeconds
  status.lastChangeDetectedAbsAt = reportedUpdatedAt || now
  return { fromSeconds, toSeconds: currentSeconds }
}
