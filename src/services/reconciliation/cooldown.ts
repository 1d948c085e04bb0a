/**
 * A push that moves a side by at least this much goes out even inside the
 * cooldown window.
 */
export const COOLDOWN_OVERRIDE_MS = 300_000

export interface CooldownCheck {
  lastPushedAt: number
  now: number
  cooldownMs: number
  /** Distance between the proposed position and the side's last-seen one */
  changeMs: number
}

export function isInCooldown(
  lastPushedAt: number,
  now: number,
  cooldownMs: number,
): boolean {
  return now - lastPushedAt < cooldownMs
}

/**
 * True when a proposed push should be dropped: the side was pushed to within
 * the cooldown window and the change is below {@link COOLDOWN_OVERRIDE_MS}.
 */
export function shouldSuppressPush(check: CooldownCheck): boolean {
  return (
    isInCooldown(check.lastPushedAt, check.now, check.cooldownMs) &&
    check.changeMs < COOLDOWN_OVERRIDE_MS
  )
}
