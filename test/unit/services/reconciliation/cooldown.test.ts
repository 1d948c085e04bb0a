import {
  COOLDOWN_OVERRIDE_MS,
  isInCooldown,
  shouldSuppressPush,
} from '@services/reconciliation/cooldown.js'
import { describe, expect, it } from 'vitest'

const NOW = Date.UTC(2024, 5, 1)

describe('cooldown', () => {
  describe('isInCooldown', () => {
    it('is true strictly inside the window', () => {
      expect(isInCooldown(NOW - 59_999, NOW, 60_000)).toBe(true)
    })

    it('is false once the window has elapsed', () => {
      expect(isInCooldown(NOW - 60_000, NOW, 60_000)).toBe(false)
    })

    it('is false for a side that was never pushed to', () => {
      expect(isInCooldown(0, NOW, 60_000)).toBe(false)
    })
  })

  describe('shouldSuppressPush', () => {
    it('suppresses a small change inside the window', () => {
      expect(
        shouldSuppressPush({
          lastPushedAt: NOW - 1_000,
          now: NOW,
          cooldownMs: 60_000,
          changeMs: COOLDOWN_OVERRIDE_MS - 1,
        }),
      ).toBe(true)
    })

    it('lets a change at the override threshold through', () => {
      expect(
        shouldSuppressPush({
          lastPushedAt: NOW - 1_000,
          now: NOW,
          cooldownMs: 60_000,
          changeMs: COOLDOWN_OVERRIDE_MS,
        }),
      ).toBe(false)
    })

    it('never suppresses outside the window', () => {
      expect(
        shouldSuppressPush({
          lastPushedAt: NOW - 120_000,
          now: NOW,
          cooldownMs: 60_000,
          changeMs: 10,
        }),
      ).toBe(false)
    })
  })
})
