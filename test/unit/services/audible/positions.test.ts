import {
  extractPositions,
  isInProgress,
  parseAudibleTimestamp,
} from '@services/audible/positions.js'
import { describe, expect, it } from 'vitest'

describe('Audible positions', () => {
  describe('parseAudibleTimestamp', () => {
    it('reads zoneless timestamps as UTC', () => {
      expect(parseAudibleTimestamp('2024-07-04 06:30:00.250')).toBe(
        Date.UTC(2024, 6, 4, 6, 30, 0, 250),
      )
    })

    it('honours an explicit offset', () => {
      expect(parseAudibleTimestamp('2024-07-04T08:30:00+02:00')).toBe(
        Date.UTC(2024, 6, 4, 6, 30),
      )
    })

    it('returns undefined for missing or garbled values', () => {
      expect(parseAudibleTimestamp(undefined)).toBeUndefined()
      expect(parseAudibleTimestamp('yesterday-ish')).toBeUndefined()
    })
  })

  describe('extractPositions', () => {
    it('reads the plain last_positions shape', () => {
      const positions = extractPositions({
        last_positions: [{ asin: 'B0PLAIN001', position_ms: 9_000 }],
      })

      expect(positions.get('B0PLAIN001')).toEqual({ positionMs: 9_000 })
    })

    it('skips annotations without a position', () => {
      const positions = extractPositions({
        asin_last_position_heard_annots: [
          {
            asin: 'B0HEARD001',
            last_position_heard: {
              position_ms: 12_000,
              last_updated: '2024-07-04 06:30:00',
            },
          },
          { asin: 'B0NEVER001', last_position_heard: { status: 'DoesNotExist' } },
          { asin: 'B0NEVER002' },
        ],
      })

      expect([...positions.keys()]).toEqual(['B0HEARD001'])
      expect(positions.get('B0HEARD001')).toEqual({
        positionMs: 12_000,
        updatedAt: Date.UTC(2024, 6, 4, 6, 30),
      })
    })
  })

  it('treats only started, unfinished titles as in progress', () => {
    expect(isInProgress({ asin: 'a', percent_complete: 0 })).toBe(false)
    expect(isInProgress({ asin: 'a', percent_complete: 0.4 })).toBe(true)
    expect(isInProgress({ asin: 'a', percent_complete: 100 })).toBe(false)
    expect(isInProgress({ asin: 'a', percent_complete: null })).toBe(false)
  })
})
