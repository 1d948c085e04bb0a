import type {
  AudibleLastPositionsResponse,
  AudibleLibraryItem,
} from '@schemas/audible/audible.schema.js'
import type { AudiblePosition } from '@root/types/progress-source.types.js'

/**
 * Parses Audible's `2024-03-01 18:22:05.123` style timestamps, which carry no
 * zone and are UTC. ISO strings with an offset are accepted as well.
 *
 * @returns Epoch ms, or undefined when the value cannot be parsed
 */
export function parseAudibleTimestamp(value?: string): number | undefined {
  if (!value) return undefined
  let iso = value.trim().replace(' ', 'T')
  if (!/(Z|[+-]\d{2}:?\d{2})$/.test(iso)) {
    iso = `${iso}Z`
  }
  const parsed = Date.parse(iso)
  return Number.isNaN(parsed) ? undefined : parsed
}

/**
 * Flattens either lastpositions response shape into a map keyed by ASIN.
 * Entries without a position are left out.
 */
export function extractPositions(
  response: AudibleLastPositionsResponse,
): Map<string, AudiblePosition> {
  const positions = new Map<string, AudiblePosition>()

  for (const entry of response.last_positions ?? []) {
    positions.set(entry.asin, { positionMs: entry.position_ms })
  }

  for (const annot of response.asin_last_position_heard_annots ?? []) {
    const heard = annot.last_position_heard
    if (heard?.position_ms === undefined) continue
    positions.set(annot.asin, {
      positionMs: heard.position_ms,
      updatedAt: parseAudibleTimestamp(heard.last_updated),
    })
  }

  return positions
}

/** Partially listened: started, not finished */
export function isInProgress(item: AudibleLibraryItem): boolean {
  const percent = item.percent_complete
  return typeof percent === 'number' && percent > 0 && percent < 100
}
