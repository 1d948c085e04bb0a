export type ConflictWinner = 'audible' | 'abs'

export interface ConflictInput {
  detectedAudibleAt: number
  detectedAbsAt: number
  audibleSeconds: number
  absSeconds: number
  minTimeDeltaMs: number
}

export interface ConflictResolution {
  winner: ConflictWinner
  /** `newer` when detection times decided it, `furthest` when positions did */
  strategy: 'newer' | 'furthest'
  /** Audible detection time minus Audiobookshelf detection time */
  timeDiffMs: number
}

/**
 * Decides which side wins when both moved since the last pass.
 *
 * Detection times at least `minTimeDeltaMs` apart are trusted and the later
 * side wins. Closer than that, the side further into the book wins; equal
 * positions go to Audiobookshelf. Rewinds get no special treatment.
 */
export function resolveConflict(input: ConflictInput): ConflictResolution {
  const timeDiffMs = input.detectedAudibleAt - input.detectedAbsAt

  if (timeDiffMs !== 0 && Math.abs(timeDiffMs) >= input.minTimeDeltaMs) {
    return {
      winner: timeDiffMs > 0 ? 'audible' : 'abs',
      strategy: 'newer',
      timeDiffMs,
    }
  }

  return {
    winner: input.audibleSeconds > input.absSeconds ? 'audible' : 'abs',
    strategy: 'furthest',
    timeDiffMs,
  }
}
