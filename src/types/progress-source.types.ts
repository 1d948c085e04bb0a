/**
 * Contracts the sync driver uses to talk to the two progress services. Both
 * are implemented by HTTP clients; tests substitute in-memory fakes.
 *
 * Implementations never throw: a failed call is logged and yields an empty
 * result (or null/false) for this cycle.
 */

export interface AudiblePosition {
  positionMs: number
  /** When Audible recorded the position, epoch ms, when it reported it */
  updatedAt?: number
}

export interface AudibleProgressSource {
  isReady(): boolean
  /** Last heard positions for the given ASINs; unknown ASINs are absent */
  getLastPositions(asins: string[]): Promise<Map<string, AudiblePosition>>
  updatePosition(asin: string, positionMs: number): Promise<boolean>
  /** ASINs most recently opened in the Audible library, newest first */
  getRecentlyPlayed(limit: number): Promise<string[]>
  /** ASINs purchased at or after `afterMs` */
  getNewlyPurchased(afterMs: number): Promise<string[]>
  /** ASINs partially listened to, from a paged library scan */
  deepScanInProgress(): Promise<string[]>
}

export interface AbsProgress {
  asin: string
  itemId: string
  positionSeconds: number
  durationSeconds?: number
  /** Audiobookshelf's lastUpdate, epoch ms, 0 when absent */
  updatedAt: number
}

export interface AbsItemProgress {
  positionSeconds: number
  durationSeconds?: number
  updatedAt: number
  isFinished: boolean
}

export interface AudiobookshelfProgressSource {
  isReady(): boolean
  /** In-progress items keyed by ASIN */
  getInProgress(): Promise<Map<string, AbsProgress>>
  updateProgress(itemId: string, positionSeconds: number): Promise<boolean>
  /** Progress of one library item, null when there is none */
  getItemProgress(itemId: string): Promise<AbsItemProgress | null>
  /** Library item id for an ASIN, null when no library holds it */
  resolveItemId(asin: string): Promise<string | null>
}
