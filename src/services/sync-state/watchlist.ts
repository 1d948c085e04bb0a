/**
 * Watchlist
 *
 * Bounded recency-ordered set of ASINs. The least recently touched entry sits
 * at the head, the most recent at the tail. Touching an entry that is already
 * present moves it to the tail; overflow is trimmed from the head once per
 * batch so ids touched together stay adjacent and in the order supplied.
 */
export class Watchlist {
  // Set iteration follows insertion order, which is the recency order here
  private readonly entries = new Set<string>()

  constructor(private readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Watchlist max size must be >= 1, got ${maxSize}`)
    }
  }

  /**
   * Marks ids as recently used, then trims the head back to the bound.
   *
   * @returns The ids evicted by the trim, oldest first
   */
  touch(ids: Iterable<string>): string[] {
    for (const id of ids) {
      this.entries.delete(id)
      this.entries.add(id)
    }

    const evicted: string[] = []
    for (const id of this.entries) {
      if (this.entries.size <= this.maxSize) break
      this.entries.delete(id)
      evicted.push(id)
    }
    return evicted
  }

  has(id: string): boolean {
    return this.entries.has(id)
  }

  get size(): number {
    return this.entries.size
  }

  toArray(): string[] {
    return [...this.entries]
  }
}
