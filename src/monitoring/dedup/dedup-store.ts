/**
 * Bounded set of already-seen transaction hashes.
 *
 * Eviction follows insertion order: once the store grows past its capacity the
 * oldest inserted hashes are dropped first. A repeated hash keeps its original
 * position, so a source that keeps re-returning the same transaction cannot pin
 * it in the window forever.
 */
export class DedupStore {
  private readonly seenHashes: Set<string> = new Set<string>();

  public constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Dedup capacity must be a positive integer, got ${String(capacity)}`);
    }
  }

  public isNew(hash: string): boolean {
    if (this.seenHashes.has(hash)) {
      return false;
    }

    this.seenHashes.add(hash);
    this.evictOverflow();

    return true;
  }

  public get size(): number {
    return this.seenHashes.size;
  }

  private evictOverflow(): void {
    while (this.seenHashes.size > this.capacity) {
      const oldest: IteratorResult<string> = this.seenHashes.values().next();

      if (oldest.done === true) {
        return;
      }

      this.seenHashes.delete(oldest.value);
    }
  }
}
