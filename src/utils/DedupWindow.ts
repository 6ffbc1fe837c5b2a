export const DEFAULT_DEDUP_CAPACITY = 1000;

/**
 * Bounded set of recently seen message IDs.
 *
 * Feishu delivers events at least once, so the same message can arrive
 * twice in quick succession. When the window grows past its capacity, half
 * of its members are dropped in a single pass, oldest-inserted first. A
 * duplicate admit does not refresh an ID's position, so this is not LRU.
 *
 * Every method is synchronous: the membership check, the insertion and the
 * eviction pass in `admit` run as one uninterrupted step on the owning thread.
 */
export class DedupWindow {
  private readonly seen: Set<string> = new Set();
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_DEDUP_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Dedup capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Record `id` and return true, or return false if it is already in the window
   */
  admit(id: string): boolean {
    if (this.seen.has(id)) {
      return false;
    }

    this.seen.add(id);

    if (this.seen.size > this.capacity) {
      this.evict(id);
    }

    return true;
  }

  has(id: string): boolean {
    return this.seen.has(id);
  }

  get size(): number {
    return this.seen.size;
  }

  private evict(keep: string): void {
    let remaining = Math.floor(this.seen.size / 2);

    for (const id of this.seen) {
      if (remaining === 0) break;
      if (id === keep) continue;
      this.seen.delete(id);
      remaining--;
    }
  }
}
