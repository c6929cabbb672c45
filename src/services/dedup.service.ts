/**
 * Capacity-bounded, insertion-ordered set of identifiers.
 *
 * Backed by a Map, which iterates in insertion order, so the oldest entry is
 * always `keys().next()`. Every method is synchronous: on Node's single event
 * loop an admit (membership test, evict, insert) cannot interleave with
 * another handler's admit.
 *
 * Best effort only: an id evicted before its duplicate arrives is admitted
 * again.
 */
export class DedupLedger {
  private readonly entries = new Map<string, true>();

  constructor(
    public readonly name: string,
    public readonly capacity: number
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ledger capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  seen(id: string): boolean {
    return this.entries.has(id);
  }

  admit(id: string): void {
    this.admitIfAbsent(id);
  }

  /** Returns true when the id was new and has been admitted. */
  admitIfAbsent(id: string): boolean {
    if (this.entries.has(id)) {
      return false;
    }

    if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(id, true);
    return true;
  }
}
