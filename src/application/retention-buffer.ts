export const DEFAULT_RETENTION_CAPACITY = 100;

/**
 * Fixed-capacity history, newest first.
 *
 * Backed by a ring of `capacity` slots: `unshift()` writes one slot behind
 * the current head, so once full the slot it lands on is the oldest entry,
 * which is overwritten. Insertion is O(1) regardless of fill level.
 */
export class RetentionBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private readonly cap: number;
  private head = 0;
  private count = 0;

  constructor(capacity: number = DEFAULT_RETENTION_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RetentionBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.cap = capacity;
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  /** Insert at the front. Evicts the oldest entry when full. */
  unshift(item: T): void {
    this.head = (this.head - 1 + this.cap) % this.cap;
    this.slots[this.head] = item;
    if (this.count < this.cap) this.count++;
  }

  /** Entries newest → oldest. Returns a fresh array. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.cap];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.cap;
  }
}
