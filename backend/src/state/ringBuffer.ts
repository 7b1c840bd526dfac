/**
 * Fixed-capacity FIFO buffer. Pushing into a full buffer overwrites the oldest slot,
 * so the length can never exceed `capacity`.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.count;
  }

  push(item: T): T | undefined {
    const tail = (this.head + this.count) % this.capacity;
    if (this.count < this.capacity) {
      this.slots[tail] = item;
      this.count += 1;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** Keeps only the items matching `predicate`, preserving order. Returns how many were dropped. */
  retain(predicate: (item: T) => boolean): number {
    const kept = this.toArray().filter(predicate);
    const dropped = this.count - kept.length;
    if (dropped === 0) {
      return 0;
    }

    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
    for (const item of kept) {
      this.push(item);
    }
    return dropped;
  }

  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) {
        items.push(item);
      }
    }
    return items;
  }
}
