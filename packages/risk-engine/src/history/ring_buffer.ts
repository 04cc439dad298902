// Fixed-capacity FIFO of the most recent items, in arrival order.
// push is O(1); once full the oldest item is overwritten.
// Items are stored by reference and never mutated here.

export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0; // index of the oldest item
  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`invalid ring buffer capacity: ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  push(item: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  latest(): T | null {
    if (!this.count) return null;
    return this.at(this.count - 1);
  }

  /** Last min(k, size) items, oldest first. */
  last(k: number): T[] {
    const n = Number.isFinite(k) ? Math.max(0, Math.min(Math.floor(k), this.count)) : 0;
    const out: T[] = [];
    for (let i = this.count - n; i < this.count; i++) out.push(this.at(i));
    return out;
  }

  // i is a logical position: 0 = oldest, count-1 = newest
  private at(i: number): T {
    const v = this.slots[(this.head + i) % this.capacity];
    if (v === undefined) throw new Error(`ring buffer slot ${i} is empty`);
    return v;
  }
}
