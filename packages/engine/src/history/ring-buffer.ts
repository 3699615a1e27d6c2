/**
 * Fixed-capacity FIFO buffer.
 *
 * Storage is a circular array: `push` is O(1), the oldest entry is overwritten
 * once the buffer is full, and reads return chronological copies.
 */
export class RingBuffer<T extends NonNullable<unknown>> {
  private readonly items: Array<T | undefined>;
  private start = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.size;
  }

  /**
   * Append, evicting the oldest entry when full. Returns the evicted entry, if any.
   */
  push(item: T): T | undefined {
    if (this.size < this.capacity) {
      this.items[(this.start + this.size) % this.capacity] = item;
      this.size++;
      return undefined;
    }

    const evicted = this.items[this.start];
    this.items[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  /**
   * Most recent `count` entries, oldest first. Returns fewer when fewer are stored.
   */
  last(count: number): T[] {
    const n = Math.max(0, Math.min(count, this.size));
    const out: T[] = [];
    for (let i = this.size - n; i < this.size; i++) {
      out.push(this.at(i));
    }
    return out;
  }

  toArray(): T[] {
    return this.last(this.size);
  }

  latest(): T | undefined {
    return this.size === 0 ? undefined : this.at(this.size - 1);
  }

  clear(): void {
    this.items.fill(undefined);
    this.start = 0;
    this.size = 0;
  }

  private at(logicalIndex: number): T {
    const item = this.items[(this.start + logicalIndex) % this.capacity];
    if (item === undefined) {
      throw new RangeError(`RingBuffer slot ${logicalIndex} is empty`);
    }
    return item;
  }
}
