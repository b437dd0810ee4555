/**
 * @module ring-buffer
 * @description Fixed-capacity circular FIFO. O(1) push and shift, no
 * allocation after construction, slots released for GC as they are read.
 */

/**
 * Generic ring buffer holding at most `capacity` items.
 *
 * @example
 * ```typescript
 * const ring = new RingBuffer<LogRecord>(1000);
 * if (!ring.push(record)) {
 *   // full
 * }
 * const batch = ring.popMany(100);
 * ```
 */
export class RingBuffer<T> {
  private readonly buf: (T | undefined)[];
  /** Index of the oldest item */
  private head = 0;
  private count = 0;
  readonly capacity: number;

  constructor(capacity = 1000) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buf = new Array<T | undefined>(capacity);
  }

  /** @returns false when the buffer is full and `val` was not stored */
  push(val: T): boolean {
    if (this.count === this.capacity) return false;
    this.buf[(this.head + this.count) % this.capacity] = val;
    this.count++;
    return true;
  }

  /** Remove and return the oldest item. */
  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const val = this.buf[this.head];
    this.buf[this.head] = undefined; // free for GC
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return val;
  }

  popMany(n = this.capacity): T[] {
    const out: T[] = [];
    while (this.count > 0 && out.length < n) {
      const val = this.shift();
      if (val !== undefined) out.push(val);
    }
    return out;
  }

  clear(): void {
    this.buf.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  get length(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }
}
