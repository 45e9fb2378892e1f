/**
 * Bounded FIFO queue with a drop-oldest backpressure policy.
 * Uses a circular buffer for O(1) enqueue/dequeue regardless of queue state.
 */

export interface QueuedItem<T> {
  value: T;
  /** Clock reading at enqueue time, in milliseconds. */
  enqueuedAt: number;
}

export class BoundedQueue<T> {
  private buffer: (QueuedItem<T> | null)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly maxSize: number;
  private droppedByBackpressure: number;
  private readonly now: () => number;

  constructor(maxSize: number = 100, now: () => number = Date.now) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Queue size must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.now = now;
    this.buffer = new Array<QueuedItem<T> | null>(maxSize).fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.droppedByBackpressure = 0;
  }

  /**
   * Enqueue an item. If the queue is full, the oldest item is dropped and
   * returned, and the backpressure counter is incremented.
   */
  enqueue(value: T): T | null {
    let dropped: T | null = null;

    if (this.count === this.maxSize) {
      this.droppedByBackpressure++;
      dropped = this.buffer[this.head]?.value ?? null;
      this.buffer[this.head] = null;
      this.head = (this.head + 1) % this.maxSize;
      this.count--;
    }

    this.buffer[this.tail] = { value, enqueuedAt: this.now() };
    this.tail = (this.tail + 1) % this.maxSize;
    this.count++;
    return dropped;
  }

  /** Dequeue the next item (FIFO), or null if empty. */
  dequeue(): QueuedItem<T> | null {
    if (this.count === 0) {
      return null;
    }

    const item = this.buffer[this.head];
    this.buffer[this.head] = null;
    this.head = (this.head + 1) % this.maxSize;
    this.count--;
    return item;
  }

  /** Number of items dropped because the queue was full at enqueue time. */
  get droppedCount(): number {
    return this.droppedByBackpressure;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /** Empty the queue and return how many items were discarded. */
  clear(): number {
    const discarded = this.count;
    for (let i = 0; i < this.maxSize; i++) {
      this.buffer[i] = null;
    }
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    return discarded;
  }
}
