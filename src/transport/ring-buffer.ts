/**
 * Bounded FIFO backing the Inbox (messages waiting for a pump) and the TCP
 * send queue (messages written while reconnecting). A push into a full
 * buffer evicts the oldest item and hands it back to the caller.
 */

export class RingBuffer<T> {
  readonly capacity: number;

  private slots: T[] = [];
  private start = 0;
  private dropped = 0;

  constructor(capacity = 64) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Append `item`; returns the evicted item when the buffer was full */
  push(item: T): T | undefined {
    if (this.slots.length < this.capacity) {
      this.slots.push(item);
      return undefined;
    }
    const evicted = this.slots[this.start];
    this.slots[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
    this.dropped++;
    return evicted;
  }

  /** Remove and return everything, oldest first */
  drain(): T[] {
    const items = [...this.slots.slice(this.start), ...this.slots.slice(0, this.start)];
    this.clear();
    return items;
  }

  clear(): void {
    this.slots = [];
    this.start = 0;
  }

  get size(): number {
    return this.slots.length;
  }

  get empty(): boolean {
    return this.slots.length === 0;
  }

  /** Items evicted since construction */
  get droppedCount(): number {
    return this.dropped;
  }
}
