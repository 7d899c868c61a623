/**
 * Channel — bounded, one-directional FIFO between independently scheduled tasks.
 *
 * `send` never waits: when the queue is full the overflow policy decides
 * which value is discarded, and `dropped` counts the casualties. Values are
 * delivered in send order.
 */

export type OverflowPolicy = 'drop-newest' | 'drop-oldest';

export class Channel<T> {
  readonly capacity: number;
  readonly overflow: OverflowPolicy;
  private items: T[] = [];
  private waiters: Array<(value: T | undefined) => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(capacity: number, overflow: OverflowPolicy = 'drop-newest') {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}.`);
    }
    this.capacity = capacity;
    this.overflow = overflow;
  }

  /** Enqueue `value`. Returns false if the channel is closed or the value was discarded. */
  send(value: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
      return true;
    }

    if (this.items.length >= this.capacity) {
      this.droppedCount++;
      if (this.overflow === 'drop-newest') return false;
      this.items.shift();
    }
    this.items.push(value);
    return true;
  }

  tryRecv(): T | undefined {
    return this.items.shift();
  }

  /** Take everything currently queued, oldest first. */
  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  /** Wait for the next value; resolves undefined once the channel is closed and empty. */
  recv(): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }
}
