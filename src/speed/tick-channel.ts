/**
 * Bounded single-consumer queue between the feed callback and the decision
 * loop. When full, the oldest item is dropped: a newer tick always
 * supersedes an older one.
 */
export class TickChannel<T> {
  private readonly buffer: T[] = [];
  private waiter: ((item: T | null) => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Returns false once the channel is closed. */
  push(item: T): boolean {
    if (this.closed) return false;
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(item);
      return true;
    }
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount++;
    }
    this.buffer.push(item);
    return true;
  }

  /** Resolves with the next item, or null once closed and drained. */
  next(): Promise<T | null> {
    const item = this.buffer.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) return Promise.reject(new Error("TickChannel supports a single consumer"));
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(null);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
