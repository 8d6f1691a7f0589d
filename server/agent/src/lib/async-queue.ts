export type OverflowPolicy = "drop-oldest" | "drop-newest";

export interface AsyncQueueOptions {
  /** Maximum buffered items. Unbounded when omitted. */
  capacity?: number;
  /** What to discard once the buffer is full (default: drop-oldest). */
  overflow?: OverflowPolicy;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Multi-producer async queue. Producers never wait: `push` either buffers the
 * item, hands it to a pending consumer, or applies the overflow policy.
 * Consumers iterate with `for await`; after `close()` the buffered items are
 * still drained before iteration ends.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private buffer: Array<{ value: T }> = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;
  private droppedCount = 0;
  private readonly capacity: number;
  private readonly overflow: OverflowPolicy;

  constructor(options: AsyncQueueOptions = {}) {
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
    this.overflow = options.overflow ?? "drop-oldest";
    if (this.capacity < 1) {
      throw new RangeError("AsyncQueue capacity must be at least 1");
    }
  }

  /**
   * Enqueue an item. Returns false when the queue is closed.
   */
  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      this.droppedCount++;
      if (this.overflow === "drop-newest") return true;
      this.buffer.shift();
    }
    this.buffer.push({ value: item });
    return true;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head) return Promise.resolve({ done: false, value: head.value });
    if (this.closed) return Promise.resolve(DONE);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(DONE);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Items discarded by the overflow policy so far. */
  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
