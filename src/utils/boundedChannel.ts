/**
 * Single-consumer async queue with a fixed capacity. A push into a full channel
 * evicts the oldest queued item, so producers never wait on the consumer.
 * With an `evictable` predicate only matching items are evicted; the others are
 * always kept, even past the capacity.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  #items: T[] = [];
  #capacity: number;
  #waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  #closed = false;
  #dropped = 0;
  #onDrop?: (item: T) => void;
  #evictable?: (item: T) => boolean;

  constructor(capacity: number, onDrop?: (item: T) => void, evictable?: (item: T) => boolean) {
    this.#capacity = Math.max(1, Math.floor(capacity));
    this.#onDrop = onDrop;
    this.#evictable = evictable;
  }

  get size(): number {
    return this.#items.length;
  }

  get dropped(): number {
    return this.#dropped;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /** Returns false once the channel is closed. */
  push(item: T): boolean {
    if (this.#closed) return false;
    const waiter = this.#waiter;
    if (waiter) {
      this.#waiter = null;
      waiter({ value: item, done: false });
      return true;
    }
    if (this.#items.length >= this.#capacity) {
      const index = this.#evictable ? this.#items.findIndex(this.#evictable) : 0;
      if (index >= 0) {
        const [evicted] = this.#items.splice(index, 1);
        this.#dropped += 1;
        if (evicted !== undefined) {
          this.#onDrop?.(evicted);
        }
      }
    }
    this.#items.push(item);
    return true;
  }

  /** Removes and returns everything queued. */
  drain(): T[] {
    return this.#items.splice(0);
  }

  /**
   * Stops the channel. Queued items are still delivered unless `discard` is set;
   * a pending `next()` resolves as done.
   */
  close(options?: { discard?: boolean }): void {
    if (options?.discard) {
      this.#items.length = 0;
    }
    if (this.#closed) return;
    this.#closed = true;
    if (this.#items.length === 0) {
      this.#settleWaiterDone();
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.#items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.#closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.#waiter) {
      return Promise.reject(new Error('BoundedChannel supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.#waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close({ discard: true });
        return { value: undefined, done: true };
      },
    };
  }

  #settleWaiterDone() {
    const waiter = this.#waiter;
    if (!waiter) return;
    this.#waiter = null;
    waiter({ value: undefined, done: true });
  }
}
