const COMPACT_THRESHOLD = 1024;

/**
 * Unbounded multi-producer, single-consumer queue.
 *
 * `send` never blocks and `recv` resolves in enqueue order. `null` marks the end of the
 * channel, so values themselves cannot be null.
 */
export class EventChannel<T extends NonNullable<unknown>> implements AsyncIterable<T> {
  private items: Array<T | undefined> = [];
  private head = 0;
  private waiter: { resolve: (value: T | null) => void; reject: (error: Error) => void } | null = null;
  private closed = false;
  private failure: Error | null = null;

  get size(): number {
    return this.items.length - this.head;
  }

  /** Returns false once the channel is closed; the value is dropped. */
  send(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(value);
      return true;
    }

    this.items.push(value);
    return true;
  }

  recv(): Promise<T | null> {
    if (this.head < this.items.length) {
      const value = this.items[this.head];
      this.items[this.head] = undefined;
      this.head += 1;
      this.compact();
      return Promise.resolve(value ?? null);
    }

    if (this.closed) {
      return this.failure ? Promise.reject(this.failure) : Promise.resolve(null);
    }

    if (this.waiter) {
      return Promise.reject(new Error('EventChannel already has a pending receiver'));
    }

    return new Promise<T | null>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  /**
   * Stops accepting values. Buffered values are still delivered; after them the receiver
   * gets `null`, or `reason` as a rejection when one is given.
   */
  close(reason?: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.failure = reason ?? null;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      if (reason) {
        waiter.reject(reason);
      } else {
        waiter.resolve(null);
      }
    }
  }

  /** Drops consumed slots once they make up at least half of the backing array. */
  private compact(): void {
    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const value = await this.recv();
      if (value === null) {
        return;
      }
      yield value;
    }
  }
}
