// Queue with timer-bounded takes
// Feeds socket chunks to a single consumer that waits with a time budget

/**
 * Result of a bounded take
 */
export type TakeResult<T> =
  | { readonly type: 'item'; readonly item: T }
  | { readonly type: 'closed' }
  | { readonly type: 'timeout' };

interface Waiter<T> {
  readonly resolve: (result: TakeResult<T>) => void;
  readonly reject: (error: Error) => void;
}

/**
 * Queue for handling items asynchronously, where every take() carries a
 * timeout. Queued items are always delivered before close or failure is
 * reported.
 */
export class TimedQueue<T> {
  private queue: T[] = [];
  private waiting: Array<Waiter<T>> = [];
  private closed = false;
  private failure: Error | null = null;

  /**
   * Offer an item to the queue (non-blocking)
   */
  offer(item: T): void {
    if (this.closed || this.failure !== null) {
      throw new Error('Queue is closed');
    }

    const waiter = this.waiting.shift();
    if (waiter) {
      // Someone is waiting for an item - give it to them immediately
      waiter.resolve({ type: 'item', item });
    } else {
      this.queue.push(item);
    }
  }

  /**
   * Put an item back at the head of the queue
   */
  pushFront(item: T): void {
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve({ type: 'item', item });
    } else {
      this.queue.unshift(item);
    }
  }

  /**
   * Take the next item, waiting at most `timeoutMs`
   */
  take(timeoutMs: number): Promise<TakeResult<T>> {
    if (this.queue.length > 0) {
      const item = this.queue.shift();
      if (item !== undefined) {
        return Promise.resolve({ type: 'item', item });
      }
    }

    if (this.failure !== null) {
      return Promise.reject(this.failure);
    }

    if (this.closed) {
      return Promise.resolve({ type: 'closed' });
    }

    return new Promise<TakeResult<T>>((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve: (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };

      const timer = setTimeout(() => {
        this.waiting = this.waiting.filter((w) => w !== waiter);
        resolve({ type: 'timeout' });
      }, timeoutMs);

      this.waiting.push(waiter);
    });
  }

  /**
   * Close the queue. Waiting consumers receive `closed`.
   */
  close(): void {
    this.closed = true;

    for (const waiter of this.waiting) {
      waiter.resolve({ type: 'closed' });
    }
    this.waiting = [];
  }

  /**
   * Fail the queue. Waiting consumers are rejected with `error`; later takes
   * are rejected once queued items are drained.
   */
  fail(error: Error): void {
    if (this.failure !== null) {
      return;
    }
    this.failure = error;

    for (const waiter of this.waiting) {
      waiter.reject(error);
    }
    this.waiting = [];
  }

  /**
   * Get the current size of the queue
   */
  size(): number {
    return this.queue.length;
  }

  /**
   * True once closed or failed
   */
  isClosed(): boolean {
    return this.closed || this.failure !== null;
  }

  /**
   * Drop queued items
   * @returns the items dropped
   */
  clear(): T[] {
    const dropped = this.queue;
    this.queue = [];
    return dropped;
  }
}
