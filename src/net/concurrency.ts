/**
 * Concurrency control for outgoing HTTP requests.
 *
 * @module net/concurrency
 */

/**
 * Statistics about the current state of the ConcurrencyLimiter.
 */
export interface ConcurrencyStats {
  /** Number of currently running operations */
  running: number;
  /** Number of operations waiting in queue */
  queued: number;
  /** Maximum concurrent operations allowed */
  limit: number;
}

/**
 * Semaphore with a FIFO wait queue.
 *
 * Feed downloads and geocoding lookups go through a limiter so a long
 * feed list does not open hundreds of sockets at once.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(4);
 * const bodies = await Promise.all(urls.map((url) => limiter.run(() => client.fetchFeed(url))));
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private running = 0;
  private queue: Array<() => void> = [];

  /**
   * @param limit - Maximum number of concurrent operations (default: 4)
   * @throws Error if limit is not a positive integer
   */
  constructor(limit: number = 4) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error('Concurrency limit must be a positive integer');
    }
    this.limit = limit;
  }

  /**
   * Wait for a free slot.
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Free a slot; the oldest waiter, if any, takes it over.
   *
   * @throws Error if called without a matching acquire()
   */
  release(): void {
    if (this.running <= 0) {
      throw new Error('ConcurrencyLimiter: release() called without matching acquire()');
    }

    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the waiter; running count is unchanged
      next();
    } else {
      this.running--;
    }
  }

  /**
   * Run `fn` inside a slot, releasing it however `fn` settles.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): ConcurrencyStats {
    return {
      running: this.running,
      queued: this.queue.length,
      limit: this.limit,
    };
  }
}
