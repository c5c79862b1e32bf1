/**
 * Concurrency control for site fetches.
 *
 * @module sources/concurrency
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
 * ConcurrencyLimiter controls the maximum number of concurrent operations.
 *
 * Semaphore with a FIFO queue of waiting callers. The collector uses it to
 * bound simultaneous site requests.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(2);
 * const records = await limiter.run(() => source.fetchMarkets(options));
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;

  private running: number = 0;

  /** FIFO queue of pending acquire() calls waiting for a slot */
  private queue: Array<() => void> = [];

  /**
   * @param limit - Maximum number of concurrent operations (default: 3)
   * @throws Error if limit is less than 1 or not an integer
   */
  constructor(limit: number = 3) {
    if (limit < 1) {
      throw new Error('Concurrency limit must be at least 1');
    }
    if (!Number.isInteger(limit)) {
      throw new Error('Concurrency limit must be an integer');
    }
    this.limit = limit;
  }

  /**
   * Acquire a slot, waiting in FIFO order when all slots are busy.
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
   * Release a slot and hand it to the next waiter, if any.
   *
   * @throws Error when called without a matching acquire()
   */
  release(): void {
    if (this.running <= 0) {
      throw new Error('ConcurrencyLimiter: release() called without matching acquire()');
    }

    this.running--;

    const next = this.queue.shift();
    if (next) {
      this.running++;
      next();
    }
  }

  /**
   * Run a function inside a slot, releasing it even if the function throws.
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

  isAvailable(): boolean {
    return this.running < this.limit;
  }
}
