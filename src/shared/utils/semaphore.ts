/**
 * In-process counting semaphore
 *
 * Bounds how many async tasks hold a slot at once. A released slot is
 * handed directly to the oldest waiter, so the in-flight count never
 * exceeds the limit, not even transiently.
 *
 * Usage:
 * ```typescript
 * const semaphore = new Semaphore(4);
 *
 * // Option 1: Manual acquire/release
 * await semaphore.acquire();
 * try {
 *   // Bounded section
 * } finally {
 *   semaphore.release();
 * }
 *
 * // Option 2: run helper
 * const result = await semaphore.run(() => copyOne(file));
 * ```
 *
 * @module shared/utils/semaphore
 */

export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  /**
   * @throws RangeError when limit is not a positive integer
   */
  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  /** Slots currently held */
  get inFlight(): number {
    return this.active;
  }

  /** Callers waiting for a slot */
  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return;
    }

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes to the waiter; active count is unchanged
      next();
      return;
    }

    if (this.active === 0) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.active--;
  }

  /**
   * Run a task while holding a slot
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
