/**
 * FIFO async mutex.
 * Callers queue up and run one at a time, in arrival order, even when the
 * guarded section awaits.
 */

export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  /** Whether a section currently holds the lock. */
  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock. */
  get pending(): number {
    return this.waiters.length;
  }

  /** Run `fn` while holding the lock and release it afterwards, even if `fn` throws. */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the lock straight to the next waiter; `locked` stays true
      next();
    } else {
      this.locked = false;
    }
  }
}
