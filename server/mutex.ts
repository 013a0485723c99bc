/**
 * Mutex for serializing access to shared in-memory state
 * A single-permit lock with a FIFO wait queue
 */

export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Acquire the lock, waiting behind earlier callers
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Release the lock, handing it directly to the next waiter
   */
  release(): void {
    if (!this.locked) {
      throw new Error('Mutex release() called without acquire()');
    }

    const next = this.queue.shift();
    if (next) {
      // Ownership passes straight to the waiter; locked stays true
      next();
      return;
    }

    this.locked = false;
  }

  /**
   * Run a function while holding the lock
   *
   * @example
   * ```ts
   * const post = await mutex.runExclusive(() => posts.find((p) => p.id === 1));
   * ```
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getWaiting(): number {
    return this.queue.length;
  }
}
