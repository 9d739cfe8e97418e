/**
 * In-process single-writer lock for coverage mutations.
 *
 * Waiters are queued in arrival order, so triggers apply in the order they
 * were received. Readers never take the lock.
 */
export class CoverageLock {
  private held = false;
  private waiters: Array<() => void> = [];

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      this.held = false;
    }
  }

  /**
   * Run `task` while holding the lock, releasing it however the task ends.
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
