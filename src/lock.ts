/**
 * Single-permit async lock. Waiters are served in arrival order.
 */
export class AsyncLock {
  private permits = 1;
  private queue: (() => void)[] = [];

  /** True while some caller holds the permit. */
  get locked(): boolean {
    return this.permits === 0;
  }

  /** Number of callers waiting for the permit. */
  get pending(): number {
    return this.queue.length;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  /** Run `fn` while holding the permit; the permit is released on throw too. */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
