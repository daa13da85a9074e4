/**
 * Promise-based mutual exclusion lock. Waiters are served in FIFO order.
 */
export class Mutex {
  private locked = false;
  private waiters: (() => void)[] = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Wait for the lock, returning the function that releases it
   */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        this.locked = true;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      if (this.locked) {
        this.waiters.push(grant);
      } else {
        grant();
      }
    });
  }

  /**
   * Run `fn` while holding the lock
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
