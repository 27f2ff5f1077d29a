export type ReleaseLock = () => void;

/**
 * FIFO mutual exclusion for async critical sections.
 * Waiters are queued in arrival order and handed the lock one at a time.
 */
export class AsyncLock {
  private locked = false;
  private waitingQueue: Array<(release: ReleaseLock) => void> = [];

  isLocked(): boolean {
    return this.locked;
  }

  getQueueLength(): number {
    return this.waitingQueue.length;
  }

  acquire(): Promise<ReleaseLock> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise(resolve => {
      this.waitingQueue.push(resolve);
    });
  }

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await operation();
    } finally {
      release();
    }
  }

  private createRelease(): ReleaseLock {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waitingQueue.shift();
      if (next) {
        // Ownership passes straight to the next waiter; the lock stays held
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
