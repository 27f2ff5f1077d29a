/**
 * Resettable readiness flag that callers can wait on.
 * wait() suspends until open() is called; reset() closes the gate again
 * for callers that arrive afterwards.
 */
export class ReadinessGate {
  private ready = false;
  private waiters: Array<() => void> = [];

  isReady(): boolean {
    return this.ready;
  }

  wait(): Promise<void> {
    if (this.ready) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Mark ready and wake every waiter
   */
  open(): void {
    this.ready = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  reset(): void {
    this.ready = false;
  }

  getWaiterCount(): number {
    return this.waiters.length;
  }
}
