/**
 * Counts in-flight job executions and lets callers wait until none remain.
 */
export class JobWaiter {
  private outstanding = 0;
  private idleWaiters: (() => void)[] = [];

  get size(): number {
    return this.outstanding;
  }

  add(): void {
    this.outstanding += 1;
  }

  done(): void {
    if (this.outstanding === 0) {
      throw new Error('JobWaiter.done() called without a matching add().');
    }

    this.outstanding -= 1;
    if (this.outstanding > 0) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  /**
   * Resolves once the outstanding count drops to zero, immediately when it already is.
   */
  wait(): Promise<void> {
    if (this.outstanding === 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }
}
