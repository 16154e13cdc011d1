/**
 * Counting semaphore for controlling concurrent execution.
 * Waiters are served in FIFO order; a waiter can give up through an AbortSignal.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<(acquired: boolean) => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
  }

  /**
   * Acquire a permit, waiting if necessary.
   * Resolves false, without a permit, if the signal aborts first.
   */
  async acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return false;
    }

    if (this.permits > 0) {
      this.permits--;
      return true;
    }

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => {
        const index = this.waiting.indexOf(waiter);
        if (index !== -1) {
          this.waiting.splice(index, 1);
          resolve(false);
        }
      };

      const waiter = (acquired: boolean): void => {
        signal?.removeEventListener("abort", onAbort);
        resolve(acquired);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiting.push(waiter);
    });
  }

  /**
   * Release a permit, handing it straight to the next waiter if any
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next(true);
      return;
    }
    this.permits++;
  }

  get available(): number {
    return this.permits;
  }

  get pending(): number {
    return this.waiting.length;
  }
}
