import type { Clock, Sleep } from "#/core";

/**
 * Minimum spacing between consecutive starts.
 * Callers wait, then mark the start once the operation is actually submitted,
 * so time spent waiting for a permit never shortens the gap.
 */
export class Throttle {
  private intervalMs: number;
  private now: Clock;
  private sleep: Sleep;
  private lastStart?: number;

  constructor(intervalMs: number, now: Clock, sleep: Sleep) {
    this.intervalMs = intervalMs;
    this.now = now;
    this.sleep = sleep;
  }

  async wait(signal?: AbortSignal): Promise<void> {
    if (this.intervalMs <= 0 || this.lastStart === undefined) {
      return;
    }
    const remaining = this.lastStart + this.intervalMs - this.now();
    if (remaining > 0) {
      await this.sleep(remaining, signal);
    }
  }

  markStart(): void {
    this.lastStart = this.now();
  }
}
