// src/infrastructure/http/throttle.ts

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

/**
 * Sleep for the given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Keeps at least `intervalMs` between the end of one call and the start of the next.
 * One instance is shared by every request to the same vendor API.
 */
export class Throttle {
  private lastCallEndedAt: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly sleepFn: Sleep = sleep,
    private readonly clock: Clock = Date.now
  ) {}

  async wait(): Promise<void> {
    if (this.lastCallEndedAt === null || this.intervalMs <= 0) {
      return;
    }
    const remaining = this.lastCallEndedAt + this.intervalMs - this.clock();
    if (remaining > 0) {
      await this.sleepFn(remaining);
    }
  }

  markCallEnded(): void {
    this.lastCallEndedAt = this.clock();
  }

  /**
   * Run a call inside the throttle window
   */
  async run<T>(call: () => Promise<T>): Promise<T> {
    await this.wait();
    try {
      return await call();
    } finally {
      this.markCallEnded();
    }
  }
}
