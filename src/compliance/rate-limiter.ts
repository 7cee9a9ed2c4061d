export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * In-memory per-key rate limiter. Runs are sequential, so a timestamp per
 * upstream is enough to space requests out.
 */
export class RateLimiter {
  private readonly lastRequest = new Map<string, number>();

  constructor(
    private readonly sleepFn: Sleep = sleep,
    private readonly now: () => number = Date.now,
  ) {}

  async acquire(key: string, minDelayMs: number): Promise<void> {
    const last = this.lastRequest.get(key);
    if (last !== undefined) {
      const elapsed = this.now() - last;
      if (elapsed < minDelayMs) {
        await this.sleepFn(minDelayMs - elapsed);
      }
    }
    this.lastRequest.set(key, this.now());
  }
}
