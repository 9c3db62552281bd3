// Sliding-window rate limiter shared by every caller of one registry client

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private timestamps: number[] = [];

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? 600;
    this.windowMs = options.windowMs ?? 300_000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolves once a slot in the trailing window is taken.
   * Prune, check and record happen without an await in between, so concurrent
   * callers cannot both claim the last slot.
   */
  async acquire(): Promise<void> {
    for (;;) {
      const now = this.now();
      this.prune(now);
      if (this.timestamps.length < this.maxRequests) {
        this.timestamps.push(now);
        return;
      }
      await this.sleep(Math.max(this.timestamps[0] + this.windowMs - now, 1));
    }
  }

  remaining(): number {
    this.prune(this.now());
    return this.maxRequests - this.timestamps.length;
  }

  private prune(now: number): void {
    this.timestamps = this.timestamps.filter((t) => now - t < this.windowMs);
  }
}
