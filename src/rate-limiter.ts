export type RateLimiterOptions = {
  /** requests accepted per window */
  maxRequests: number;
  /** window length in `ms` */
  windowMs: number;
  /** clock (default: Date.now) */
  now?: () => number;
};

/**
 * Sliding-log rate limiter keyed by connection.
 *
 * A request is accepted when fewer than `maxRequests` accepted requests fall
 * inside the trailing window. Rejected requests are not recorded.
 */
export class RateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly now: () => number;

  constructor(private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
  }

  /** number of keys with recorded requests */
  get size() {
    return this.windows.size;
  }

  private prune(key: string, now: number): number[] {
    const cutoff = now - this.options.windowMs;
    const log = this.windows.get(key) ?? [];
    let stale = 0;
    while (stale < log.length && log[stale] <= cutoff) stale += 1;
    if (stale > 0) log.splice(0, stale);
    return log;
  }

  allow(key: string, now = this.now()): boolean {
    const log = this.prune(key, now);
    if (log.length >= this.options.maxRequests) {
      if (log.length > 0) this.windows.set(key, log);
      return false;
    }
    log.push(now);
    this.windows.set(key, log);
    return true;
  }

  remaining(key: string, now = this.now()): number {
    const log = this.prune(key, now);
    return Math.max(0, this.options.maxRequests - log.length);
  }

  reset(key: string) {
    this.windows.delete(key);
  }

  /** drop keys whose window holds no requests */
  cleanupExpired(now = this.now()) {
    for (const key of [...this.windows.keys()]) {
      if (this.prune(key, now).length === 0) {
        this.windows.delete(key);
      }
    }
  }
}
