// backend/services/web/src/limiter/SlidingWindowLimiter.ts
/**
 * Purpose:
 * - Per-key sliding-window limiter: at most `limit` accepted requests in any
 *   trailing `windowMs` interval.
 *
 * Invariants:
 * - `allow()` is one synchronous read-prune-check-append step; no await sits
 *   between the check and the record, so concurrent requests for one key
 *   cannot both take the last slot.
 * - Rejected requests are not recorded.
 * - `limit = 0` rejects everything.
 * - Keys whose history empties are dropped by `sweep()`; an optional unref'd
 *   interval runs it so idle clients don't accumulate.
 */

export type SlidingWindowOptions = {
  limit: number;
  windowMs: number;
  /** Interval for the background sweep; 0 or absent disables it. */
  sweepMs?: number;
};

export class SlidingWindowLimiter {
  readonly limit: number;
  readonly windowMs: number;
  private readonly windows = new Map<string, number[]>();
  private sweeper: NodeJS.Timeout | undefined;

  constructor(opts: SlidingWindowOptions) {
    if (!Number.isInteger(opts.limit) || opts.limit < 0) {
      throw new Error("[rateLimit] limit must be an integer >= 0");
    }
    if (!Number.isFinite(opts.windowMs) || opts.windowMs <= 0) {
      throw new Error("[rateLimit] windowMs must be a number > 0");
    }
    this.limit = opts.limit;
    this.windowMs = opts.windowMs;

    const sweepMs = opts.sweepMs ?? 0;
    if (sweepMs > 0) {
      this.sweeper = setInterval(() => this.sweep(Date.now()), sweepMs);
      this.sweeper.unref();
    }
  }

  /** Timestamps older than `now - windowMs` no longer count. */
  private prune(key: string, now: number): number[] {
    const history = this.windows.get(key);
    if (!history) return [];
    const floor = now - this.windowMs;
    let drop = 0;
    while (drop < history.length && history[drop] < floor) drop++;
    if (drop > 0) history.splice(0, drop);
    return history;
  }

  allow(key: string, now: number = Date.now()): boolean {
    const history = this.prune(key, now);
    if (history.length >= this.limit) return false;
    history.push(now);
    if (!this.windows.has(key)) this.windows.set(key, history);
    return true;
  }

  /** Whole seconds until a slot frees up for `key` (at least 1). */
  retryAfterSeconds(key: string, now: number = Date.now()): number {
    const history = this.prune(key, now);
    const oldest = history[0];
    const waitMs =
      oldest === undefined ? this.windowMs : oldest + this.windowMs - now;
    return Math.max(1, Math.ceil(waitMs / 1000));
  }

  /** Requests currently counted for `key`. */
  count(key: string, now: number = Date.now()): number {
    return this.prune(key, now).length;
  }

  get size(): number {
    return this.windows.size;
  }

  /** Drop keys with no timestamps left in the window; returns how many. */
  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const key of [...this.windows.keys()]) {
      if (this.prune(key, now).length === 0) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  stop(): void {
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = undefined;
  }
}
