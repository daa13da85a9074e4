/**
 * Flood control for outbound messages.
 *
 * Leaky bucket measured in milliseconds of "debt": every send adds a fixed
 * cost plus a per-byte cost, and the debt drains in real time. Sends are free
 * while the debt stays under the burst allowance; past that, the caller waits
 * for the excess to drain.
 */

export interface RateLimitOptions {
  /** Debt allowed before sends are delayed, in ms (default: 8000) */
  burst?: number;

  /** Fixed cost of one message, in ms (default: 1000) */
  messageCost?: number;

  /** Additional cost per byte, in ms (default: 10) */
  byteCost?: number;
}

export const DEFAULT_RATE_LIMIT: Required<RateLimitOptions> = {
  burst: 8000,
  messageCost: 1000,
  byteCost: 10,
};

export class RateLimiter {
  private readonly options: Required<RateLimitOptions>;
  private readonly now: () => number;

  /** Outstanding debt in ms, as of lastUpdate */
  private debt = 0;
  private lastUpdate: number;

  /**
   * @param options Bucket parameters, merged over DEFAULT_RATE_LIMIT
   * @param now Clock in ms; Date.now unless a test supplies its own
   */
  constructor(options: RateLimitOptions = {}, now: () => number = Date.now) {
    this.options = { ...DEFAULT_RATE_LIMIT, ...options };
    this.now = now;
    this.lastUpdate = now();
  }

  /**
   * Account for a message of `bytes` bytes and return how long to wait
   * before sending it, in ms
   */
  delayFor(bytes: number): number {
    const { burst, messageCost, byteCost } = this.options;
    const now = this.now();

    const elapsed = Math.max(0, now - this.lastUpdate);
    this.debt = Math.max(0, this.debt - elapsed) + messageCost + bytes * byteCost;
    this.lastUpdate = now;

    return Math.max(0, this.debt - burst);
  }

  /** Current debt in ms, after draining up to now */
  get pending(): number {
    const elapsed = Math.max(0, this.now() - this.lastUpdate);
    return Math.max(0, this.debt - elapsed);
  }
}
