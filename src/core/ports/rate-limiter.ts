/**
 * Port RateLimiter. Shared, cross-request state the pipeline only calls.
 */
export interface RateLimitDecision {
  readonly allowed: boolean;
  readonly limit: number;
  readonly remaining: number;
  /** Epoch milliseconds at which the current window closes */
  readonly resetAt: number;
  /** Whole seconds until the window closes */
  readonly retryAfter: number;
}

export interface RateLimiter {
  hit(key: string): RateLimitDecision;
}
