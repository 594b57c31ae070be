import type { RateLimitDecision, RateLimiter } from "../../core/ports/rate-limiter.js";

export interface FixedWindowOptions {
  readonly windowMs: number;
  readonly maxRequests: number;
  /** Epoch milliseconds; defaults to Date.now */
  readonly now?: (() => number) | undefined;
}

interface WindowEntry {
  count: number;
  resetAt: number;
}

/**
 * Fixed-window rate limiter: in-memory, O(1) per hit.
 * Expired windows are pruned at most once per window length.
 */
export const createFixedWindowRateLimiter = (options: FixedWindowOptions): RateLimiter => {
  const { windowMs, maxRequests } = options;
  const now = options.now ?? Date.now;
  const store = new Map<string, WindowEntry>();
  let lastPrune = now();

  const prune = (at: number): void => {
    if (at - lastPrune < windowMs) return;
    lastPrune = at;
    for (const [key, entry] of store) {
      if (entry.resetAt <= at) store.delete(key);
    }
  };

  return {
    hit(key: string): RateLimitDecision {
      const at = now();
      prune(at);

      let entry = store.get(key);
      if (!entry || entry.resetAt <= at) {
        entry = { count: 0, resetAt: at + windowMs };
        store.set(key, entry);
      }

      entry.count++;

      return {
        allowed: entry.count <= maxRequests,
        limit: maxRequests,
        remaining: Math.max(0, maxRequests - entry.count),
        resetAt: entry.resetAt,
        retryAfter: Math.ceil((entry.resetAt - at) / 1000),
      };
    },
  };
};
