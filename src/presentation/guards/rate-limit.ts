import { type ProblemFactory, problems, withExtension } from "../../core/errors/problem.js";
import type { RateLimiter } from "../../core/ports/rate-limiter.js";
import { err } from "../../core/types/result.js";
import type { RequestContext } from "../context.js";
import { type Guard, proceedWith } from "../guard.js";

export type RateLimitKey = (req: Request, ctx: RequestContext) => string;

export const RATE_LIMIT_KEY = "rateLimit";

/** Client address as reported by the first proxy hop, "unknown" without one. */
export const forwardedFor: RateLimitKey = (req) =>
  req.headers.get("x-forwarded-for")?.split(",")[0]?.trim() || "unknown";

/**
 * Counts each request against `keyOf(req)`. Over the limit it fails with a
 * 429 problem carrying `retryAfter` seconds; otherwise the decision is left
 * in `ctx.locals.rateLimit`.
 */
export const rateLimitGuard = (
  limiter: RateLimiter,
  keyOf: RateLimitKey = forwardedFor,
  factory: ProblemFactory = problems,
): Guard => {
  return (req, ctx) => {
    const key = keyOf(req, ctx);
    const decision = limiter.hit(key);

    if (!decision.allowed) {
      ctx.logger.warn("Rate limited", { key, limit: decision.limit });
      return err(withExtension(factory.tooManyRequests(req), "retryAfter", decision.retryAfter));
    }

    return proceedWith({ locals: { [RATE_LIMIT_KEY]: decision } });
  };
};
