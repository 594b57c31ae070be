export type { LogLevel, Logger } from "./logger.js";
export type { ServerCodec } from "./codec.js";
export type { FieldFailure, StructValidator } from "./validator.js";
export type { RateLimitDecision, RateLimiter } from "./rate-limiter.js";
