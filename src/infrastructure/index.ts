export {
  type ConfigErrors,
  type Env,
  type ServerConfig,
  loadServerConfig,
} from "./config/config.js";
export { type LogFormat, type LoggerOptions, createLogger, silentLogger } from "./logging/logger.js";
export { createJsonCodec } from "./codec/json-codec.js";
export { createZodValidator, defaultValidator, toFieldFailure } from "./validation/zod-validator.js";
export { e164, isZero, required, rule } from "./validation/rules.js";
export {
  type FixedWindowOptions,
  createFixedWindowRateLimiter,
} from "./rate-limit/fixed-window.js";
