/**
 * handlerkit: typed request handlers over fetch Request/Response.
 */
export * from "./core/index.js";
export * from "./infrastructure/index.js";
export * from "./presentation/index.js";
export { formatConfigError, printConfigError } from "./shared/cli.js";
