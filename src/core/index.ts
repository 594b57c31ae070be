/**
 * Core barrel: the innermost ring. Depends on zod and uuid only.
 */
export * from "./types/index.js";
export * from "./errors/index.js";
export * from "./params/index.js";
export * from "./ports/index.js";
export { describeFailure, pointerOf } from "./validation/describe.js";
