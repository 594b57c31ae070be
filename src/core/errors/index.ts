export * from "./problem.js";
export * from "./setup-error.js";
export * from "./failure.js";
