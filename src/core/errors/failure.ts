import { isProblemDetail, type ProblemDetail } from "./problem.js";

/**
 * Anything a guard, hook or action fails with is one of two things: a
 * problem meant for the client, or an opaque error meant for the logs.
 */
export type Failure =
  | { readonly kind: "problem"; readonly problem: ProblemDetail }
  | { readonly kind: "opaque"; readonly cause: unknown };

export const classifyFailure = (error: unknown): Failure =>
  isProblemDetail(error) ? { kind: "problem", problem: error } : { kind: "opaque", cause: error };

/** Render an opaque cause for a log line. */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
};
