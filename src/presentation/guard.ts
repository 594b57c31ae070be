import { err, ok, type Ok, type Result, settle } from "../core/types/result.js";
import { type Handler, type RequestContext, withLocals } from "./context.js";
import type { Reply } from "./reply.js";
import { failureResponse, type Responder, writeReply } from "./respond.js";

/**
 * What a guard decided. `pass` may hand downstream a replacement request,
 * locals for later stages, or both; `halt` answers the request itself.
 */
export type GuardDecision =
  | {
      readonly kind: "pass";
      readonly request?: Request | undefined;
      readonly locals?: Readonly<Record<string, unknown>> | undefined;
    }
  | { readonly kind: "halt"; readonly reply: Reply };

/** `ok(null)` passes the prior request through unchanged. */
export type GuardResult = Result<GuardDecision | null, unknown>;

export type Guard = (req: Request, ctx: RequestContext) => Promise<GuardResult> | GuardResult;

export const proceed = (): Ok<GuardDecision> => ok<GuardDecision>({ kind: "pass" });

export const proceedWith = (changes: {
  readonly request?: Request | undefined;
  readonly locals?: Readonly<Record<string, unknown>> | undefined;
}): Ok<GuardDecision> => ok<GuardDecision>({ kind: "pass", ...changes });

export const halt = (r: Reply): Ok<GuardDecision> => ok<GuardDecision>({ kind: "halt", reply: r });

export type GuardOutcome =
  | {
      readonly kind: "pass";
      readonly request: Request;
      readonly locals: Readonly<Record<string, unknown>>;
    }
  | { readonly kind: "halt"; readonly reply: Reply }
  | { readonly kind: "error"; readonly error: unknown };

/** Run one guard; a throw counts as an error result. */
export const runGuard = async (
  guard: Guard,
  req: Request,
  ctx: RequestContext,
): Promise<GuardOutcome> => {
  const result = await settle(() => guard(req, ctx));
  if (!result.ok) return { kind: "error", error: result.error };

  const decision = result.value;
  if (decision === null) return { kind: "pass", request: req, locals: {} };
  if (decision.kind === "halt") return decision;
  return { kind: "pass", request: decision.request ?? req, locals: decision.locals ?? {} };
};

/**
 * Compose guards into one. They run in order, each seeing the request and
 * locals left by the previous one; the first halt or error stops the stack.
 */
export const guardStack =
  (...guards: readonly Guard[]): Guard =>
  async (req, ctx) => {
    let request = req;
    let current = ctx;
    let locals: Readonly<Record<string, unknown>> = {};

    for (const guard of guards) {
      const outcome = await runGuard(guard, request, current);
      if (outcome.kind === "error") return err(outcome.error);
      if (outcome.kind === "halt") return halt(outcome.reply);

      request = outcome.request;
      locals = { ...locals, ...outcome.locals };
      current = withLocals(current, outcome.locals);
    }

    return proceedWith({ request, locals });
  };

/** Guard stage in front of any handler. */
export const guarded =
  (handler: Handler, guard: Guard, deps: Responder): Handler =>
  async (req, ctx) => {
    const logger = ctx.logger.child({ layer: "handler" });
    const outcome = await runGuard(guard, req, ctx);

    switch (outcome.kind) {
      case "error":
        return failureResponse(outcome.error, req, logger, deps);
      case "halt":
        return writeReply(outcome.reply, req, ctx, logger, deps);
      case "pass":
        return handler(outcome.request, withLocals(ctx, outcome.locals));
    }
  };
