import type { ZodType, ZodTypeDef } from "zod";
import { type PropertyViolation, withDetail } from "../core/errors/problem.js";
import { InvalidParamsDefinitionError } from "../core/errors/setup-error.js";
import { bindParams } from "../core/params/bind.js";
import { isParamsDefinition, type ParamsDefinition } from "../core/params/definition.js";
import { requestSource } from "../core/params/resolver.js";
import type { Logger } from "../core/ports/logger.js";
import type { FieldFailure, StructValidator } from "../core/ports/validator.js";
import { err, ok, type Result, settle, tryCatchAsync } from "../core/types/result.js";
import { describeFailure, pointerOf } from "../core/validation/describe.js";
import { defaultValidator } from "../infrastructure/validation/zod-validator.js";
import type { Handler, RequestContext } from "./context.js";
import { type Guard, guarded } from "./guard.js";
import type { Reply } from "./reply.js";
import {
  createResponder,
  failureResponse,
  isTransformable,
  problemResponse,
  type Responder,
  type ResponderOptions,
  serverFailure,
  writeReply,
} from "./respond.js";

export const EMPTY_BODY_DETAIL = "The server received an unexpected empty request body";

/** A fully hydrated request as an action sees it. */
export interface HydratedRequest<D, P> {
  /** The request; its body can still be read */
  readonly request: Request;
  readonly data: D;
  readonly params: P;
  readonly ctx: RequestContext;
}

/** `ok(null)` answers 204; `err(e)` or a throw takes the error path. */
export type ActionResult = Result<Reply | null, unknown>;

export type Action<D, P> = (req: HydratedRequest<D, P>) => Promise<ActionResult> | ActionResult;

export type TransformHook<T> = (value: T, ctx: RequestContext) => Promise<T> | T;

export interface HandlerOptions<D, P> extends ResponderOptions {
  readonly params?: ParamsDefinition<P> | undefined;
  readonly body?: ZodType<D, ZodTypeDef, unknown> | undefined;
  readonly action: Action<D, P>;
  readonly guard?: Guard | undefined;
  readonly transformParams?: TransformHook<P> | undefined;
  readonly transformData?: TransformHook<D> | undefined;
  readonly validator?: StructValidator | undefined;
}

/** Either the value a stage produced or the response that ends the request. */
type Stage<T> = Result<T, Response>;

const propertyViolation = (failure: FieldFailure): PropertyViolation => ({
  detail: describeFailure(failure.field === "" ? "value" : failure.field, failure),
  pointer: pointerOf(failure.path),
});

const runTransform = <T>(
  value: T,
  hook: TransformHook<T> | undefined,
  ctx: RequestContext,
): Promise<Result<T, unknown>> =>
  tryCatchAsync(async () => {
    if (hook !== undefined) return hook(value, ctx);
    if (isTransformable(value)) await value.transform(ctx);
    return value;
  });

/**
 * Build a handler that hydrates params and body, runs the action and writes
 * its reply. Stages run in order and the first failing one answers:
 *
 *   guard → params → body → transform → action → response
 *
 * Client mistakes come back as problem documents listing every violation.
 * Setup mistakes, failing hooks and unknown errors are logged and answered
 * with a generic server error.
 *
 * @example
 * const listOrders = createHandler({
 *   params: ListParams,
 *   action: async ({ params }) => reply.ok(await orders.list(params.page)),
 * });
 */
export function createHandler<D = undefined, P = undefined>(options: HandlerOptions<D, P>): Handler;
export function createHandler(options: HandlerOptions<unknown, unknown>): Handler {
  const validator = options.validator ?? defaultValidator();
  const deps: Responder = createResponder(options);
  const { params: definition, body: bodySchema } = options;

  const bindStage = (req: Request, ctx: RequestContext, logger: Logger): Stage<unknown> => {
    if (definition === undefined) return ok(undefined);

    if (!isParamsDefinition(definition)) {
      const error = new InvalidParamsDefinitionError(typeof definition);
      return err(serverFailure(req, logger, deps, "Handler params definition is invalid", error));
    }

    const bound = bindParams(definition, requestSource(req, ctx.pathParams), validator);
    if (bound.ok) return ok(bound.value.value);

    if (bound.error.kind === "invalid") {
      return err(
        problemResponse(deps.problems.badParameters(req, ...bound.error.violations), deps.codec),
      );
    }

    return err(
      serverFailure(req, logger, deps, "Handler failed to decode params data", bound.error.error),
    );
  };

  const bodyStage = async (req: Request, logger: Logger): Promise<Stage<unknown>> => {
    if (bodySchema === undefined) return ok(undefined);

    // Read a clone: the action gets the untouched original.
    const read = await tryCatchAsync(async () => new Uint8Array(await req.clone().arrayBuffer()));
    if (!read.ok) {
      return err(serverFailure(req, logger, deps, "Handler failed to read request body", read.error));
    }

    if (read.value.byteLength === 0) {
      const problem = withDetail(deps.problems.badRequest(req), EMPTY_BODY_DETAIL);
      return err(problemResponse(problem, deps.codec));
    }

    const decoded = deps.codec.decode(read.value);
    if (!decoded.ok) {
      logger.warn("Handler failed to decode request data", { error: decoded.error.message });
      return err(problemResponse(deps.problems.badRequest(req), deps.codec));
    }

    const validated = validator.validate(bodySchema, decoded.value);
    if (!validated.ok) {
      const violations = validated.error.map(propertyViolation);
      return err(problemResponse(deps.problems.constraintViolation(req, ...violations), deps.codec));
    }

    return ok(validated.value);
  };

  const hydrateAndRun: Handler = async (req, ctx) => {
    const logger = ctx.logger.child({ layer: "handler" });

    const params = bindStage(req, ctx, logger);
    if (!params.ok) return params.error;

    const data = await bodyStage(req, logger);
    if (!data.ok) return data.error;

    const transformedParams = await runTransform(params.value, options.transformParams, ctx);
    if (!transformedParams.ok) {
      return serverFailure(
        req,
        logger,
        deps,
        "Handler failed to transform params data",
        transformedParams.error,
      );
    }

    const transformedData = await runTransform(data.value, options.transformData, ctx);
    if (!transformedData.ok) {
      return serverFailure(
        req,
        logger,
        deps,
        "Handler failed to transform request data",
        transformedData.error,
      );
    }

    const outcome = await settle(() =>
      options.action({
        request: req,
        data: transformedData.value,
        params: transformedParams.value,
        ctx,
      }),
    );

    if (!outcome.ok) return failureResponse(outcome.error, req, logger, deps);
    if (outcome.value === null) return new Response(null, { status: 204 });

    return writeReply(outcome.value, req, ctx, logger, deps);
  };

  return options.guard === undefined ? hydrateAndRun : guarded(hydrateAndRun, options.guard, deps);
}
