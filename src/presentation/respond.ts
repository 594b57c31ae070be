import { describeCause, classifyFailure } from "../core/errors/failure.js";
import {
  type ProblemDetail,
  type ProblemFactory,
  type ProblemTarget,
  problemBody,
  problems,
} from "../core/errors/problem.js";
import type { ServerCodec } from "../core/ports/codec.js";
import type { Logger } from "../core/ports/logger.js";
import { tryCatchAsync } from "../core/types/result.js";
import { createJsonCodec } from "../infrastructure/codec/json-codec.js";
import type { RequestContext } from "./context.js";
import { isRedirect, type Reply } from "./reply.js";

/** What every stage needs to answer: a codec and a problem catalog. */
export interface Responder {
  readonly codec: ServerCodec;
  readonly problems: ProblemFactory;
}

export interface ResponderOptions {
  readonly codec?: ServerCodec | undefined;
  readonly problems?: ProblemFactory | undefined;
}

const defaultCodec = createJsonCodec();

export const createResponder = (options: ResponderOptions = {}): Responder => ({
  codec: options.codec ?? defaultCodec,
  problems: options.problems ?? problems,
});

/** Statuses the fetch Response refuses a body for. */
const NULL_BODY_STATUS = new Set([101, 204, 205, 304]);

export const problemResponse = (problem: ProblemDetail, codec: ServerCodec): Response => {
  const encoded = codec.encode(problemBody(problem));
  if (!encoded.ok) return new Response(null, { status: problem.status });
  return new Response(encoded.value, {
    status: problem.status,
    headers: { "Content-Type": codec.problemContentType },
  });
};

/** Generic 500 after logging `message` at warn level. */
export const serverFailure = (
  req: ProblemTarget,
  logger: Logger,
  deps: Responder,
  message: string,
  cause: unknown,
): Response => {
  logger.warn(message, { error: describeCause(cause) });
  return problemResponse(deps.problems.serverError(req), deps.codec);
};

/**
 * Render whatever a guard or action failed with. Problems go out verbatim;
 * anything else is logged and replaced by a generic server error.
 */
export const failureResponse = (
  error: unknown,
  req: ProblemTarget,
  logger: Logger,
  deps: Responder,
): Response => {
  const failure = classifyFailure(error);
  if (failure.kind === "problem") return problemResponse(failure.problem, deps.codec);

  logger.error("Handler received an unhandled error", { error: describeCause(failure.cause) });
  return problemResponse(deps.problems.serverError(req), deps.codec);
};

/** A value that rewrites itself before it is used, e.g. to normalise fields. */
export interface Transformable {
  transform(ctx: RequestContext): Promise<void> | void;
}

export const isTransformable = (value: unknown): value is Transformable =>
  typeof value === "object" &&
  value !== null &&
  "transform" in value &&
  typeof value.transform === "function";

/**
 * Response stage: redirect, status-only, or transform then encode the
 * payload. A null payload counts as absent.
 */
export const writeReply = async (
  r: Reply,
  req: ProblemTarget,
  ctx: RequestContext,
  logger: Logger,
  deps: Responder,
): Promise<Response> => {
  if (!Number.isInteger(r.status) || r.status < 200 || r.status > 599) {
    return failureResponse(new RangeError(`invalid reply status ${r.status}`), req, logger, deps);
  }

  const headers = new Headers(r.headers);

  if (isRedirect(r)) {
    headers.set("Location", r.location);
    return new Response(null, { status: r.status, headers });
  }

  const payload = r.payload;
  if (payload === undefined || payload === null || NULL_BODY_STATUS.has(r.status)) {
    return new Response(null, { status: r.status, headers });
  }

  if (isTransformable(payload)) {
    const transformed = await tryCatchAsync(async () => payload.transform(ctx));
    if (!transformed.ok) {
      return serverFailure(
        req,
        logger,
        deps,
        "Handler failed to transform response data",
        transformed.error,
      );
    }
  }

  const encoded = deps.codec.encode(payload);
  if (!encoded.ok) {
    logger.error("Handler failed to encode response data", { error: encoded.error.message });
    return problemResponse(deps.problems.serverError(req), deps.codec);
  }

  headers.set("Content-Type", deps.codec.contentType);
  return new Response(encoded.value, { status: r.status, headers });
};
