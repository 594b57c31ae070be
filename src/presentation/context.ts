import type { Logger } from "../core/ports/logger.js";
import { generateId } from "../shared/utils/id.js";

/**
 * Typed request context threaded through guards, handlers and actions.
 * Immutable: a guard that adds locals gets a new context back.
 */
export interface RequestContext {
  readonly requestId: string;
  readonly startTime: number;
  readonly method: string;
  readonly path: string;
  /** Path variables captured by the router */
  readonly pathParams: Readonly<Record<string, string>>;
  /** Values guards hand to later stages, e.g. the authenticated principal */
  readonly locals: Readonly<Record<string, unknown>>;
  /** Request-scoped logger with requestId pre-bound */
  readonly logger: Logger;
}

export interface ContextOptions {
  readonly logger: Logger;
  readonly requestId?: string | undefined;
  readonly pathParams?: Readonly<Record<string, string>> | undefined;
}

const pathOf = (url: string): string => {
  try {
    return new URL(url).pathname;
  } catch {
    return "/";
  }
};

export const createRequestContext = (req: Request, options: ContextOptions): RequestContext => {
  const requestId = options.requestId ?? req.headers.get("x-request-id") ?? generateId();
  return {
    requestId,
    startTime: performance.now(),
    method: req.method,
    path: pathOf(req.url),
    pathParams: options.pathParams ?? {},
    locals: {},
    logger: options.logger.child({ requestId }),
  };
};

export const withLocals = (
  ctx: RequestContext,
  locals: Readonly<Record<string, unknown>>,
): RequestContext => ({ ...ctx, locals: { ...ctx.locals, ...locals } });

export const withPathParams = (
  ctx: RequestContext,
  pathParams: Readonly<Record<string, string>>,
): RequestContext => ({ ...ctx, pathParams });

/** A standard handler: registrable directly with the router. */
export type Handler = (req: Request, ctx: RequestContext) => Promise<Response>;

/** Wraps a handler; the result sees the request first. */
export type Middleware = (next: Handler) => Handler;
