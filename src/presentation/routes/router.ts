import { describeCause } from "../../core/errors/failure.js";
import { SetupError } from "../../core/errors/setup-error.js";
import type { Logger } from "../../core/ports/logger.js";
import { type Handler, type RequestContext, withPathParams } from "../context.js";
import type { Endpoint, EndpointGroup } from "../endpoint.js";
import { guarded } from "../guard.js";
import {
  createResponder,
  problemResponse,
  type Responder,
  type ResponderOptions,
} from "../respond.js";

/**
 * Method + path router.
 * Static routes use a map lookup; routes with `{name}` variables are
 * matched segment by segment in registration order.
 */
export interface RouterOptions extends ResponderOptions {
  readonly logger: Logger;
}

type Segment =
  | { readonly kind: "static"; readonly value: string }
  | { readonly kind: "param"; readonly name: string };

interface ParametricRoute {
  readonly method: string;
  readonly pattern: string;
  readonly segments: readonly Segment[];
  readonly handler: Handler;
}

const PARAM_SEGMENT = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;

const parsePattern = (path: string): readonly Segment[] =>
  path
    .split("/")
    .slice(1)
    .map((part): Segment => {
      const match = PARAM_SEGMENT.exec(part);
      return match?.[1] === undefined
        ? { kind: "static", value: part }
        : { kind: "param", name: match[1] };
    });

const decodeSegment = (raw: string): string | null => {
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
};

const matchSegments = (
  segments: readonly Segment[],
  parts: readonly string[],
): Record<string, string> | null => {
  if (segments.length !== parts.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    const part = parts[i];
    if (segment === undefined || part === undefined) return null;

    if (segment.kind === "static") {
      if (segment.value !== part) return null;
      continue;
    }

    const value = decodeSegment(part);
    if (value === null || value === "") return null;
    params[segment.name] = value;
  }
  return params;
};

const isEndpointGroup = (value: Endpoint | EndpointGroup): value is EndpointGroup =>
  "endpoints" in value;

export const createRouter = (options: RouterOptions) => {
  const logger = options.logger.child({ layer: "router" });
  const deps: Responder = createResponder(options);

  const staticRoutes = new Map<string, Handler>();
  const parametricRoutes: ParametricRoute[] = [];

  /** Guard first, then the endpoint's middleware around it, outermost first. */
  const compose = (e: Endpoint): Handler => {
    let handler = e.guard === undefined ? e.handler : guarded(e.handler, e.guard, deps);
    const middleware = e.middleware ?? [];
    for (let i = middleware.length - 1; i >= 0; i--) {
      const wrap = middleware[i];
      if (wrap !== undefined) handler = wrap(handler);
    }
    return handler;
  };

  const registerOne = (e: Endpoint): void => {
    const key = `${e.method} ${e.path}`;
    const segments = parsePattern(e.path);
    const handler = compose(e);

    if (segments.every((s) => s.kind === "static")) {
      if (staticRoutes.has(key)) {
        throw new SetupError("register route", new Error(`duplicate route ${key}`));
      }
      staticRoutes.set(key, handler);
    } else {
      if (parametricRoutes.some((r) => r.method === e.method && r.pattern === e.path)) {
        throw new SetupError("register route", new Error(`duplicate route ${key}`));
      }
      parametricRoutes.push({ method: e.method, pattern: e.path, segments, handler });
    }

    logger.debug("Route registered", { route: key });
  };

  const match = (
    method: string,
    path: string,
  ): { readonly handler: Handler; readonly params: Record<string, string> } | null => {
    const handler = staticRoutes.get(`${method} ${path}`);
    if (handler) return { handler, params: {} };

    const parts = path.split("/").slice(1);
    for (const route of parametricRoutes) {
      if (route.method !== method) continue;
      const params = matchSegments(route.segments, parts);
      if (params) return { handler: route.handler, params };
    }
    return null;
  };

  return {
    register(...entries: readonly (Endpoint | EndpointGroup)[]): void {
      for (const entry of entries) {
        if (isEndpointGroup(entry)) entry.endpoints.forEach(registerOne);
        else registerOne(entry);
      }
    },

    async handle(req: Request, ctx: RequestContext): Promise<Response> {
      const found = match(req.method, ctx.path);
      if (found === null) {
        logger.debug("Route not found", { method: req.method, path: ctx.path });
        return problemResponse(deps.problems.notFound(req), deps.codec);
      }

      try {
        return await found.handler(req, withPathParams(ctx, found.params));
      } catch (e: unknown) {
        logger.error("Handler threw", { error: describeCause(e), path: ctx.path });
        return problemResponse(deps.problems.serverError(req), deps.codec);
      }
    },
  };
};

export type Router = ReturnType<typeof createRouter>;
