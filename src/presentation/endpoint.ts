import type { Handler, Middleware } from "./context.js";
import { type Guard, guardStack } from "./guard.js";

/**
 * A route registration: method, path (with `{name}` variables), handler, and
 * the guard and middleware the router wraps around it.
 */
export interface Endpoint {
  readonly method: string;
  readonly path: string;
  readonly handler: Handler;
  readonly guard?: Guard | undefined;
  /** Outermost first */
  readonly middleware?: readonly Middleware[] | undefined;
}

export const endpoint = (method: string, path: string, handler: Handler): Endpoint => ({
  method: method.toUpperCase(),
  path,
  handler,
});

/** Copy of `e` guarded by `guard`, replacing any guard it had. */
export const withGuard = (e: Endpoint, guard: Guard): Endpoint => ({ ...e, guard });

export interface EndpointGroup {
  readonly endpoints: readonly Endpoint[];
  /** `guard` runs first, then whatever guard an endpoint already had */
  withGuard(guard: Guard): EndpointGroup;
  withPrefix(prefix: string): EndpointGroup;
  withMiddleware(middleware: Middleware): EndpointGroup;
}

/** Endpoints sharing guards, a path prefix or middleware. Never mutates its input. */
export const group = (...endpoints: readonly Endpoint[]): EndpointGroup => {
  const update = (fn: (e: Endpoint) => Endpoint): EndpointGroup => group(...endpoints.map(fn));

  return {
    endpoints,
    withGuard: (guard) =>
      update((e) => ({ ...e, guard: e.guard === undefined ? guard : guardStack(guard, e.guard) })),
    withPrefix: (prefix) => update((e) => ({ ...e, path: `${prefix}${e.path}` })),
    withMiddleware: (middleware) =>
      update((e) => ({ ...e, middleware: [middleware, ...(e.middleware ?? [])] })),
  };
};
