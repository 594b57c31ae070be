import type { Middleware } from "../context.js";

/** Equivalent to helmet's defaults for an API that serves no HTML. */
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "X-XSS-Protection": "0",
  "Strict-Transport-Security": "max-age=63072000; includeSubDomains; preload",
  "Content-Security-Policy": "default-src 'none'; frame-ancestors 'none'",
  "Referrer-Policy": "strict-origin-when-cross-origin",
  "Permissions-Policy": "camera=(), microphone=(), geolocation=()",
  "Cache-Control": "no-store",
  "X-Permitted-Cross-Domain-Policies": "none",
};

/**
 * Adds the security headers to every response. Headers the handler already
 * set are kept.
 */
export const securityHeaders = (overrides: Readonly<Record<string, string>> = {}): Middleware => {
  const entries: ReadonlyArray<readonly [string, string]> = Object.freeze(
    Object.entries({ ...SECURITY_HEADERS, ...overrides }),
  );

  return (next) => async (req, ctx) => {
    const res = await next(req, ctx);
    const headers = new Headers(res.headers);
    for (const [name, value] of entries) {
      if (!headers.has(name)) headers.set(name, value);
    }
    return new Response(res.body, { status: res.status, statusText: res.statusText, headers });
  };
};
