import {
  isProblemDetail,
  type ProblemFactory,
  problems,
  withDetail,
} from "../../core/errors/problem.js";
import { err, ok, type Result } from "../../core/types/result.js";
import { timingSafeEqual } from "../../shared/utils/timing-safe.js";
import { type Guard, proceedWith } from "../guard.js";

/** Resolves a bearer token to whoever presented it. */
export type TokenVerifier<T> = (token: string) => Promise<Result<T, unknown>> | Result<T, unknown>;

export interface BearerGuardOptions {
  /** Locals key the verified principal is stored under */
  readonly localsKey?: string | undefined;
  readonly problems?: ProblemFactory | undefined;
}

export const PRINCIPAL_KEY = "principal";

/**
 * Extracts and verifies the Bearer token from the Authorization header.
 * A verifier failing with a problem answers with that problem; any other
 * failure is a 401.
 */
export const bearerGuard = <T>(
  verify: TokenVerifier<T>,
  options: BearerGuardOptions = {},
): Guard => {
  const localsKey = options.localsKey ?? PRINCIPAL_KEY;
  const factory = options.problems ?? problems;

  return async (req) => {
    const header = req.headers.get("authorization");
    if (!header) return err(withDetail(factory.unauthorized(req), "Missing Authorization header"));

    const parts = header.split(" ");
    if (parts.length !== 2 || parts[0] !== "Bearer") {
      return err(withDetail(factory.unauthorized(req), "Invalid Authorization header format"));
    }

    const token = parts[1];
    if (!token) return err(withDetail(factory.unauthorized(req), "Missing token"));

    const verified = await verify(token);
    if (!verified.ok) {
      return err(isProblemDetail(verified.error) ? verified.error : factory.unauthorized(req));
    }

    return proceedWith({ locals: { [localsKey]: verified.value } });
  };
};

/** Verifier accepting exactly one shared secret. */
export const staticTokenVerifier =
  <T>(expected: string, principal: T): TokenVerifier<T> =>
  (token) =>
    timingSafeEqual(token, expected) ? ok(principal) : err(new Error("token mismatch"));
