/**
 * Problem Details (RFC 9457): the only error shape a client ever sees.
 *
 * Every scenario has a fixed status, title and machine-readable code; the
 * detail is a default the caller may override with `withDetail`.
 */

export const ProblemScenario = {
  BAD_REQUEST: "BAD_REQUEST",
  BAD_PARAMETERS: "BAD_PARAMETERS",
  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",
  NOT_FOUND: "NOT_FOUND",
  RESOURCE_EXISTS: "RESOURCE_EXISTS",
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
  BUSINESS_RULE_VIOLATION: "BUSINESS_RULE_VIOLATION",
  CONSTRAINT_VIOLATION: "CONSTRAINT_VIOLATION",
  TOO_MANY_REQUESTS: "TOO_MANY_REQUESTS",
  SERVER_ERROR: "SERVER_ERROR",
} as const;

export type ProblemScenario = (typeof ProblemScenario)[keyof typeof ProblemScenario];

export type ParameterSource = "query" | "header" | "path" | "";

/** A request parameter that failed conversion or validation. */
export interface ParameterViolation {
  readonly parameter: string;
  readonly detail: string;
  readonly type: ParameterSource;
}

/** A body property that failed validation, located by a JSON pointer. */
export interface PropertyViolation {
  readonly detail: string;
  readonly pointer: string;
}

export interface ProblemDetail {
  readonly kind: "problem";
  readonly type: string;
  readonly title: string;
  readonly detail: string;
  readonly status: number;
  readonly code: string;
  readonly instance: string;
  readonly extensions: Readonly<Record<string, unknown>>;
}

interface CatalogEntry {
  readonly slug: string;
  readonly title: string;
  readonly status: number;
  readonly code: string;
  readonly detail: (method: string) => string;
}

const CATALOG: Record<ProblemScenario, CatalogEntry> = {
  BAD_REQUEST: {
    slug: "bad-request",
    title: "Bad Request",
    status: 400,
    code: "400-01",
    detail: () => "The request is invalid or malformed",
  },
  BAD_PARAMETERS: {
    slug: "bad-parameters",
    title: "Bad Parameters",
    status: 400,
    code: "400-02",
    detail: () => "The request parameters are invalid or malformed",
  },
  UNAUTHORIZED: {
    slug: "unauthorized",
    title: "Unauthorized",
    status: 401,
    code: "401-01",
    detail: (method) => `You must be authenticated to ${method} this resource`,
  },
  FORBIDDEN: {
    slug: "forbidden",
    title: "Forbidden",
    status: 403,
    code: "403-01",
    detail: (method) => `You do not have the necessary permissions to ${method} this resource`,
  },
  NOT_FOUND: {
    slug: "not-found",
    title: "Not Found",
    status: 404,
    code: "404-01",
    detail: () => "The requested resource was not found",
  },
  RESOURCE_EXISTS: {
    slug: "resource-exists",
    title: "Resource Exists",
    status: 409,
    code: "409-01",
    detail: () => "A resource already exists with the specified identifier",
  },
  PAYLOAD_TOO_LARGE: {
    slug: "payload-too-large",
    title: "Payload Too Large",
    status: 413,
    code: "413-01",
    detail: () => "The request body exceeds the maximum allowed size",
  },
  BUSINESS_RULE_VIOLATION: {
    slug: "business-rule-violation",
    title: "Business Rule Violation",
    status: 422,
    code: "422-01",
    detail: () => "The request violates one or more business rules",
  },
  CONSTRAINT_VIOLATION: {
    slug: "constraint-violation",
    title: "Constraint Violation",
    status: 422,
    code: "422-02",
    detail: () => "The request data violated one or more validation constraints",
  },
  TOO_MANY_REQUESTS: {
    slug: "too-many-requests",
    title: "Too Many Requests",
    status: 429,
    code: "429-01",
    detail: () => "You have sent too many requests in a given amount of time",
  },
  SERVER_ERROR: {
    slug: "server-error",
    title: "Server Error",
    status: 500,
    code: "500-01",
    detail: () => "The server encountered an unexpected internal error",
  },
};

export const DEFAULT_PROBLEM_TYPE_BASE = "/problems/";

/** The parts of a request a problem needs: its method and its path. */
export type ProblemTarget = Pick<Request, "method" | "url">;

const instanceOf = (target: ProblemTarget): string => {
  try {
    return new URL(target.url).pathname;
  } catch {
    return target.url;
  }
};

/**
 * Build the problem for a scenario. Pure: the same inputs always give the
 * same document.
 */
export const problemFor = (
  scenario: ProblemScenario,
  target: ProblemTarget,
  typeBase: string = DEFAULT_PROBLEM_TYPE_BASE,
): ProblemDetail => {
  const entry = CATALOG[scenario];
  return {
    kind: "problem",
    type: `${typeBase}${entry.slug}.md`,
    title: entry.title,
    detail: entry.detail(target.method),
    status: entry.status,
    code: entry.code,
    instance: instanceOf(target),
    extensions: {},
  };
};

export const httpStatus = (scenario: ProblemScenario): number => CATALOG[scenario].status;

/** Copy of `problem` with its detail replaced. */
export const withDetail = (problem: ProblemDetail, detail: string): ProblemDetail => ({
  ...problem,
  detail,
  extensions: { ...problem.extensions },
});

/** Copy of `problem` with one extension member added or replaced. */
export const withExtension = (
  problem: ProblemDetail,
  key: string,
  value: unknown,
): ProblemDetail => ({
  ...problem,
  extensions: { ...problem.extensions, [key]: value },
});

export const isProblemDetail = (value: unknown): value is ProblemDetail =>
  typeof value === "object" &&
  value !== null &&
  "kind" in value &&
  value.kind === "problem" &&
  "status" in value &&
  typeof value.status === "number";

/** Log form of a problem, `"<status> <title>: <detail>"`. */
export const problemMessage = (problem: ProblemDetail): string =>
  `${problem.status} ${problem.title}: ${problem.detail}`;

/**
 * The wire document. Reserved members always win over an extension of the
 * same name.
 */
export const problemBody = (problem: ProblemDetail): Record<string, unknown> => ({
  ...problem.extensions,
  type: problem.type,
  title: problem.title,
  detail: problem.detail,
  status: problem.status,
  code: problem.code,
  instance: problem.instance,
});

const parameterWire = (v: ParameterViolation): Record<string, string> =>
  v.type === ""
    ? { parameter: v.parameter, detail: v.detail }
    : { parameter: v.parameter, detail: v.detail, type: v.type };

/** Factory helpers bound to one documentation base */
export const createProblemFactory = (typeBase: string = DEFAULT_PROBLEM_TYPE_BASE) => ({
  typeBase,
  badRequest: (target: ProblemTarget): ProblemDetail =>
    problemFor(ProblemScenario.BAD_REQUEST, target, typeBase),
  badParameters: (target: ProblemTarget, ...violations: ParameterViolation[]): ProblemDetail =>
    withExtension(
      problemFor(ProblemScenario.BAD_PARAMETERS, target, typeBase),
      "violations",
      violations.map(parameterWire),
    ),
  unauthorized: (target: ProblemTarget): ProblemDetail =>
    problemFor(ProblemScenario.UNAUTHORIZED, target, typeBase),
  forbidden: (target: ProblemTarget): ProblemDetail =>
    problemFor(ProblemScenario.FORBIDDEN, target, typeBase),
  notFound: (target: ProblemTarget): ProblemDetail =>
    problemFor(ProblemScenario.NOT_FOUND, target, typeBase),
  resourceExists: (target: ProblemTarget): ProblemDetail =>
    problemFor(ProblemScenario.RESOURCE_EXISTS, target, typeBase),
  payloadTooLarge: (target: ProblemTarget): ProblemDetail =>
    problemFor(ProblemScenario.PAYLOAD_TOO_LARGE, target, typeBase),
  businessRuleViolation: (target: ProblemTarget): ProblemDetail =>
    problemFor(ProblemScenario.BUSINESS_RULE_VIOLATION, target, typeBase),
  constraintViolation: (target: ProblemTarget, ...violations: PropertyViolation[]): ProblemDetail =>
    withExtension(
      problemFor(ProblemScenario.CONSTRAINT_VIOLATION, target, typeBase),
      "violations",
      violations.map((v) => ({ detail: v.detail, pointer: v.pointer })),
    ),
  tooManyRequests: (target: ProblemTarget): ProblemDetail =>
    problemFor(ProblemScenario.TOO_MANY_REQUESTS, target, typeBase),
  serverError: (target: ProblemTarget): ProblemDetail =>
    problemFor(ProblemScenario.SERVER_ERROR, target, typeBase),
});

export type ProblemFactory = ReturnType<typeof createProblemFactory>;

export const problems: ProblemFactory = createProblemFactory();

export const {
  badRequest,
  badParameters,
  unauthorized,
  forbidden,
  notFound,
  resourceExists,
  payloadTooLarge,
  businessRuleViolation,
  constraintViolation,
  tooManyRequests,
  serverError,
} = problems;
