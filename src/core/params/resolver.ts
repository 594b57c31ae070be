import type { ParameterSource } from "../errors/problem.js";
import {
  type FieldDescriptor,
  SOURCE_DEFAULT,
  SOURCE_HEADER,
  SOURCE_PATH,
  SOURCE_QUERY,
} from "./tag.js";

/** What the resolver reads from: query string, headers and path variables. */
export interface ParamSource {
  query(key: string): string;
  header(key: string): string;
  path(key: string): string;
}

export interface ResolvedParam {
  readonly canonicalName: string;
  /** The key the value was found under, "default" for a literal default */
  readonly actualKey: string;
  readonly sourceKind: string;
  readonly rawValue: string;
}

const EMPTY: ResolvedParam = { canonicalName: "", actualKey: "", sourceKind: "", rawValue: "" };

/**
 * Build a ParamSource over a fetch Request. A repeated query key yields its
 * first value; repeated headers come back joined, as `Headers.get` gives them.
 */
export const requestSource = (
  req: Pick<Request, "url" | "headers">,
  pathParams: Readonly<Record<string, string>> = {},
): ParamSource => {
  let search: URLSearchParams | undefined;
  return {
    query: (key) => {
      search ??= new URL(req.url).searchParams;
      return search.get(key) ?? "";
    },
    header: (key) => req.headers.get(key) ?? "",
    path: (key) => pathParams[key] ?? "",
  };
};

const lookup = (source: ParamSource, kind: string, key: string): string => {
  switch (kind) {
    case SOURCE_QUERY:
      return source.query(key);
    case SOURCE_HEADER:
      return source.header(key);
    case SOURCE_PATH:
      return source.path(key);
    default:
      return "";
  }
};

/**
 * Walk the descriptor's parts in order and return the first non-empty value.
 * An empty string counts as absent. Reaching a `default` part ends the walk
 * with its literal.
 */
export const resolveParam = (
  source: ParamSource,
  descriptor: FieldDescriptor | null,
): ResolvedParam => {
  if (descriptor === null) return EMPTY;

  for (const part of descriptor.parts) {
    if (part.source === SOURCE_DEFAULT) {
      return {
        canonicalName: descriptor.canonicalName,
        actualKey: SOURCE_DEFAULT,
        sourceKind: descriptor.firstSource,
        rawValue: part.key,
      };
    }

    const value = lookup(source, part.source, part.key);
    if (value !== "") {
      return {
        canonicalName: descriptor.canonicalName,
        actualKey: part.key,
        sourceKind: part.source,
        rawValue: value,
      };
    }
  }

  return {
    canonicalName: descriptor.canonicalName,
    actualKey: descriptor.canonicalName,
    sourceKind: descriptor.firstSource,
    rawValue: "",
  };
};

/** The name a client sees in errors about this parameter. */
export const reportingKey = (resolved: ResolvedParam, fieldName: string): string => {
  let key = resolved.actualKey;
  if (key === "" || key === SOURCE_DEFAULT) key = resolved.canonicalName;
  if (key === "") key = fieldName;
  return key;
};

export const isDefaulted = (resolved: ResolvedParam): boolean =>
  resolved.actualKey === SOURCE_DEFAULT;

export const parameterSource = (kind: string): ParameterSource => {
  switch (kind) {
    case SOURCE_QUERY:
    case SOURCE_HEADER:
    case SOURCE_PATH:
      return kind;
    default:
      return "";
  }
};
