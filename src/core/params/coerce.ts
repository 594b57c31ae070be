import { validate as isUuid } from "uuid";
import {
  ZodBoolean,
  ZodBranded,
  ZodCatch,
  ZodDate,
  ZodDefault,
  ZodEffects,
  ZodEnum,
  ZodLiteral,
  ZodNullable,
  ZodNumber,
  ZodOptional,
  ZodPipeline,
  ZodReadonly,
  ZodString,
  type ZodTypeAny,
} from "zod";
import { ParamConversionError, UnsupportedFieldTypeError } from "../errors/setup-error.js";
import { err, ok, type Result } from "../types/result.js";
import { isDefaulted, parameterSource, type ResolvedParam } from "./resolver.js";

export type FieldKind = "string" | "int" | "float" | "bool" | "uuid" | "timestamp" | "unsupported";

export const NIL_UUID = "00000000-0000-0000-0000-000000000000";

/** Value a field holds when nothing was bound to it. */
export const zeroValue = (kind: FieldKind): unknown => {
  switch (kind) {
    case "string":
      return "";
    case "int":
    case "float":
      return 0;
    case "bool":
      return false;
    case "uuid":
      return NIL_UUID;
    case "timestamp":
      return new Date(0);
    case "unsupported":
      return undefined;
  }
};

/** Strip wrappers that do not change what a raw string converts into. */
const unwrap = (schema: ZodTypeAny): ZodTypeAny => {
  if (schema instanceof ZodOptional || schema instanceof ZodNullable) return unwrap(schema.unwrap());
  if (schema instanceof ZodDefault) return unwrap(schema.removeDefault());
  if (schema instanceof ZodCatch) return unwrap(schema.removeCatch());
  if (schema instanceof ZodEffects) return unwrap(schema.innerType());
  if (schema instanceof ZodBranded || schema instanceof ZodReadonly) return unwrap(schema.unwrap());
  if (schema instanceof ZodPipeline) return unwrap(schema._def.in);
  return schema;
};

/** Target kind of a params field, read off its schema. */
export const fieldKindOf = (schema: ZodTypeAny): FieldKind => {
  const inner = unwrap(schema);
  if (inner instanceof ZodString) return inner.isUUID ? "uuid" : "string";
  if (inner instanceof ZodNumber) return inner.isInt ? "int" : "float";
  if (inner instanceof ZodBoolean) return "bool";
  if (inner instanceof ZodDate) return "timestamp";
  if (inner instanceof ZodEnum) return "string";
  if (inner instanceof ZodLiteral && typeof inner.value === "string") return "string";
  return "unsupported";
};

/** Type name of a schema, as reported in setup errors. */
export const schemaTypeName = (schema: ZodTypeAny): string => unwrap(schema).constructor.name;

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(\.\d+)?(?:[Zz]|[+-](\d{2}):(\d{2}))$/;

const TRUE_LITERALS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_LITERALS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

const parseInt64 = (raw: string): Result<number, Error> => {
  if (!INT_PATTERN.test(raw)) return err(new Error(`parsing "${raw}": invalid syntax`));
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) return err(new Error(`parsing "${raw}": value out of range`));
  return ok(value);
};

const parseBool = (raw: string): Result<boolean, Error> => {
  if (TRUE_LITERALS.has(raw)) return ok(true);
  if (FALSE_LITERALS.has(raw)) return ok(false);
  return err(new Error(`parsing "${raw}": invalid syntax`));
};

const parseFloat64 = (raw: string): Result<number, Error> => {
  switch (raw.toLowerCase()) {
    case "inf":
    case "+inf":
    case "infinity":
    case "+infinity":
      return ok(Number.POSITIVE_INFINITY);
    case "-inf":
    case "-infinity":
      return ok(Number.NEGATIVE_INFINITY);
    case "nan":
      return ok(Number.NaN);
  }
  if (!FLOAT_PATTERN.test(raw)) return err(new Error(`parsing "${raw}": invalid syntax`));
  const value = Number(raw);
  if (!Number.isFinite(value)) return err(new Error(`parsing "${raw}": value out of range`));
  return ok(value);
};

const parseUuid = (raw: string): Result<string, Error> =>
  isUuid(raw) ? ok(raw.toLowerCase()) : err(new Error(`invalid UUID format: "${raw}"`));

/** True when every calendar and clock field is in range, e.g. no February 30. */
const inRange = (fields: readonly number[]): boolean => {
  const [year = 0, month = 0, day = 0, hour = 0, minute = 0, second = 0, offH = 0, offM = 0] =
    fields;
  const check = new Date(0);
  check.setUTCFullYear(year, month - 1, day);
  check.setUTCHours(hour, minute, second, 0);
  return (
    check.getUTCFullYear() === year &&
    check.getUTCMonth() === month - 1 &&
    check.getUTCDate() === day &&
    check.getUTCHours() === hour &&
    check.getUTCMinutes() === minute &&
    check.getUTCSeconds() === second &&
    offH < 24 &&
    offM < 60
  );
};

const parseTimestamp = (raw: string): Result<Date, Error> => {
  const match = RFC3339_PATTERN.exec(raw);
  if (match === null) return err(new Error(`parsing time "${raw}": not RFC 3339`));
  const [, y, mo, d, h, mi, s, , offH, offM] = match;
  const fields = [y, mo, d, h, mi, s, offH, offM].map((f) => Number(f ?? "0"));
  if (!inRange(fields)) return err(new Error(`parsing time "${raw}": field out of range`));
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) return err(new Error(`parsing time "${raw}": out of range`));
  return ok(date);
};

/**
 * A conversion failure is either the client's (bad input) or the
 * developer's (a malformed default literal, an unsupported field type).
 */
export type CoercionFailure =
  | { readonly kind: "client"; readonly error: ParamConversionError }
  | { readonly kind: "setup"; readonly error: ParamConversionError | UnsupportedFieldTypeError };

type ConvertibleKind = Exclude<FieldKind, "unsupported">;

const CONVERTERS: Record<ConvertibleKind, (raw: string) => Result<unknown, Error>> = {
  string: (raw) => ok(raw),
  int: parseInt64,
  float: parseFloat64,
  bool: parseBool,
  uuid: parseUuid,
  timestamp: parseTimestamp,
};

/**
 * Convert a resolved raw value into the field's type. Returns null for an
 * empty raw value: the caller keeps the field's zero value.
 */
export const coerceParam = (
  field: string,
  kind: FieldKind,
  schema: ZodTypeAny,
  resolved: ResolvedParam,
): Result<unknown, CoercionFailure> | null => {
  const raw = resolved.rawValue;
  if (raw === "") return null;

  if (kind === "unsupported") {
    return err<CoercionFailure>({
      kind: "setup",
      error: new UnsupportedFieldTypeError(field, schemaTypeName(schema)),
    });
  }

  const parsed = CONVERTERS[kind](raw);
  if (parsed.ok) return parsed;

  const error = new ParamConversionError(
    resolved.actualKey,
    kind,
    parameterSource(resolved.sourceKind),
    parsed.error,
  );

  return err<CoercionFailure>(
    isDefaulted(resolved) ? { kind: "setup", error } : { kind: "client", error },
  );
};
