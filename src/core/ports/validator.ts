import type { AnyZodObject, ZodType, ZodTypeDef } from "zod";
import type { Result } from "../types/result.js";

/**
 * A single rule violation reported by a struct validator.
 *
 * `path` locates the offending value from the root of the validated object,
 * `field` is the last named segment of that path. `rule` and `param` name the
 * violated rule the way a tag would spell it: `required`, `min` + `3`.
 */
export interface FieldFailure {
  readonly path: ReadonlyArray<string | number>;
  readonly field: string;
  readonly rule: string;
  readonly param?: string | undefined;
}

/**
 * Port StructValidator. Validates a whole object in one pass and reports
 * every failure rather than the first.
 */
export interface StructValidator {
  validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): Result<T, readonly FieldFailure[]>;
  /** Validates every top-level field except those named in `except`. */
  validateExcept(
    schema: AnyZodObject,
    value: Readonly<Record<string, unknown>>,
    except: readonly string[],
  ): Result<Record<string, unknown>, readonly FieldFailure[]>;
}
