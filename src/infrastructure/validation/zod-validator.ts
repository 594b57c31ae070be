import type { AnyZodObject, ZodIssue, ZodType, ZodTypeDef } from "zod";
import type { FieldFailure, StructValidator } from "../../core/ports/validator.js";
import { err, ok } from "../../core/types/result.js";

const lastField = (path: ReadonlyArray<string | number>): string => {
  for (let i = path.length - 1; i >= 0; i--) {
    const segment = path[i];
    if (typeof segment === "string") return segment;
  }
  return "";
};

const ruleOf = (issue: ZodIssue): Pick<FieldFailure, "rule" | "param"> => {
  switch (issue.code) {
    case "invalid_type":
      return issue.received === "undefined" || issue.received === "null"
        ? { rule: "required" }
        : { rule: "invalid" };
    case "custom": {
      const rule: unknown = issue.params?.["rule"];
      const param: unknown = issue.params?.["param"];
      return typeof rule === "string"
        ? { rule, param: typeof param === "string" ? param : undefined }
        : { rule: "invalid" };
    }
    case "invalid_string":
      return typeof issue.validation === "string" ? { rule: issue.validation } : { rule: "invalid" };
    case "too_small":
      return { rule: issue.exact ? "len" : "min", param: String(issue.minimum) };
    case "too_big":
      return { rule: issue.exact ? "len" : "max", param: String(issue.maximum) };
    case "invalid_enum_value":
      return { rule: "oneof", param: issue.options.map(String).join(" ") };
    case "invalid_literal":
      return { rule: "eq", param: String(issue.expected) };
    default:
      return { rule: "invalid" };
  }
};

export const toFieldFailure = (issue: ZodIssue): FieldFailure => ({
  path: issue.path,
  field: lastField(issue.path),
  ...ruleOf(issue),
});

/**
 * StructValidator over zod. Issues become tag-style rules
 * (`required`, `min=3`, `oneof=a b`) so descriptions read the same whatever
 * schema produced them.
 */
export const createZodValidator = (): StructValidator => ({
  validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown) {
    const result = schema.safeParse(value);
    return result.success ? ok(result.data) : err(result.error.issues.map(toFieldFailure));
  },

  validateExcept(
    schema: AnyZodObject,
    value: Readonly<Record<string, unknown>>,
    except: readonly string[],
  ) {
    const skipped = new Set(except);
    const mask: Record<string, true> = {};
    for (const key of skipped) mask[key] = true;

    const input: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      if (!skipped.has(key)) input[key] = v;
    }

    const result = schema.omit(mask).safeParse(input);
    if (!result.success) return err(result.error.issues.map(toFieldFailure));

    const parsed: Record<string, unknown> = result.data;
    return ok({ ...value, ...parsed });
  },
});

/** Process-wide validator, created on first use. */
let shared: StructValidator | undefined;

export const defaultValidator = (): StructValidator => {
  shared ??= createZodValidator();
  return shared;
};
