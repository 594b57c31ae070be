import { type RefinementCtx, type ZodEffects, type ZodString, type ZodTypeAny, z } from "zod";
import { NIL_UUID } from "../../core/params/coerce.js";

/** True for the value a field holds when nothing was bound to it. */
export const isZero = (value: unknown): boolean => {
  if (value === undefined || value === null) return true;
  if (value === "" || value === 0 || value === false || value === NIL_UUID) return true;
  if (value instanceof Date) return value.getTime() === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
};

/**
 * A named refinement, reported as `<field> should be <name>[=<param>]`.
 *
 * @example
 * z.string().superRefine(rule("lowercase", (s: string) => s === s.toLowerCase()))
 */
export const rule =
  <V>(name: string, check: (value: V) => boolean, param?: string) =>
  (value: V, ctx: RefinementCtx): void => {
    if (check(value)) return;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: param === undefined ? name : `${name}=${param}`,
      params: param === undefined ? { rule: name } : { rule: name, param },
    });
  };

/** Rejects zero values: "", 0, false, the nil UUID, the epoch. */
export const required = <T extends ZodTypeAny>(
  schema: T,
): ZodEffects<T, T["_output"], T["_input"]> =>
  schema.superRefine(rule("required", (value: unknown) => !isZero(value)));

const E164_PATTERN = /^\+[1-9]?[0-9]{7,14}$/;

/** International phone number in E.164 form, e.g. +33606060606. */
export const e164 = (schema: ZodString): ZodEffects<ZodString, string, string> =>
  schema.superRefine(rule("e164", (value: string) => E164_PATTERN.test(value)));
