import type { ZodTypeAny } from "zod";
import type { ParameterViolation } from "../errors/problem.js";
import type { FieldFailure, StructValidator } from "../ports/validator.js";
import { err, ok, type Result } from "../types/result.js";
import { describeFailure } from "../validation/describe.js";
import { coerceParam, type FieldKind, fieldKindOf, zeroValue } from "./coerce.js";
import type { ParamsDefinition } from "./definition.js";
import {
  isDefaulted,
  type ParamSource,
  parameterSource,
  type ResolvedParam,
  reportingKey,
  resolveParam,
} from "./resolver.js";
import { type FieldDescriptor, parseTag } from "./tag.js";

export interface FieldBinding {
  readonly field: string;
  readonly kind: FieldKind;
  readonly schema: ZodTypeAny;
  /** null when the field carries no usable annotation */
  readonly descriptor: FieldDescriptor | null;
}

const descriptorCache = new WeakMap<ParamsDefinition<unknown>, readonly FieldBinding[]>();

/**
 * One binding per schema field, computed on first use and shared by every
 * later request for the same definition.
 */
export const deriveDescriptors = <P>(definition: ParamsDefinition<P>): readonly FieldBinding[] => {
  const cached = descriptorCache.get(definition);
  if (cached) return cached;

  const shape: Record<string, ZodTypeAny> = definition.schema.shape;
  const bindings = Object.freeze(
    Object.entries(shape).map(
      ([field, schema]): FieldBinding =>
        Object.freeze({
          field,
          kind: fieldKindOf(schema),
          schema,
          descriptor: parseTag(definition.tags[field]),
        }),
    ),
  );

  descriptorCache.set(definition, bindings);
  return bindings;
};

export type BindFailure =
  | { readonly kind: "invalid"; readonly violations: readonly ParameterViolation[] }
  | { readonly kind: "setup"; readonly error: Error };

export interface BoundParams<P> {
  readonly value: P;
  readonly resolved: Readonly<Record<string, ResolvedParam>>;
}

interface ReportingInfo {
  readonly key: string;
  readonly source: ParameterViolation["type"];
}

const violationFor = (
  failure: FieldFailure,
  reporting: ReadonlyMap<string, ReportingInfo>,
): ParameterViolation => {
  const top = failure.path[0];
  const field = top === undefined ? failure.field : String(top);
  const info = reporting.get(field) ?? { key: field, source: "" };
  return { parameter: info.key, detail: describeFailure(info.key, failure), type: info.source };
};

/**
 * Hydrate a params value from a request: resolve and convert every field,
 * then validate all of them except those filled from a `default` literal
 * and those that already failed conversion.
 *
 * Conversion and validation failures are collected together so the client
 * sees every violation at once. Malformed defaults and unsupported field
 * types are setup failures and stop binding.
 */
export const bindParams = <P>(
  definition: ParamsDefinition<P>,
  source: ParamSource,
  validator: StructValidator,
): Result<BoundParams<P>, BindFailure> => {
  const values: Record<string, unknown> = {};
  const resolvedByField: Record<string, ResolvedParam> = {};
  const reporting = new Map<string, ReportingInfo>();
  const skipped: string[] = [];
  const violations: ParameterViolation[] = [];

  for (const binding of deriveDescriptors(definition)) {
    const resolved = resolveParam(source, binding.descriptor);
    resolvedByField[binding.field] = resolved;
    reporting.set(binding.field, {
      key: reportingKey(resolved, binding.field),
      source: parameterSource(resolved.sourceKind),
    });

    if (isDefaulted(resolved)) skipped.push(binding.field);

    values[binding.field] = zeroValue(binding.kind);

    const coerced = coerceParam(binding.field, binding.kind, binding.schema, resolved);
    if (coerced === null) continue;

    if (coerced.ok) {
      values[binding.field] = coerced.value;
      continue;
    }

    if (coerced.error.kind === "setup") {
      return err({ kind: "setup", error: coerced.error.error });
    }

    // Already reported; its zero value would only fail validation again.
    skipped.push(binding.field);
    const conversion = coerced.error.error;
    violations.push({
      parameter: conversion.paramName,
      detail: `must be a valid ${conversion.targetType}`,
      type: conversion.sourceKind,
    });
  }

  const validated = validator.validateExcept(definition.schema, values, skipped);
  if (!validated.ok) {
    for (const failure of validated.error) violations.push(violationFor(failure, reporting));
  }

  if (violations.length > 0) return err({ kind: "invalid", violations });

  const assembled = definition.assemble.safeParse(validated.ok ? validated.value : values);
  if (!assembled.success) {
    return err({ kind: "setup", error: new Error("bound params are not an object") });
  }

  return ok({ value: assembled.data, resolved: resolvedByField });
};
