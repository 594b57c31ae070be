import type { ParameterSource } from "./problem.js";

/**
 * Developer/configuration errors. These never reach the client as their own
 * text: the handler logs them and answers with a generic server error.
 */

/** A raw value could not be converted to the field's type. */
export class ParamConversionError extends Error {
  override readonly name = "ParamConversionError";

  constructor(
    readonly paramName: string,
    readonly targetType: string,
    readonly sourceKind: ParameterSource,
    override readonly cause: Error,
  ) {
    super(`failed to convert parameter "${paramName}" to ${targetType}: ${cause.message}`);
  }
}

/** The field's schema has no string conversion (arrays, objects, maps...). */
export class UnsupportedFieldTypeError extends Error {
  override readonly name = "UnsupportedFieldTypeError";

  constructor(
    readonly field: string,
    readonly typeName: string,
  ) {
    super(`unsupported field type: ${field} is ${typeName}`);
  }
}

/** The value handed over as a params definition was not built by `defineParams`. */
export class InvalidParamsDefinitionError extends Error {
  override readonly name = "InvalidParamsDefinitionError";

  constructor(readonly provided: string) {
    super(`params must be created with defineParams, got ${provided}`);
  }
}

/** Wraps a setup error with the step that produced it. */
export class SetupError extends Error {
  override readonly name = "SetupError";

  constructor(
    readonly step: string,
    override readonly cause: Error,
  ) {
    super(`${step}: ${cause.message}`);
  }
}
