import type { FieldFailure } from "../ports/validator.js";

/** Human-readable sentence for a rule violation on the field called `label`. */
export const describeFailure = (label: string, failure: FieldFailure): string => {
  switch (failure.rule) {
    case "required":
      return `${label} is required`;
    case "email":
      return `${label} should be a valid email`;
    case "e164":
      return `${label} should be a valid international phone number (e.g. +33 6 06 06 06 06)`;
    case "invalid":
      return `${label} is invalid`;
    default: {
      if (failure.rule.includes("uuid")) {
        return `${label} should be a valid ${failure.rule.toUpperCase()}`;
      }
      const suffix = failure.param !== undefined && failure.param !== "" ? `=${failure.param}` : "";
      return `${label} should be ${failure.rule}${suffix}`;
    }
  }
};

/** JSON pointer for a failure path: ["inner", "thing"] → "/inner/thing". */
export const pointerOf = (path: ReadonlyArray<string | number>): string =>
  `/${path.map((segment) => String(segment).replaceAll("~", "~0").replaceAll("/", "~1")).join("/")}`;
