/**
 * Built-in synchronous validators
 *
 * A validator throws a `ValidationError` with a plain message; the engine
 * collects the messages of every validator of a field.
 */

import { UsageError, ValidationError } from "./errors.js";
import type { Validator } from "./fields/field.js";

interface Bounds {
  min?: number;
  max?: number;
}

/**
 * Length of a string or list
 */
export function length(bounds: Bounds & { equal?: number }): Validator<string | readonly unknown[]> {
  const { min, max, equal } = bounds;
  if (equal !== undefined && (min !== undefined || max !== undefined)) {
    throw new UsageError("length: `equal` cannot be combined with `min` or `max`");
  }
  return (value) => {
    if (equal !== undefined && value.length !== equal) {
      throw new ValidationError(`Length must be ${equal}.`);
    }
    if (min !== undefined && value.length < min) {
      throw new ValidationError(`Shorter than minimum length ${min}.`);
    }
    if (max !== undefined && value.length > max) {
      throw new ValidationError(`Longer than maximum length ${max}.`);
    }
  };
}

/**
 * Inclusive numeric range
 */
export function range(bounds: Bounds): Validator<number> {
  const { min, max } = bounds;
  return (value) => {
    if (min !== undefined && value < min) {
      throw new ValidationError(`Must be greater than or equal to ${min}.`);
    }
    if (max !== undefined && value > max) {
      throw new ValidationError(`Must be less than or equal to ${max}.`);
    }
  };
}

export function oneOf<T extends string | number | boolean>(choices: readonly T[]): Validator<T> {
  const allowed = new Set<unknown>(choices);
  return (value) => {
    if (!allowed.has(value)) {
      throw new ValidationError(`Must be one of: ${choices.join(", ")}.`);
    }
  };
}

export function regexp(pattern: RegExp, message = "String does not match expected pattern."): Validator<string> {
  return (value) => {
    // Global and sticky patterns keep state between calls
    pattern.lastIndex = 0;
    if (!pattern.test(value)) {
      throw new ValidationError(message);
    }
  };
}
