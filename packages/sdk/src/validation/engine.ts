/**
 * Validation engine
 *
 * Two passes over a set of fields:
 *
 * 1. Structural (sync): required-ness, type conformance, nested content and
 *    sync validators. Every field is checked; nothing stops at the first
 *    failing field.
 * 2. Async: one sequential chain per field carrying async validators. Chains
 *    of different fields run concurrently and are joined by a barrier before
 *    anything is reported. Fields that failed the structural pass are skipped.
 */

import { ValidationError } from "../errors.js";
import type { ErrorMessages, MessageTree } from "../errors.js";
import type { IoContext } from "../fields/field.js";
import type { Schema } from "../schema/schema.js";

/**
 * Read access to the values being validated
 */
export type ValueSource = (name: string) => unknown;

export function validateStructure(schema: Schema, values: ValueSource, names: Iterable<string>): ErrorMessages {
  const errors: ErrorMessages = {};
  for (const name of names) {
    const field = schema.field(name);
    if (!field) continue;
    try {
      field.validate(values(name));
    } catch (err) {
      if (!(err instanceof ValidationError)) {
        throw err;
      }
      errors[name] = err.toTree();
    }
  }
  return errors;
}

export async function validateIo(
  schema: Schema,
  values: ValueSource,
  names: Iterable<string>,
  context: IoContext,
  skip: ErrorMessages = {}
): Promise<ErrorMessages> {
  const scheduled: string[] = [];
  const chains: Array<Promise<void>> = [];

  for (const name of names) {
    const field = schema.field(name);
    if (!field || !field.hasIoValidation || Object.hasOwn(skip, name)) continue;
    scheduled.push(name);
    chains.push(field.ioValidate(values(name), context));
  }

  // Barrier: nothing is reported until every chain has settled
  const results = await Promise.allSettled(chains);

  const errors: ErrorMessages = {};
  let unexpected: { reason: unknown } | undefined;
  results.forEach((result, i) => {
    if (result.status === "fulfilled") return;
    if (result.reason instanceof ValidationError) {
      errors[scheduled[i]] = result.reason.toTree();
    } else {
      unexpected ??= { reason: result.reason };
    }
  });
  if (unexpected) {
    throw unexpected.reason;
  }
  return errors;
}

/**
 * Merge `source` into `target`. Lists for the same field are concatenated.
 */
export function mergeMessages(target: ErrorMessages, source: ErrorMessages): ErrorMessages {
  for (const [name, tree] of Object.entries(source)) {
    const existing = target[name];
    target[name] = existing === undefined ? tree : mergeTrees(existing, tree);
  }
  return target;
}

function mergeTrees(a: MessageTree, b: MessageTree): MessageTree {
  if (Array.isArray(a) && Array.isArray(b)) {
    return [...a, ...b];
  }
  if (!Array.isArray(a) && !Array.isArray(b)) {
    return mergeMessages({ ...a }, b);
  }
  return Array.isArray(a) ? { _schema: a, ...b } : { ...a, _schema: b };
}

export function hasErrors(errors: ErrorMessages): boolean {
  return Object.keys(errors).length > 0;
}

/**
 * @throws {ValidationError} Carrying every collected message, if any
 */
export function assertValid(errors: ErrorMessages): void {
  if (hasErrors(errors)) {
    throw new ValidationError(errors);
  }
}
