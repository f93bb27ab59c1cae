/**
 * Uniqueness resolver
 *
 * Checks unique constraints against the store before a write. A constraint
 * is only checked when it touches a field in scope, and is skipped entirely
 * when any of its values is absent (sparse semantics).
 */

import type { ErrorMessages } from "./errors.js";
import type { UniqueConstraint } from "./indexes.js";
import { metrics } from "./observability/metrics.js";
import { getPath } from "./query.js";
import { DISCRIMINATOR_ATTRIBUTE, ID_ATTRIBUTE } from "./schema/schema.js";
import type { DocumentId, Filter, StoreDriver, WireDocument } from "./types.js";

export const UNIQUE_FIELD_MESSAGE = "Field value must be unique.";

export function uniqueTogetherMessage(fields: readonly string[]): string {
  return `Values of fields [${fields.join(", ")}] must be unique together.`;
}

export interface UniquenessTarget {
  driver: StoreDriver;
  collection: string;
  /** Full wire payload of the document being written */
  payload: WireDocument;
  /** Identity to exclude (the document itself, on update) */
  id?: DocumentId;
  /** Discriminator value for constraints scoped to a subtype */
  discriminator?: string;
}

/**
 * Build the store query matching documents that conflict with `target`, or
 * undefined when the constraint does not apply
 */
export function conflictQuery(constraint: UniqueConstraint, target: UniquenessTarget): Filter | undefined {
  const query: Filter = {};
  for (const path of constraint.paths) {
    const value = getPath(target.payload, path);
    if (value === undefined || value === null) {
      return undefined;
    }
    query[path] = value;
  }
  if (constraint.scoped && target.discriminator !== undefined) {
    query[DISCRIMINATOR_ATTRIBUTE] = target.discriminator;
  }
  if (target.id !== undefined) {
    query[ID_ATTRIBUTE] = { $ne: target.id };
  }
  return query;
}

/**
 * Count conflicting documents for every constraint touching `fields`.
 * Constraints are checked concurrently.
 * @returns Messages keyed by field; empty when nothing conflicts
 */
export async function checkUniqueness(
  constraints: readonly UniqueConstraint[],
  fields: ReadonlySet<string>,
  target: UniquenessTarget
): Promise<ErrorMessages> {
  const checks = constraints
    .filter((constraint) => constraint.fields.some((field) => fields.has(field)))
    .map(async (constraint) => {
      const query = conflictQuery(constraint, target);
      if (!query) {
        return undefined;
      }
      const count = await metrics.track(target.collection, "count", () =>
        target.driver.count(target.collection, query)
      );
      return count > 0 ? constraint : undefined;
    });

  const errors: ErrorMessages = {};
  for (const conflict of await Promise.all(checks)) {
    if (!conflict) continue;
    const message =
      conflict.fields.length === 1 && conflict.paths.length === 1
        ? UNIQUE_FIELD_MESSAGE
        : uniqueTogetherMessage(conflict.fields);
    for (const field of conflict.fields) {
      const existing = errors[field];
      const list = Array.isArray(existing) ? existing : [];
      if (!list.includes(message)) {
        list.push(message);
      }
      errors[field] = list;
    }
  }
  return errors;
}
