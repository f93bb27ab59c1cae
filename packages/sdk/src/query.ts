/**
 * Mango query evaluation engine
 *
 * Used by the memory driver; the mapper itself only builds filters.
 */

import type { Filter, WireDocument, Sort } from "./types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Get a nested value from an object using dot-path notation
 * @param obj - Object to get value from
 * @param path - Dot-separated path (e.g., "address.city")
 * @returns Value at path, or undefined if not found
 */
export function getPath(obj: unknown, path: string): unknown {
  return path
    .split(".")
    .reduce<unknown>((o, k) => (isPlainObject(o) || Array.isArray(o) ? Reflect.get(o, k) : undefined), obj);
}

/**
 * Collect every value reachable at a dot-path, descending into arrays the way
 * document stores do ("chapters.name" yields the name of each chapter)
 */
export function getPathValues(obj: unknown, path: string): unknown[] {
  const walk = (current: unknown, parts: string[]): unknown[] => {
    if (parts.length === 0) {
      return [current];
    }
    if (Array.isArray(current)) {
      const [head, ...rest] = parts;
      if (/^\d+$/.test(head)) {
        return walk(current[Number(head)], rest);
      }
      return current.flatMap((item) => walk(item, parts));
    }
    if (isPlainObject(current)) {
      const [head, ...rest] = parts;
      return walk(current[head], rest);
    }
    return [undefined];
  };
  return walk(obj, path.split("."));
}

/**
 * Equality on wire values (dates compare by time, arrays and objects by content)
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length && keys.every((k) => valuesEqual(a[k], b[k]))
    );
  }
  // Absent and null are the same thing for queries
  if (a == null && b == null) {
    return true;
  }
  return a === b;
}

/**
 * Expand a field value into the candidates a condition is tested against:
 * the value itself plus, for arrays, each element
 */
function candidates(values: unknown[]): unknown[] {
  const out: unknown[] = [];
  for (const value of values) {
    out.push(value);
    if (Array.isArray(value)) {
      out.push(...value);
    }
  }
  return out;
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "date";
  return typeof value;
}

/**
 * Evaluate a field-level condition
 * @param values - Every value found at the field path
 * @param cond - Condition to test (operator object or literal value)
 * @returns true if condition matches
 */
function matchField(values: unknown[], cond: unknown): boolean {
  const all = candidates(values);

  // If condition is an operator object
  if (isPlainObject(cond) && Object.keys(cond).some((k) => k.startsWith("$"))) {
    for (const [op, rhs] of Object.entries(cond)) {
      switch (op) {
        case "$eq":
          if (!all.some((v) => valuesEqual(v, rhs))) return false;
          break;
        case "$ne":
          if (all.some((v) => valuesEqual(v, rhs))) return false;
          break;
        case "$in":
          if (!Array.isArray(rhs)) throw new Error("$in operator requires an array");
          if (!all.some((v) => rhs.some((r) => valuesEqual(v, r)))) return false;
          break;
        case "$nin":
          if (!Array.isArray(rhs)) throw new Error("$nin operator requires an array");
          if (all.some((v) => rhs.some((r) => valuesEqual(v, r)))) return false;
          break;
        case "$all":
          if (!Array.isArray(rhs)) throw new Error("$all operator requires an array");
          if (!rhs.every((r) => all.some((v) => valuesEqual(v, r)))) return false;
          break;
        case "$gt":
          if (!all.some((v) => compareValues(v, rhs) > 0 && sameKind(v, rhs))) return false;
          break;
        case "$gte":
          if (!all.some((v) => compareValues(v, rhs) >= 0 && sameKind(v, rhs))) return false;
          break;
        case "$lt":
          if (!all.some((v) => compareValues(v, rhs) < 0 && sameKind(v, rhs))) return false;
          break;
        case "$lte":
          if (!all.some((v) => compareValues(v, rhs) <= 0 && sameKind(v, rhs))) return false;
          break;
        case "$exists": {
          const exists = values.some((v) => v !== undefined);
          if (exists !== rhs) return false;
          break;
        }
        case "$type":
          if (!values.some((v) => typeName(v) === rhs)) return false;
          break;
        default:
          throw new Error(`Unknown operator: ${op}`);
      }
    }
    return true;
  }

  // Direct equality
  return all.some((v) => valuesEqual(v, cond));
}

function sameKind(a: unknown, b: unknown): boolean {
  return typeName(a) === typeName(b);
}

/**
 * Test if a document matches a Mango filter
 * @param doc - Document to test
 * @param filter - Mango filter object
 * @returns true if document matches filter
 */
export function matches(doc: WireDocument, filter: Filter): boolean {
  if (!filter || Object.keys(filter).length === 0) {
    return true;
  }

  for (const [key, value] of Object.entries(filter)) {
    if (key === "$and" || key === "$or" || key === "$nor") {
      if (!Array.isArray(value)) {
        throw new Error(`${key} operator requires an array of filters`);
      }
      const subFilters = value.filter(isPlainObject);
      const outcome =
        key === "$and"
          ? subFilters.every((f) => matches(doc, f))
          : key === "$or"
            ? subFilters.some((f) => matches(doc, f))
            : !subFilters.some((f) => matches(doc, f));
      if (!outcome) {
        return false;
      }
      continue;
    }

    if (key === "$not") {
      if (!isPlainObject(value)) {
        throw new Error("$not operator requires a filter");
      }
      if (matches(doc, value)) {
        return false;
      }
      continue;
    }

    if (!matchField(getPathValues(doc, key), value)) {
      return false;
    }
  }

  return true;
}

/**
 * Compare two values for sorting
 * Handles mixed types by type precedence
 * @returns -1, 0, or 1
 */
export function compareValues(a: unknown, b: unknown): number {
  // Handle undefined/null
  if (a == null && b == null) return 0;
  if (a == null) return -1;
  if (b == null) return 1;

  if (a instanceof Date && b instanceof Date) {
    return Math.sign(a.getTime() - b.getTime());
  }

  if (typeof a === "number" && typeof b === "number") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }

  // Mixed types - use type precedence: null < boolean < number < string < date < object
  const typePrecedence: Record<string, number> = {
    boolean: 1,
    number: 2,
    string: 3,
    date: 4,
    object: 5,
    array: 6,
  };

  return Math.sign((typePrecedence[typeName(a)] ?? 7) - (typePrecedence[typeName(b)] ?? 7));
}

/**
 * Sort documents according to sort specification
 * @param docs - Documents to sort (mutates array)
 * @param sort - Sort specification
 */
export function sortDocuments(docs: WireDocument[], sort?: Sort): void {
  if (!sort || Object.keys(sort).length === 0) {
    return;
  }

  const sortFields = Object.entries(sort);

  docs.sort((a, b) => {
    for (const [field, direction] of sortFields) {
      const cmp = compareValues(getPath(a, field), getPath(b, field));
      if (cmp !== 0) {
        return direction === 1 ? cmp : -cmp;
      }
    }
    return 0;
  });
}

/**
 * Apply pagination to documents
 * @param docs - Documents to paginate
 * @param skip - Number to skip (default: 0)
 * @param limit - Maximum to return (default: unlimited)
 * @returns Paginated slice
 */
export function paginate<T>(docs: T[], skip = 0, limit?: number): T[] {
  const start = skip;
  const end = limit !== undefined && limit > 0 ? start + limit : undefined;
  return docs.slice(start, end);
}

/**
 * Evaluate a complete query against an array of documents
 * Pure orchestrator that composes filter → sort → paginate
 */
export function evaluateQuery(
  docs: WireDocument[],
  spec: { filter: Filter; sort?: Sort; skip?: number; limit?: number }
): WireDocument[] {
  const filtered = docs.filter((d) => matches(d, spec.filter));

  if (spec.sort && Object.keys(spec.sort).length > 0) {
    sortDocuments(filtered, spec.sort);
  }

  return paginate(filtered, spec.skip ?? 0, spec.limit);
}
