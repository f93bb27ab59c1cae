/**
 * Filter translation
 *
 * Application filters are written with field names, dotted through embedded
 * documents and lists of embedded documents. Before they reach the driver,
 * paths are translated to wire attributes (`id` becomes `_id`) and documents,
 * references and embedded documents are replaced by their wire values.
 */

import { Document } from "./document.js";
import { EmbeddedDocument } from "./embedded.js";
import { UsageError } from "./errors.js";
import { Reference } from "./fields/reference.js";
import type { Filter, Sort } from "./types.js";

/**
 * Anything that maps field paths to wire paths, a `Schema` typically
 */
export interface PathTranslator {
  /** @throws {UsageError} On unknown fields */
  translatePath(path: string): string;
}

const LOGICAL_LIST_OPERATORS = new Set(["$and", "$or", "$nor"]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isOperatorObject(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value) && Object.keys(value).length > 0 && Object.keys(value).every((k) => k.startsWith("$"));
}

/**
 * Wire value of a filter operand
 */
export function toWireValue(value: unknown): unknown {
  if (value instanceof Reference) {
    return value.id;
  }
  if (value instanceof Document) {
    if (value.id === undefined) {
      throw new UsageError(`Cannot query by a ${value.typeName} that has not been created`);
    }
    return value.id;
  }
  if (value instanceof EmbeddedDocument) {
    return value.toWire();
  }
  if (Array.isArray(value)) {
    return value.map(toWireValue);
  }
  return value;
}

function translateCondition(condition: unknown): unknown {
  if (!isOperatorObject(condition)) {
    return toWireValue(condition);
  }
  const out: Record<string, unknown> = {};
  for (const [op, operand] of Object.entries(condition)) {
    out[op] = toWireValue(operand);
  }
  return out;
}

function subFilter(operator: string, value: unknown): Filter {
  if (!isPlainObject(value)) {
    throw new UsageError(`${operator} requires a filter object`);
  }
  return value;
}

/**
 * Translate a field-name filter into a wire filter
 * @throws {UsageError} On unknown fields or malformed logical operators
 */
export function translateFilter(schema: PathTranslator, filter: Filter): Filter {
  const out: Filter = {};
  for (const [key, value] of Object.entries(filter)) {
    if (LOGICAL_LIST_OPERATORS.has(key)) {
      if (!Array.isArray(value)) {
        throw new UsageError(`${key} requires an array of filters`);
      }
      out[key] = value.map((item: unknown) => translateFilter(schema, subFilter(key, item)));
    } else if (key === "$not") {
      out[key] = translateFilter(schema, subFilter(key, value));
    } else if (key.startsWith("$")) {
      throw new UsageError(`Unsupported top-level operator ${key}`);
    } else {
      out[schema.translatePath(key)] = translateCondition(value);
    }
  }
  return out;
}

export function translateSort(schema: PathTranslator, sort: Sort | undefined): Sort | undefined {
  if (!sort) {
    return undefined;
  }
  const out: Sort = {};
  for (const [key, direction] of Object.entries(sort)) {
    out[schema.translatePath(key)] = direction;
  }
  return out;
}
