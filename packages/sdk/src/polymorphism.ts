/**
 * Single-collection inheritance
 *
 * Every document of a polymorphic hierarchy stores its concrete type name
 * under `_cls`. Reads through a type are narrowed to that type and its
 * registered descendants, and each raw document is hydrated as the concrete
 * type it names.
 */

import { DocumentDefinitionError, NotRegisteredError } from "./errors.js";
import type { Model } from "./model.js";
import { DISCRIMINATOR_ATTRIBUTE } from "./schema/schema.js";
import type { Filter, WireDocument } from "./types.js";

/**
 * Query clause selecting the given discriminator values
 */
export function discriminatorFilter(names: readonly string[]): Filter {
  return {
    [DISCRIMINATOR_ATTRIBUTE]: names.length === 1 ? names[0] : { $in: [...names] },
  };
}

/**
 * Narrow a wire filter to the given discriminator values. A filter that
 * already constrains `_cls` keeps its own clause alongside.
 */
export function narrowToTypes(filter: Filter, names: readonly string[] | undefined): Filter {
  if (!names) {
    return filter;
  }
  const clause = discriminatorFilter(names);
  if (Object.hasOwn(filter, DISCRIMINATOR_ATTRIBUTE)) {
    return { $and: [filter, clause] };
  }
  return { ...filter, ...clause };
}

/**
 * Root-first chain of a model and its ancestors
 */
export function lineage(model: Model): Model[] {
  const chain: Model[] = [];
  for (let current: Model | undefined = model; current; current = current.parentModel) {
    chain.unshift(current);
  }
  return chain;
}

export function isSubtype(model: Model, ancestor: Model): boolean {
  return lineage(model).includes(ancestor);
}

/**
 * Pick the model a raw document must be hydrated as when read through
 * `queried`
 * @throws {DocumentDefinitionError} If `_cls` names a type outside the
 *   queried type's hierarchy
 */
export function concreteModel(raw: WireDocument, queried: Model): Model {
  if (queried.discriminator === undefined) {
    return queried;
  }
  const name = raw[DISCRIMINATOR_ATTRIBUTE];
  if (typeof name !== "string" || name === queried.name) {
    return queried;
  }

  let model: Model;
  try {
    model = queried.host.model(name);
  } catch (err) {
    if (err instanceof NotRegisteredError) {
      throw new DocumentDefinitionError(
        `Document of unknown type "${name}" found in collection "${queried.collection}"`,
        { cause: err }
      );
    }
    throw err;
  }
  if (!isSubtype(model, queried)) {
    throw new DocumentDefinitionError(
      `Document of type "${name}" found in collection "${queried.collection}" is not a ${queried.name}`
    );
  }
  return model;
}
