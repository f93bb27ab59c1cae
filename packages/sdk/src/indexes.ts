/**
 * Index planning and ensuring
 *
 * Index descriptors are derived from field `unique` flags and explicit index
 * declarations each time they are needed; they are never persisted apart
 * from the declarations they come from.
 *
 * Invariants:
 * - Indexes declared on the root of a hierarchy are not compounded
 * - Indexes declared on a subtype are compounded with the discriminator
 * - Every polymorphic collection has a plain `_cls_1` index
 * - Ensuring is serialized per collection and only creates missing indexes
 */

import { DocumentDefinitionError, UsageError } from "./errors.js";
import { wireEqual } from "./format.js";
import type { Logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { DISCRIMINATOR_ATTRIBUTE } from "./schema/schema.js";
import type { Schema } from "./schema/schema.js";
import type { IndexDeclaration } from "./schema/template.js";
import type { IndexDescriptor, IndexDirection, StoreDriver } from "./types.js";

/**
 * Uniqueness rule checked against the store before writes
 */
export interface UniqueConstraint {
  /** Field names reported on conflict */
  readonly fields: readonly string[];
  /** Wire paths compared */
  readonly paths: readonly string[];
  /** Scoped to the document's own discriminator value */
  readonly scoped: boolean;
}

export interface IndexPlan {
  readonly descriptor: IndexDescriptor;
  readonly constraint?: UniqueConstraint;
}

/**
 * One level of a type lineage, as seen by the planner
 */
export interface IndexSource {
  readonly name: string;
  readonly schema: Schema;
  /** Fields declared (or redeclared) at this level */
  readonly ownFields: readonly string[];
  readonly indexes: readonly IndexDeclaration[];
  /** Declared on a subtype: compound with the discriminator */
  readonly scoped: boolean;
}

interface ParsedDeclaration {
  key: Array<[string, IndexDirection]>;
  fields: string[];
  unique: boolean;
  sparse: boolean;
  name?: string;
}

/**
 * Store-convention index name: `attr_1_other_-1`
 */
export function indexName(key: ReadonlyArray<readonly [string, IndexDirection]>): string {
  return key.map(([path, direction]) => `${path}_${direction}`).join("_");
}

function parseKey(schema: Schema, spec: string): { path: string; field: string; direction: IndexDirection } {
  const direction: IndexDirection = spec.startsWith("-") ? -1 : 1;
  const fieldPath = spec.replace(/^[+-]/, "");
  try {
    return { path: schema.translatePath(fieldPath), field: fieldPath.split(".")[0], direction };
  } catch (err) {
    if (err instanceof UsageError) {
      throw new DocumentDefinitionError(`${schema.name}: index on unknown field "${fieldPath}"`, { cause: err });
    }
    throw err;
  }
}

/**
 * Resolve an index declaration against a schema
 * @throws {DocumentDefinitionError} If a key names an unknown field
 */
export function parseDeclaration(schema: Schema, declaration: IndexDeclaration): ParsedDeclaration {
  const spec = typeof declaration === "string" ? { key: declaration } : declaration;
  const keys = typeof spec.key === "string" ? [spec.key] : [...spec.key];
  if (keys.length === 0) {
    throw new DocumentDefinitionError(`${schema.name}: index declaration without keys`);
  }

  const parsed = keys.map((key) => parseKey(schema, key));
  return {
    key: parsed.map(({ path, direction }): [string, IndexDirection] => [path, direction]),
    fields: [...new Set(parsed.map(({ field }) => field))],
    unique: typeof declaration === "string" ? false : (declaration.unique ?? false),
    sparse: typeof declaration === "string" ? false : (declaration.sparse ?? false),
    name: typeof declaration === "string" ? undefined : declaration.name,
  };
}

/**
 * Derive the indexes (and the uniqueness rules they imply) of a type from its
 * lineage, root first
 */
export function planIndexes(lineage: readonly IndexSource[], polymorphic: boolean): IndexPlan[] {
  const plans = new Map<string, IndexPlan>();
  const add = (plan: IndexPlan) => {
    if (!plans.has(plan.descriptor.name)) {
      plans.set(plan.descriptor.name, plan);
    }
  };

  for (const source of lineage) {
    const suffix: Array<[string, IndexDirection]> = source.scoped ? [[DISCRIMINATOR_ATTRIBUTE, 1]] : [];

    for (const name of source.ownFields) {
      const field = source.schema.field(name);
      if (!field?.unique) continue;

      const attribute = field.attribute;
      const key: Array<[string, IndexDirection]> = [[attribute, 1], ...suffix];
      const descriptor: IndexDescriptor = { name: indexName(key), key, unique: true };
      if (!field.required) {
        // A compound key with the discriminator is never absent, so sparse
        // would index every document
        if (source.scoped) {
          descriptor.partialFilter = { [attribute]: { $exists: true } };
        } else {
          descriptor.sparse = true;
        }
      }
      add({ descriptor, constraint: { fields: [name], paths: [attribute], scoped: source.scoped } });
    }

    for (const declaration of source.indexes) {
      const parsed = parseDeclaration(source.schema, declaration);
      const key: Array<[string, IndexDirection]> = [...parsed.key, ...suffix];
      const descriptor: IndexDescriptor = { name: parsed.name ?? indexName(key), key };
      if (parsed.unique) descriptor.unique = true;
      if (parsed.sparse) descriptor.sparse = true;
      add({
        descriptor,
        constraint: parsed.unique
          ? { fields: parsed.fields, paths: parsed.key.map(([path]) => path), scoped: source.scoped }
          : undefined,
      });
    }
  }

  if (polymorphic) {
    const key: Array<[string, IndexDirection]> = [[DISCRIMINATOR_ATTRIBUTE, 1]];
    add({ descriptor: { name: indexName(key), key } });
  }

  return [...plans.values()];
}

/**
 * Two descriptors define the same index
 */
export function sameIndexDefinition(a: IndexDescriptor, b: IndexDescriptor): boolean {
  const normalize = (d: IndexDescriptor) => ({
    key: d.key,
    unique: d.unique ?? false,
    sparse: d.sparse ?? false,
    partialFilter: d.partialFilter ?? null,
  });
  return wireEqual(normalize(a), normalize(b));
}

/**
 * Simple in-process mutex for serializing index creation per collection
 */
class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

const mutexes = new WeakMap<StoreDriver, Map<string, Mutex>>();

function getMutex(driver: StoreDriver, collection: string): Mutex {
  let byCollection = mutexes.get(driver);
  if (!byCollection) {
    byCollection = new Map();
    mutexes.set(driver, byCollection);
  }
  let mutex = byCollection.get(collection);
  if (!mutex) {
    mutex = new Mutex();
    byCollection.set(collection, mutex);
  }
  return mutex;
}

/**
 * Create the indexes of `descriptors` that the collection does not have yet.
 * An identical existing index is skipped; a conflicting one is handed to the
 * driver, which reports the conflict.
 * @returns Names of the indexes created
 */
export async function ensureIndexes(
  driver: StoreDriver,
  collection: string,
  descriptors: readonly IndexDescriptor[],
  log: Logger
): Promise<string[]> {
  return getMutex(driver, collection).withLock(() =>
    metrics.track(collection, "ensureIndexes", async () => {
      const existing = new Map((await driver.listIndexes(collection)).map((d) => [d.name, d]));
      const created: string[] = [];

      for (const descriptor of descriptors) {
        const current = existing.get(descriptor.name);
        if (current && sameIndexDefinition(current, descriptor)) {
          log.debug("indexes.ensure.skip", { collection, details: { index: descriptor.name } });
          continue;
        }
        await driver.createIndex(collection, descriptor);
        created.push(descriptor.name);
        log.info("indexes.ensure.create", { collection, details: { index: descriptor.name } });
      }

      return created;
    })
  );
}
