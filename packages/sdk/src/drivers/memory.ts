/**
 * In-process store driver
 *
 * Keeps every collection in memory and evaluates queries with the Mango
 * engine in `query.ts`. Documents are cloned on the way in and out, so
 * callers never share state with the store.
 *
 * Invariants:
 * - Unique indexes are enforced on every write (sparse and partial ones only
 *   for the documents they cover)
 * - `createIndex` on an existing name with a different definition fails
 * - Cursor pages read from a snapshot taken by the first page
 */

import { randomUUID } from "node:crypto";
import { DriverError, DuplicateKeyError, IndexConflictError } from "../errors.js";
import { canonical, wireEqual } from "../format.js";
import { sameIndexDefinition } from "../indexes.js";
import { evaluateQuery, getPath, matches } from "../query.js";
import type {
  DeleteResult,
  Filter,
  FindOptions,
  FindPageOptions,
  IndexDescriptor,
  InsertResult,
  Page,
  StoreDriver,
  UpdatePayload,
  UpdateResult,
  WireDocument,
} from "../types.js";

const DEFAULT_BATCH_SIZE = 101;

interface Collection {
  docs: WireDocument[];
  indexes: Map<string, IndexDescriptor>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Assign a dotted path, creating intermediate objects as needed
 */
function setPath(doc: WireDocument, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = doc;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[parts[parts.length - 1]] = value;
}

function unsetPath(doc: WireDocument, path: string): void {
  const parts = path.split(".");
  const parent = parts.length === 1 ? doc : getPath(doc, parts.slice(0, -1).join("."));
  if (isRecord(parent)) {
    delete parent[parts[parts.length - 1]];
  }
}

function applyUpdate(doc: WireDocument, update: UpdatePayload): void {
  for (const [path, value] of Object.entries(update.$set ?? {})) {
    setPath(doc, path, structuredClone(value));
  }
  for (const path of Object.keys(update.$unset ?? {})) {
    unsetPath(doc, path);
  }
}

/**
 * Equality conditions of a query, used to seed upserted documents
 */
function seedFromQuery(query: Filter): WireDocument {
  const seed: WireDocument = {};
  for (const [key, value] of Object.entries(query)) {
    if (key.startsWith("$")) continue;
    if (isRecord(value) && Object.keys(value).some((k) => k.startsWith("$"))) continue;
    setPath(seed, key, structuredClone(value));
  }
  return seed;
}

/**
 * Key of a document under a unique index, or undefined when the index does
 * not cover the document
 */
function uniqueKey(doc: WireDocument, index: IndexDescriptor): string | undefined {
  if (index.partialFilter && !matches(doc, index.partialFilter)) {
    return undefined;
  }
  const values = index.key.map(([path]) => getPath(doc, path));
  if (index.sparse && values.every((value) => value === undefined)) {
    return undefined;
  }
  return canonical(values.map((value) => value ?? null));
}

export class MemoryDriver implements StoreDriver {
  readonly #collections = new Map<string, Collection>();

  #collection(name: string): Collection {
    let collection = this.#collections.get(name);
    if (!collection) {
      collection = { docs: [], indexes: new Map() };
      this.#collections.set(name, collection);
    }
    return collection;
  }

  /**
   * @throws {DuplicateKeyError} If `candidate` collides with another document
   */
  #checkUnique(name: string, collection: Collection, candidate: WireDocument, replacing?: WireDocument): void {
    if (collection.docs.some((doc) => doc !== replacing && doc._id === candidate._id)) {
      throw new DuplicateKeyError(name, "_id_");
    }
    for (const index of collection.indexes.values()) {
      if (!index.unique) continue;
      const key = uniqueKey(candidate, index);
      if (key === undefined) continue;
      if (collection.docs.some((doc) => doc !== replacing && uniqueKey(doc, index) === key)) {
        throw new DuplicateKeyError(name, index.name);
      }
    }
  }

  async insertOne(name: string, doc: WireDocument): Promise<InsertResult> {
    const collection = this.#collection(name);
    const stored = structuredClone(doc);
    stored._id ??= randomUUID();
    if (typeof stored._id !== "string") {
      throw new DriverError(`Document identity in "${name}" must be a string`);
    }
    this.#checkUnique(name, collection, stored);
    collection.docs.push(stored);
    return { insertedId: stored._id };
  }

  async updateOne(
    name: string,
    query: Filter,
    update: UpdatePayload,
    options: { upsert?: boolean } = {}
  ): Promise<UpdateResult> {
    const collection = this.#collection(name);
    const target = collection.docs.find((doc) => matches(doc, query));

    if (!target) {
      if (options.upsert) {
        const seeded = seedFromQuery(query);
        applyUpdate(seeded, update);
        await this.insertOne(name, seeded);
      }
      return { matchedCount: 0, modifiedCount: 0 };
    }

    const updated = structuredClone(target);
    applyUpdate(updated, update);
    this.#checkUnique(name, collection, updated, target);

    const modified = !wireEqual(updated, target);
    collection.docs[collection.docs.indexOf(target)] = updated;
    return { matchedCount: 1, modifiedCount: modified ? 1 : 0 };
  }

  async deleteOne(name: string, query: Filter): Promise<DeleteResult> {
    const collection = this.#collection(name);
    const index = collection.docs.findIndex((doc) => matches(doc, query));
    if (index === -1) {
      return { deletedCount: 0 };
    }
    collection.docs.splice(index, 1);
    return { deletedCount: 1 };
  }

  async find(name: string, query: Filter, options: FindOptions = {}): Promise<WireDocument[]> {
    const docs = this.#collections.get(name)?.docs ?? [];
    return evaluateQuery(docs, { filter: query, ...options }).map((doc) => structuredClone(doc));
  }

  async findPage(name: string, query: Filter, options: FindPageOptions = {}): Promise<Page<WireDocument>> {
    const { batchSize = DEFAULT_BATCH_SIZE, ...findOptions } = options;
    const snapshot = await this.find(name, query, findOptions);

    const page = (offset: number): Page<WireDocument> => {
      const items = snapshot.slice(offset, offset + batchSize);
      return {
        items,
        next: items.length === 0 ? null : async () => page(offset + batchSize),
      };
    };
    return page(0);
  }

  async count(name: string, query: Filter): Promise<number> {
    const docs = this.#collections.get(name)?.docs ?? [];
    return docs.filter((doc) => matches(doc, query)).length;
  }

  async createIndex(name: string, index: IndexDescriptor): Promise<string> {
    const collection = this.#collection(name);
    const existing = collection.indexes.get(index.name);
    if (existing) {
      if (!sameIndexDefinition(existing, index)) {
        throw new IndexConflictError(name, index.name);
      }
      return index.name;
    }

    if (index.unique) {
      const seen = new Set<string>();
      for (const doc of collection.docs) {
        const key = uniqueKey(doc, index);
        if (key === undefined) continue;
        if (seen.has(key)) {
          throw new DuplicateKeyError(name, index.name);
        }
        seen.add(key);
      }
    }

    collection.indexes.set(index.name, structuredClone(index));
    return index.name;
  }

  async listIndexes(name: string): Promise<IndexDescriptor[]> {
    const indexes = this.#collections.get(name)?.indexes ?? new Map<string, IndexDescriptor>();
    return [...indexes.values()].map((index) => structuredClone(index));
  }

  async dropIndexes(name: string): Promise<void> {
    this.#collections.get(name)?.indexes.clear();
  }

  async drop(name: string): Promise<void> {
    this.#collections.delete(name);
  }
}

export function createMemoryDriver(): MemoryDriver {
  return new MemoryDriver();
}
