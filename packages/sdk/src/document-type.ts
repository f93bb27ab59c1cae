/**
 * Registered document types and their class-level operations
 */

import { Document } from "./document.js";
import type { DocumentInput, FieldMap } from "./fields/field.js";
import type { ReferenceTarget } from "./fields/reference.js";
import { UsageError } from "./errors.js";
import { translateFilter, translateSort } from "./filters.js";
import type { PathTranslator } from "./filters.js";
import { ensureIndexes, planIndexes } from "./indexes.js";
import type { IndexPlan, IndexSource, UniqueConstraint } from "./indexes.js";
import { LifecycleController } from "./lifecycle.js";
import type { Model, ModelHost } from "./model.js";
import { metrics } from "./observability/metrics.js";
import { concreteModel, lineage, narrowToTypes } from "./polymorphism.js";
import { DISCRIMINATOR_ATTRIBUTE, ID_ATTRIBUTE } from "./schema/schema.js";
import type { Schema } from "./schema/schema.js";
import type { DocumentHooks, IndexDeclaration } from "./schema/template.js";
import { DocumentState } from "./state.js";
import type { DocumentId, Filter, FindOptions, IndexDescriptor, Page, WireDocument } from "./types.js";

export interface CursorOptions extends FindOptions {
  cursor: true;
  /** Documents per page (default: the registry's `defaultBatchSize`) */
  batchSize?: number;
}

/**
 * Public face of a registered document type
 */
export interface DocumentType<F extends FieldMap = FieldMap> extends ReferenceTarget<Document<F>> {
  readonly name: string;
  readonly collection: string;
  readonly schema: Schema;
  readonly parent: DocumentType | undefined;
  /** Documents of this type carry a discriminator */
  readonly polymorphic: boolean;

  /**
   * Build a transient document; declared defaults fill missing fields
   * @throws {ValidationError} On unknown fields or unconvertible input
   */
  create(values?: DocumentInput<F>): Document<F>;

  /**
   * Documents of this type (and its descendants) matching a field-name filter
   */
  find(filter?: Filter, options?: FindOptions & { cursor?: false }): Promise<Document<F>[]>;
  /**
   * Paginated variant: each page carries a continuation, null once exhausted
   */
  find(filter: Filter, options: CursorOptions): Promise<Page<Document<F>>>;

  /**
   * First document matching a filter, or by identity
   */
  findOne(filterOrId: Filter | DocumentId): Promise<Document<F> | null>;
  count(filter?: Filter): Promise<number>;
  exists(id: DocumentId): Promise<boolean>;

  /**
   * Index descriptors derived from the type's declarations
   */
  indexes(): IndexDescriptor[];

  /**
   * Create the missing indexes of the type's collection
   * @returns Names of the indexes created
   */
  ensureIndexes(): Promise<string[]>;

  isInstance(value: unknown): value is Document<F>;
  isSubtypeOf(other: DocumentType): boolean;
  /** Names of this type and every registered descendant */
  descendants(): string[];
}

export interface DocumentTypeConfig {
  name: string;
  collection: string;
  schema: Schema;
  parent: DocumentTypeImpl | undefined;
  ownFields: readonly string[];
  indexes: readonly IndexDeclaration[];
  hooks: DocumentHooks;
  allowInheritance: boolean;
  host: ModelHost;
}

export class DocumentTypeImpl<F extends FieldMap = FieldMap> implements DocumentType<F>, Model {
  readonly name: string;
  readonly collection: string;
  readonly schema: Schema;
  readonly parent: DocumentTypeImpl | undefined;
  readonly hooks: DocumentHooks;
  readonly host: ModelHost;
  readonly allowInheritance: boolean;
  readonly lifecycle: LifecycleController;
  readonly #ownFields: readonly string[];
  readonly #indexes: readonly IndexDeclaration[];
  readonly #children: DocumentTypeImpl[] = [];

  constructor(config: DocumentTypeConfig) {
    this.name = config.name;
    this.collection = config.collection;
    this.schema = config.schema;
    this.parent = config.parent;
    this.hooks = config.hooks;
    this.host = config.host;
    this.allowInheritance = config.allowInheritance;
    this.#ownFields = config.ownFields;
    this.#indexes = config.indexes;
    this.lifecycle = new LifecycleController(this);
    if (this.parent) {
      this.parent.#children.push(this);
    }
  }

  get polymorphic(): boolean {
    return this.allowInheritance || this.parent !== undefined;
  }

  get discriminator(): string | undefined {
    return this.polymorphic ? this.name : undefined;
  }

  get parentModel(): Model | undefined {
    return this.parent;
  }

  get type(): DocumentType {
    return this;
  }

  descendants(): string[] {
    return [this.name, ...this.#subtypes().map((subtype) => subtype.name)];
  }

  #subtypes(): DocumentTypeImpl[] {
    return this.#children.flatMap((child) => [child, ...child.#subtypes()]);
  }

  /**
   * Paths resolve against this type first, then against its subtypes, so a
   * query through a parent may name fields only a subtype declares.
   * Polymorphic types also accept `_cls` as written.
   */
  get #paths(): PathTranslator {
    const subtypes = this.#subtypes();
    return {
      translatePath: (path) => {
        if (this.polymorphic && path === DISCRIMINATOR_ATTRIBUTE) {
          return path;
        }
        try {
          return this.schema.translatePath(path);
        } catch (err) {
          if (!(err instanceof UsageError)) {
            throw err;
          }
          for (const subtype of subtypes) {
            if (subtype.schema.field(path.split(".")[0])) {
              return subtype.schema.translatePath(path);
            }
          }
          throw err;
        }
      },
    };
  }

  isSubtypeOf(other: DocumentType): boolean {
    return lineage(this).some((model) => model.type === other);
  }

  isInstance(value: unknown): value is Document<F> {
    return value instanceof Document && value.type.isSubtypeOf(this);
  }

  #indexPlans(): IndexPlan[] {
    const sources: IndexSource[] = [];
    for (let current: DocumentTypeImpl | undefined = this; current; current = current.parent) {
      sources.unshift({
        name: current.name,
        schema: current.schema,
        ownFields: current.#ownFields,
        indexes: current.#indexes,
        scoped: current.parent !== undefined,
      });
    }
    return planIndexes(sources, this.polymorphic);
  }

  indexes(): IndexDescriptor[] {
    return this.#indexPlans().map((plan) => plan.descriptor);
  }

  uniqueConstraints(): UniqueConstraint[] {
    return this.#indexPlans().flatMap((plan) => (plan.constraint ? [plan.constraint] : []));
  }

  ensureIndexes(): Promise<string[]> {
    return ensureIndexes(this.host.driver, this.collection, this.indexes(), this.host.logger);
  }

  create(values?: DocumentInput<F>): Document<F> {
    const state = new DocumentState(this.schema, this.discriminator);
    state.load(values ?? {}, { defaults: true });
    return new Document<F>(this, state);
  }

  /**
   * Hydrate a raw stored document as the concrete type it names
   */
  #hydrate(raw: WireDocument): Document<F> {
    const model = concreteModel(raw, this);
    return new Document<F>(model, DocumentState.fromWire(model.schema, raw, model.discriminator));
  }

  /**
   * Wire query for a field-name filter, narrowed to this type's hierarchy
   */
  #query(filter: Filter): Filter {
    return narrowToTypes(translateFilter(this.#paths, filter), this.polymorphic ? this.descendants() : undefined);
  }

  find(filter?: Filter, options?: FindOptions & { cursor?: false }): Promise<Document<F>[]>;
  find(filter: Filter, options: CursorOptions): Promise<Page<Document<F>>>;
  async find(
    filter: Filter = {},
    options: (FindOptions & { cursor?: false }) | CursorOptions = {}
  ): Promise<Document<F>[] | Page<Document<F>>> {
    const query = this.#query(filter);
    const findOptions: FindOptions = {
      limit: options.limit,
      skip: options.skip,
      sort: translateSort(this.#paths, options.sort),
    };

    if (options.cursor) {
      const batchSize = options.batchSize ?? this.host.defaultBatchSize;
      const page = await metrics.track(this.collection, "find", () =>
        this.host.driver.findPage(this.collection, query, { ...findOptions, batchSize })
      );
      return this.#wrapPage(page);
    }

    const raws = await metrics.track(this.collection, "find", () =>
      this.host.driver.find(this.collection, query, findOptions)
    );
    return raws.map((raw) => this.#hydrate(raw));
  }

  #wrapPage(page: Page<WireDocument>): Page<Document<F>> {
    const next = page.next;
    return {
      items: page.items.map((raw) => this.#hydrate(raw)),
      next: next ? async () => this.#wrapPage(await next()) : null,
    };
  }

  async findOne(filterOrId: Filter | DocumentId): Promise<Document<F> | null> {
    const query =
      typeof filterOrId === "string"
        ? narrowToTypes({ [ID_ATTRIBUTE]: filterOrId }, this.polymorphic ? this.descendants() : undefined)
        : this.#query(filterOrId);
    const [raw] = await metrics.track(this.collection, "find", () =>
      this.host.driver.find(this.collection, query, { limit: 1 })
    );
    return raw ? this.#hydrate(raw) : null;
  }

  count(filter: Filter = {}): Promise<number> {
    const query = this.#query(filter);
    return metrics.track(this.collection, "count", () => this.host.driver.count(this.collection, query));
  }

  async exists(id: DocumentId): Promise<boolean> {
    const query = narrowToTypes({ [ID_ATTRIBUTE]: id }, this.polymorphic ? this.descendants() : undefined);
    const count = await metrics.track(this.collection, "count", () => this.host.driver.count(this.collection, query));
    return count > 0;
  }

  toString(): string {
    return `DocumentType(${this.name})`;
  }
}
