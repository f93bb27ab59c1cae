/**
 * Document registry: resolves templates into document and embedded types,
 * and hosts the driver, logger and identity factory they share
 */

import { randomUUID } from "node:crypto";
import { parseRegistryOptions } from "../config.js";
import type { RegistryOptions } from "../config.js";
import { DocumentTypeImpl } from "../document-type.js";
import type { DocumentType } from "../document-type.js";
import { EmbeddedTypeImpl } from "../embedded.js";
import type { EmbeddedType } from "../embedded.js";
import { DocumentDefinitionError, NoDriverDefinedError, NotRegisteredError } from "../errors.js";
import type { FieldMap } from "../fields/field.js";
import { ensureIndexes, parseDeclaration } from "../indexes.js";
import type { ModelHost } from "../model.js";
import { Logger, logger as sharedLogger } from "../observability/logs.js";
import type { DocumentId, IndexDescriptor, StoreDriver } from "../types.js";
import { Schema } from "./schema.js";
import type { DocumentTemplate, EmbeddedTemplate } from "./template.js";

export interface DocumentRegistry {
  /**
   * Register a template. Names are unique across document and embedded types.
   * @throws {DocumentDefinitionError} If the template is inconsistent
   */
  register<F extends FieldMap>(template: DocumentTemplate<F>): DocumentType<F>;
  register<F extends FieldMap>(template: EmbeddedTemplate<F>): EmbeddedType<F>;

  /** @throws {NotRegisteredError} */
  resolve(name: string): DocumentType;
  /** @throws {NotRegisteredError} */
  resolveEmbedded(name: string): EmbeddedType;
  has(name: string): boolean;
  /** Names of the registered document types, in registration order */
  list(): string[];

  /**
   * Bind (or replace) the store driver
   */
  init(driver: StoreDriver): void;
  /** @throws {NoDriverDefinedError} Before a driver is bound */
  readonly driver: StoreDriver;
  readonly hasDriver: boolean;
  readonly logger: Logger;

  /**
   * Ensure the indexes of every registered type, one collection at a time
   * @returns Created index names keyed by collection
   */
  ensureIndexes(): Promise<Record<string, string[]>>;
}

/**
 * Default collection name: snake_case of the type name
 */
export function collectionName(typeName: string): string {
  return typeName
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .toLowerCase();
}

export class DocumentRegistryImpl implements DocumentRegistry, ModelHost {
  readonly #documents = new Map<string, DocumentTypeImpl>();
  readonly #embedded = new Map<string, EmbeddedTypeImpl>();
  readonly #idFactory: () => DocumentId;
  readonly logger: Logger;
  readonly defaultBatchSize: number;
  #driver: StoreDriver | undefined;

  constructor(options: RegistryOptions = {}) {
    const resolved = parseRegistryOptions(options);
    this.#driver = resolved.driver;
    this.#idFactory = resolved.idFactory ?? randomUUID;
    this.logger = resolved.logLevel ? new Logger(resolved.logLevel) : sharedLogger;
    this.defaultBatchSize = resolved.defaultBatchSize;
  }

  get driver(): StoreDriver {
    if (!this.#driver) {
      throw new NoDriverDefinedError();
    }
    return this.#driver;
  }

  get hasDriver(): boolean {
    return this.#driver !== undefined;
  }

  init(driver: StoreDriver): void {
    this.#driver = driver;
    this.logger.debug("registry.init", { details: { types: this.list() } });
  }

  generateId(): DocumentId {
    return this.#idFactory();
  }

  register<F extends FieldMap>(template: DocumentTemplate<F>): DocumentType<F>;
  register<F extends FieldMap>(template: EmbeddedTemplate<F>): EmbeddedType<F>;
  register<F extends FieldMap>(
    template: DocumentTemplate<F> | EmbeddedTemplate<F>
  ): DocumentType<F> | EmbeddedType<F> {
    if (this.has(template.name)) {
      throw new DocumentDefinitionError(`A type named "${template.name}" is already registered`);
    }

    if (template.kind === "embedded") {
      const type = new EmbeddedTypeImpl<F>(template.name, new Schema(template.name, template.fields, this));
      this.#embedded.set(template.name, type);
      this.logger.debug("registry.register", { type: template.name, details: { kind: "embedded" } });
      return type;
    }

    const type = this.#buildDocumentType(template);
    this.#documents.set(template.name, type);
    this.logger.debug("registry.register", {
      type: type.name,
      collection: type.collection,
      details: { kind: "document", parent: type.parent?.name },
    });
    return type;
  }

  #buildDocumentType<F extends FieldMap>(template: DocumentTemplate<F>): DocumentTypeImpl<F> {
    const { name } = template;
    const parent = template.parent ? this.#registeredParent(name, template.parent) : undefined;

    if (parent && template.collection !== undefined && template.collection !== parent.collection) {
      throw new DocumentDefinitionError(
        `${name}: a subtype shares the collection of ${parent.name} ("${parent.collection}")`
      );
    }

    for (const [fieldName, field] of Object.entries(template.fields)) {
      const inherited = parent?.schema.field(fieldName);
      if (inherited && inherited.signature() !== field.signature()) {
        throw new DocumentDefinitionError(
          `${name}.${fieldName}: redeclared as ${field.signature()}, inherited as ${inherited.signature()}`
        );
      }
      const attribute = field.declaredAttribute ?? fieldName;
      if (inherited && inherited.attribute !== attribute) {
        throw new DocumentDefinitionError(
          `${name}.${fieldName}: redeclared with attribute "${attribute}", inherited as "${inherited.attribute}"`
        );
      }
      if (field.unique && !field.supportsUnique) {
        throw new DocumentDefinitionError(`${name}.${fieldName}: ${field.kind} fields cannot be unique`);
      }
      if (field.unique && field.hasConstantDefault) {
        throw new DocumentDefinitionError(
          `${name}.${fieldName}: a unique field cannot have a constant default`
        );
      }
    }

    const schema = new Schema(name, { ...parent?.schema.fields, ...template.fields }, this);
    for (const declaration of template.indexes) {
      parseDeclaration(schema, declaration);
    }

    return new DocumentTypeImpl<F>({
      name,
      collection: parent?.collection ?? template.collection ?? collectionName(name),
      schema,
      parent,
      ownFields: Object.keys(template.fields),
      indexes: template.indexes,
      hooks: { ...parent?.hooks, ...template.hooks },
      allowInheritance: template.allowInheritance,
      host: this,
    });
  }

  #registeredParent(name: string, declared: DocumentType): DocumentTypeImpl {
    const parent = this.#documents.get(declared.name);
    if (!parent || parent !== declared) {
      throw new DocumentDefinitionError(`${name}: parent ${declared.name} is not registered in this registry`);
    }
    if (!parent.allowInheritance) {
      throw new DocumentDefinitionError(`${name}: ${parent.name} does not allow inheritance`);
    }
    return parent;
  }

  resolve(name: string): DocumentType {
    return this.model(name);
  }

  model(name: string): DocumentTypeImpl {
    const type = this.#documents.get(name);
    if (!type) {
      throw new NotRegisteredError(name);
    }
    return type;
  }

  resolveEmbedded(name: string): EmbeddedType {
    const type = this.#embedded.get(name);
    if (!type) {
      throw new NotRegisteredError(name);
    }
    return type;
  }

  has(name: string): boolean {
    return this.#documents.has(name) || this.#embedded.has(name);
  }

  list(): string[] {
    return [...this.#documents.keys()];
  }

  async ensureIndexes(): Promise<Record<string, string[]>> {
    // Descriptors of every type of a collection, root types first
    const byCollection = new Map<string, Map<string, IndexDescriptor>>();
    for (const type of this.#documents.values()) {
      let descriptors = byCollection.get(type.collection);
      if (!descriptors) {
        descriptors = new Map();
        byCollection.set(type.collection, descriptors);
      }
      for (const descriptor of type.indexes()) {
        if (!descriptors.has(descriptor.name)) {
          descriptors.set(descriptor.name, descriptor);
        }
      }
    }

    const created: Record<string, string[]> = {};
    for (const [collection, descriptors] of byCollection) {
      created[collection] = await ensureIndexes(this.driver, collection, [...descriptors.values()], this.logger);
    }
    return created;
  }
}

/**
 * Create a document registry
 * @throws {UsageError} On invalid options
 */
export function createRegistry(options: RegistryOptions = {}): DocumentRegistry {
  return new DocumentRegistryImpl(options);
}
