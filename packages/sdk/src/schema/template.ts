/**
 * Document and embedded-document templates
 *
 * A template is the declarative description of a type: its own fields, the
 * type it extends, its collection, index declarations and lifecycle hooks.
 * Templates are inert until registered, at which point the registry resolves
 * them into a bound `Schema` and a document type.
 */

import type { Document } from "../document.js";
import type { DocumentType } from "../document-type.js";
import type { FieldMap, Merge } from "../fields/field.js";
import type {
  DeleteResult,
  Filter,
  InsertResult,
  UpdatePayload,
  UpdateResult,
  WireDocument,
} from "../types.js";

export type HookResult<T = void> = T | Promise<T>;

/**
 * Optional lifecycle callbacks. Each may be async and is awaited before the
 * next lifecycle step. `preUpdate` and `preDelete` may return extra wire-level
 * conditions that are merged into the store query.
 */
export interface DocumentHooks<D = Document> {
  preInsert?(doc: D, payload: WireDocument): HookResult;
  postInsert?(doc: D, result: InsertResult, payload: WireDocument): HookResult;
  preUpdate?(doc: D, query: Filter, payload: UpdatePayload): HookResult<Filter | void>;
  postUpdate?(doc: D, result: UpdateResult, payload: UpdatePayload): HookResult;
  preDelete?(doc: D): HookResult<Filter | void>;
  postDelete?(doc: D, result: DeleteResult): HookResult;
}

/**
 * Index declaration: `"field"` / `"-field"` for a single ascending/descending
 * key, or an object for compound and unique indexes. Paths may be dotted
 * through embedded fields.
 */
export type IndexDeclaration =
  | string
  | {
      key: string | readonly string[];
      unique?: boolean;
      sparse?: boolean;
      name?: string;
    };

interface TemplateOptions<D> {
  /** Collection name (default: snake_case of the type name) */
  collection?: string;
  /** Allow other types to extend this one */
  allowInheritance?: boolean;
  indexes?: readonly IndexDeclaration[];
  hooks?: DocumentHooks<D>;
}

export interface DocumentDefinition<F extends FieldMap> extends TemplateOptions<Document<F>> {
  fields: F;
}

export interface ChildDocumentDefinition<P extends FieldMap, F extends FieldMap>
  extends TemplateOptions<Document<Merge<P, F>>> {
  extends: DocumentType<P>;
  fields: F;
}

export class DocumentTemplate<F extends FieldMap = FieldMap> {
  readonly kind = "document";
  /** Type-level only: complete field map, inherited fields included */
  declare readonly _fields: F;

  constructor(
    readonly name: string,
    /** Fields declared by this template itself */
    readonly fields: FieldMap,
    readonly parent: DocumentType | undefined,
    readonly collection: string | undefined,
    readonly allowInheritance: boolean,
    readonly indexes: readonly IndexDeclaration[],
    readonly hooks: DocumentHooks
  ) {}
}

export class EmbeddedTemplate<F extends FieldMap = FieldMap> {
  readonly kind = "embedded";
  declare readonly _fields: F;

  constructor(
    readonly name: string,
    readonly fields: FieldMap
  ) {}
}

/**
 * Declare a document type.
 *
 * @example
 * ```ts
 * const User = registry.register(
 *   defineDocument("User", {
 *     fields: {
 *       email: fields.email({ required: true, unique: true }),
 *       name: fields.string(),
 *     },
 *   })
 * );
 * ```
 */
export function defineDocument<P extends FieldMap, F extends FieldMap>(
  name: string,
  definition: ChildDocumentDefinition<P, F>
): DocumentTemplate<Merge<P, F>>;
export function defineDocument<F extends FieldMap>(
  name: string,
  definition: DocumentDefinition<F>
): DocumentTemplate<F>;
export function defineDocument(
  name: string,
  definition: DocumentDefinition<FieldMap> | ChildDocumentDefinition<FieldMap, FieldMap>
): DocumentTemplate {
  const parent = "extends" in definition ? definition.extends : undefined;
  return new DocumentTemplate(
    name,
    { ...definition.fields },
    parent,
    definition.collection,
    definition.allowInheritance ?? false,
    [...(definition.indexes ?? [])],
    { ...definition.hooks }
  );
}

/**
 * Declare an embedded document type, stored as a nested object inside its
 * parent document
 */
export function defineEmbedded<F extends FieldMap>(name: string, definition: { fields: F }): EmbeddedTemplate<F> {
  return new EmbeddedTemplate<F>(name, { ...definition.fields });
}
