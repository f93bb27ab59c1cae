/**
 * Document instances
 */

import type { DocumentType } from "./document-type.js";
import type { FieldInput, FieldMap, FieldName, FieldValue, DocumentInput } from "./fields/field.js";
import type { CommitOptions, CommitResult, DeleteOptions, IoValidateOptions } from "./lifecycle.js";
import type { Model } from "./model.js";
import type { DocumentState, DocumentStatus } from "./state.js";
import type { DeleteResult, DocumentId, UpdatePayload, WireDocument } from "./types.js";
import { assertValid, validateStructure } from "./validation/engine.js";

/**
 * A typed, schema-bound record mapped to one entry of a collection.
 *
 * Instances are obtained from `Type.create()` or from reads; they are never
 * constructed directly.
 */
export class Document<F extends FieldMap = FieldMap> {
  readonly #model: Model;
  readonly #state: DocumentState;

  /** @internal */
  constructor(model: Model, state: DocumentState) {
    this.#model = model;
    this.#state = state;
  }

  /**
   * Concrete registered type of the document
   */
  get type(): DocumentType {
    return this.#model.type;
  }

  get typeName(): string {
    return this.#model.name;
  }

  get collection(): string {
    return this.#model.collection;
  }

  /**
   * Identity, assigned by the first successful insert
   */
  get id(): DocumentId | undefined {
    return this.#state.id;
  }

  get status(): DocumentStatus {
    return this.#state.status;
  }

  get isCreated(): boolean {
    return this.#state.status === "created";
  }

  get<K extends FieldName<F>>(name: K): FieldValue<F[K]> | undefined {
    return this.#state.get(name) as FieldValue<F[K]> | undefined;
  }

  /**
   * Set a field. `undefined` clears it.
   */
  set<K extends FieldName<F>>(name: K, value: FieldInput<F[K]> | FieldValue<F[K]> | undefined): this {
    this.#state.set(name, value);
    return this;
  }

  unset(name: FieldName<F>): this {
    this.#state.unset(name);
    return this;
  }

  /**
   * Set several fields at once
   * @throws {ValidationError} With "Unknown field." for names the schema lacks
   */
  update(values: DocumentInput<F>): this {
    this.#state.load(values);
    return this;
  }

  /**
   * Record a field as modified without assigning it
   */
  markDirty(name: FieldName<F>): this {
    this.#state.markDirty(name);
    return this;
  }

  /**
   * Names of the fields modified since the last load or commit
   */
  dirtyFields(): string[] {
    return this.#state.dirtyFields();
  }

  get isDirty(): boolean {
    return this.#state.isDirty;
  }

  clearDirty(): void {
    this.#state.clearDirty();
  }

  toPayload(partial: false): WireDocument;
  toPayload(partial: true): UpdatePayload | null;
  toPayload(partial: boolean): WireDocument | UpdatePayload | null {
    return partial ? this.#state.toPayload(true) : this.#state.toPayload(false);
  }

  /**
   * Structural validation of every field (no store access)
   * @throws {ValidationError}
   */
  validate(): void {
    const schema = this.#model.schema;
    assertValid(validateStructure(schema, (name) => this.#state.get(name), schema.names));
  }

  /**
   * Full validation: structural, async validators, references and uniqueness
   * @throws {ValidationError}
   */
  ioValidate(options: IoValidateOptions = {}): Promise<void> {
    return this.#model.lifecycle.validate(this.#state, options.all ?? false);
  }

  commit(options?: CommitOptions): Promise<CommitResult> {
    return this.#model.lifecycle.commit(this, this.#state, options);
  }

  delete(options?: DeleteOptions): Promise<DeleteResult> {
    return this.#model.lifecycle.delete(this, this.#state, options);
  }

  reload(): Promise<void> {
    return this.#model.lifecycle.reload(this.#state);
  }

  /**
   * Plain values keyed by field name, with the identity under `id`
   */
  toPlain(): Record<string, unknown> {
    const plain = this.#state.toPlain();
    return this.id === undefined ? plain : { id: this.id, ...plain };
  }

  toJSON(): Record<string, unknown> {
    return this.toPlain();
  }

  toString(): string {
    return `<${this.typeName} ${this.id ?? "(not created)"}>`;
  }
}
