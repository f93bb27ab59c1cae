/**
 * Change-tracking document state
 *
 * Holds the in-memory field values of one document (or embedded document),
 * the set of fields modified since the last load or commit, and the
 * canonical wire snapshot of container fields so that in-place mutation of
 * lists, dicts and embedded documents is noticed without explicit marking.
 */

import { UsageError, ValidationError } from "./errors.js";
import type { ErrorMessages } from "./errors.js";
import { canonical } from "./format.js";
import { DISCRIMINATOR_ATTRIBUTE, ID_ATTRIBUTE } from "./schema/schema.js";
import type { Schema } from "./schema/schema.js";
import type { DocumentId, UpdatePayload, WireDocument } from "./types.js";

export type DocumentStatus = "transient" | "created" | "deleted";

export interface LoadOptions {
  /** Fill fields that were not given from their declared defaults */
  defaults?: boolean;
}

export class DocumentState {
  status: DocumentStatus = "transient";

  readonly #values = new Map<string, unknown>();
  #dirty = new Set<string>();
  #snapshot = new Map<string, string>();
  #id: DocumentId | undefined;

  constructor(
    readonly schema: Schema,
    readonly discriminator?: string
  ) {}

  /**
   * Build a state from a raw document read from the store. The result is
   * created and clean.
   */
  static fromWire(schema: Schema, raw: WireDocument, discriminator?: string): DocumentState {
    const state = new DocumentState(schema, discriminator);
    state.replaceFromWire(raw);
    state.status = "created";
    return state;
  }

  get id(): DocumentId | undefined {
    return this.#id;
  }

  assignId(id: DocumentId): void {
    this.#id = id;
  }

  clearId(): void {
    this.#id = undefined;
  }

  /**
   * Set several fields from user input. Every problem (unknown field, input
   * that cannot be converted) is collected before failing.
   * @throws {ValidationError} Keyed by offending field
   */
  load(input: object, options: LoadOptions = {}): void {
    const entries: Array<[string, unknown]> = Object.entries(input);
    const errors: ErrorMessages = {};

    for (const [name, value] of entries) {
      try {
        this.set(name, value);
      } catch (err) {
        if (!(err instanceof ValidationError)) {
          throw err;
        }
        errors[name] = err.toTree();
      }
    }

    if (Object.keys(errors).length > 0) {
      throw new ValidationError(errors);
    }

    if (options.defaults) {
      for (const [name, field] of this.schema.entries()) {
        if (!this.#values.has(name) && field.hasDefault) {
          this.#values.set(name, field.defaultValue());
          this.#dirty.add(name);
        }
      }
    }
  }

  get(name: string): unknown {
    this.#field(name);
    return this.#values.get(name);
  }

  has(name: string): boolean {
    return this.#values.get(name) !== undefined;
  }

  /**
   * Convert and store a value, marking the field dirty.
   * Setting `undefined` or `null` clears the field.
   */
  set(name: string, input: unknown): void {
    const field = this.schema.field(name);
    if (!field) {
      throw new ValidationError("Unknown field.");
    }
    if (input === undefined || input === null) {
      this.unset(name);
      return;
    }
    this.#values.set(name, field.deserialize(input));
    this.#dirty.add(name);
  }

  unset(name: string): void {
    this.#field(name);
    this.#values.delete(name);
    this.#dirty.add(name);
  }

  markDirty(name: string): void {
    this.#field(name);
    this.#dirty.add(name);
  }

  /**
   * Fields modified since the last load or commit, in schema order
   */
  dirtyFields(): string[] {
    return this.schema.names.filter((name) => this.#dirty.has(name) || this.#containerChanged(name));
  }

  get isDirty(): boolean {
    return this.dirtyFields().length > 0;
  }

  /**
   * Fields currently holding a value, in schema order
   */
  setFields(): string[] {
    return this.schema.names.filter((name) => this.#values.has(name));
  }

  /**
   * Wire payload for this state.
   *
   * Full (`partial = false`): every set field through its attribute, plus
   * `_id` once assigned and the discriminator when the type is polymorphic.
   * Partial: `$set`/`$unset` for dirty fields only, or `null` when nothing
   * is dirty.
   */
  toPayload(partial: false): WireDocument;
  toPayload(partial: true): UpdatePayload | null;
  toPayload(partial: boolean): WireDocument | UpdatePayload | null {
    if (partial) {
      return this.#partialPayload();
    }

    const payload: WireDocument = {};
    if (this.#id !== undefined) {
      payload[ID_ATTRIBUTE] = this.#id;
    }
    if (this.discriminator !== undefined) {
      payload[DISCRIMINATOR_ATTRIBUTE] = this.discriminator;
    }
    for (const name of this.setFields()) {
      const field = this.#field(name);
      payload[field.attribute] = field.toWire(this.#values.get(name));
    }
    return payload;
  }

  #partialPayload(): UpdatePayload | null {
    const dirty = this.dirtyFields();
    if (dirty.length === 0) {
      return null;
    }

    const $set: WireDocument = {};
    const $unset: Record<string, ""> = {};
    for (const name of dirty) {
      const field = this.#field(name);
      const value = this.#values.get(name);
      if (value === undefined) {
        $unset[field.attribute] = "";
      } else {
        $set[field.attribute] = field.toWire(value);
      }
    }

    const update: UpdatePayload = {};
    if (Object.keys($set).length > 0) update.$set = $set;
    if (Object.keys($unset).length > 0) update.$unset = $unset;
    return update;
  }

  /**
   * Forget all modifications. Dirty-set and container snapshot are replaced
   * together, in one synchronous step.
   */
  clearDirty(): void {
    const snapshot = new Map<string, string>();
    for (const [name, field] of this.schema.entries()) {
      const value = this.#values.get(name);
      if (field.isContainer && value !== undefined) {
        snapshot.set(name, canonical(field.toWire(value)));
      }
    }
    this.#snapshot = snapshot;
    this.#dirty = new Set();
  }

  /**
   * Mark every set field dirty, so the next commit writes the whole document
   */
  markAllDirty(): void {
    this.#dirty = new Set(this.setFields());
  }

  /**
   * Replace all values with those of a raw stored document, leaving the state
   * clean
   */
  replaceFromWire(raw: WireDocument): void {
    this.#values.clear();
    for (const [name, field] of this.schema.entries()) {
      const value = raw[field.attribute];
      if (value !== undefined && value !== null) {
        this.#values.set(name, field.fromWire(value));
      }
    }
    const id = raw[ID_ATTRIBUTE];
    if (typeof id === "string") {
      this.#id = id;
    }
    this.clearDirty();
  }

  /**
   * Plain JSON-friendly values keyed by field name
   */
  toPlain(): Record<string, unknown> {
    const plain: Record<string, unknown> = {};
    for (const name of this.setFields()) {
      plain[name] = this.#field(name).toPlain(this.#values.get(name));
    }
    return plain;
  }

  #containerChanged(name: string): boolean {
    const field = this.#field(name);
    if (!field.isContainer) {
      return false;
    }
    const value = this.#values.get(name);
    const before = this.#snapshot.get(name);
    if (value === undefined) {
      return before !== undefined;
    }
    return before !== canonical(field.toWire(value));
  }

  #field(name: string) {
    const field = this.schema.field(name);
    if (!field) {
      throw new UsageError(`${this.schema.name} has no field "${name}"`);
    }
    return field;
  }
}
