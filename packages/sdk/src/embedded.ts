/**
 * Embedded documents
 *
 * An embedded document has a schema but no identity and no collection: it is
 * stored as a nested object inside its parent document and is validated as
 * part of the parent, with its messages nested under the parent field.
 */

import type { DocumentInput, FieldInput, FieldMap, FieldName, FieldValue, IoContext } from "./fields/field.js";
import type { Schema } from "./schema/schema.js";
import { DocumentState } from "./state.js";
import type { WireDocument } from "./types.js";
import { assertValid, validateIo, validateStructure } from "./validation/engine.js";

export interface EmbeddedType<F extends FieldMap = FieldMap> {
  readonly name: string;
  readonly schema: Schema;
  /**
   * Build an embedded document; declared defaults fill missing fields
   * @throws {ValidationError} On unknown fields
   */
  create(values?: DocumentInput<F>): EmbeddedDocument<F>;
  /**
   * Untyped counterpart of `create`, for input that was not checked statically
   * @throws {ValidationError} On unknown fields
   */
  fromInput(input: object): EmbeddedDocument<F>;
  fromWire(raw: WireDocument): EmbeddedDocument<F>;
  isInstance(value: unknown): value is EmbeddedDocument<F>;
}

export class EmbeddedDocument<F extends FieldMap = FieldMap> {
  readonly #state: DocumentState;

  /** @internal */
  constructor(
    readonly type: EmbeddedType<F>,
    state: DocumentState
  ) {
    this.#state = state;
  }

  get<K extends FieldName<F>>(name: K): FieldValue<F[K]> | undefined {
    return this.#state.get(name) as FieldValue<F[K]> | undefined;
  }

  set<K extends FieldName<F>>(name: K, value: FieldInput<F[K]> | FieldValue<F[K]> | undefined): this {
    this.#state.set(name, value);
    return this;
  }

  unset(name: FieldName<F>): this {
    this.#state.unset(name);
    return this;
  }

  validate(): void {
    const schema = this.type.schema;
    assertValid(validateStructure(schema, (name) => this.#state.get(name), schema.names));
  }

  /**
   * Async validators of every field. Assumes structural validation passed.
   */
  async ioValidate(context: IoContext): Promise<void> {
    const schema = this.type.schema;
    assertValid(await validateIo(schema, (name) => this.#state.get(name), schema.names, context));
  }

  toWire(): WireDocument {
    return this.#state.toPayload(false);
  }

  toPlain(): Record<string, unknown> {
    return this.#state.toPlain();
  }

  toJSON(): Record<string, unknown> {
    return this.toPlain();
  }
}

export class EmbeddedTypeImpl<F extends FieldMap = FieldMap> implements EmbeddedType<F> {
  constructor(
    readonly name: string,
    readonly schema: Schema
  ) {}

  create(values?: DocumentInput<F>): EmbeddedDocument<F> {
    return this.fromInput(values ?? {});
  }

  fromInput(input: object): EmbeddedDocument<F> {
    const state = new DocumentState(this.schema);
    state.load(input, { defaults: true });
    return new EmbeddedDocument<F>(this, state);
  }

  fromWire(raw: WireDocument): EmbeddedDocument<F> {
    const state = new DocumentState(this.schema);
    state.replaceFromWire(raw);
    return new EmbeddedDocument<F>(this, state);
  }

  isInstance(value: unknown): value is EmbeddedDocument<F> {
    return value instanceof EmbeddedDocument && value.type === this;
  }
}
