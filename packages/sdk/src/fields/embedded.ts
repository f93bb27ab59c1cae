/**
 * Embedded document fields
 */

import type { EmbeddedDocument, EmbeddedType } from "../embedded.js";
import type { Schema } from "../schema/schema.js";
import { Field } from "./field.js";
import type { DocumentInput, FieldMap, FieldOptions, IoContext } from "./field.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export class EmbeddedField<F extends FieldMap = FieldMap> extends Field<
  EmbeddedDocument<F>,
  EmbeddedDocument<F> | DocumentInput<F>
> {
  readonly kind = "embedded";

  constructor(
    readonly type: EmbeddedType<F>,
    options: FieldOptions<EmbeddedDocument<F>> = {}
  ) {
    super(options);
  }

  override signature(): string {
    return `embedded<${this.type.name}>`;
  }

  override get isContainer(): boolean {
    return true;
  }

  override get supportsUnique(): boolean {
    return false;
  }

  override nestedSchema(): Schema {
    return this.type.schema;
  }

  isValue(value: unknown): value is EmbeddedDocument<F> {
    return this.type.isInstance(value);
  }

  protected invalidMessage(): string {
    return "Not a valid embedded document.";
  }

  /**
   * Plain objects are converted through the embedded type; unknown keys
   * fail immediately
   */
  override deserialize(input: unknown): unknown {
    if (this.type.isInstance(input) || !isPlainObject(input)) {
      return input;
    }
    return this.type.fromInput(input);
  }

  override toWire(value: unknown): unknown {
    return this.type.isInstance(value) ? value.toWire() : value;
  }

  override fromWire(raw: unknown): unknown {
    return isPlainObject(raw) ? this.type.fromWire(raw) : raw;
  }

  override toPlain(value: unknown): unknown {
    return this.type.isInstance(value) ? value.toPlain() : value;
  }

  protected override validateContent(value: EmbeddedDocument<F>): void {
    value.validate();
  }

  protected override get hasIoContent(): boolean {
    return this.type.schema.entries().some(([, field]) => field.hasIoValidation);
  }

  protected override ioValidateContent(value: EmbeddedDocument<F>, context: IoContext): Promise<void> {
    return value.ioValidate(context);
  }
}

export const embedded = <F extends FieldMap>(type: EmbeddedType<F>, options?: FieldOptions<EmbeddedDocument<F>>) =>
  new EmbeddedField(type, options);
