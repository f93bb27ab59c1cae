/**
 * List fields
 */

import { ValidationError } from "../errors.js";
import type { ErrorMessages } from "../errors.js";
import type { Schema } from "../schema/schema.js";
import { Field } from "./field.js";
import type { AnyField, FieldInput, FieldOptions, FieldValue, IoContext } from "./field.js";
import type { TypeResolver } from "./reference.js";

/**
 * Homogeneous list whose elements are described by an inner field.
 *
 * Element failures are reported in list order: a flat list of messages for
 * scalar elements, or a tree keyed by element index when elements are
 * embedded documents.
 */
export class ListField<I extends AnyField> extends Field<Array<FieldValue<I>>, Array<FieldInput<I> | FieldValue<I>>> {
  readonly kind = "list";

  constructor(
    readonly inner: I,
    options: FieldOptions<Array<FieldValue<I>>> = {}
  ) {
    super(options);
  }

  override bind(name: string, resolver: TypeResolver): void {
    super.bind(name, resolver);
    this.inner.bind(name, resolver);
  }

  override signature(): string {
    return `list<${this.inner.signature()}>`;
  }

  override get isContainer(): boolean {
    return true;
  }

  override get supportsUnique(): boolean {
    return false;
  }

  override nestedSchema(): Schema | undefined {
    return this.inner.nestedSchema();
  }

  isValue(value: unknown): value is Array<FieldValue<I>> {
    return Array.isArray(value);
  }

  protected invalidMessage(): string {
    return "Not a valid list.";
  }

  override deserialize(input: unknown): unknown {
    return Array.isArray(input) ? input.map((item: unknown) => this.inner.deserialize(item)) : input;
  }

  override toWire(value: unknown): unknown {
    return Array.isArray(value) ? value.map((item: unknown) => this.inner.toWire(item)) : value;
  }

  override fromWire(raw: unknown): unknown {
    return Array.isArray(raw) ? raw.map((item: unknown) => this.inner.fromWire(item)) : raw;
  }

  override toPlain(value: unknown): unknown {
    return Array.isArray(value) ? value.map((item: unknown) => this.inner.toPlain(item)) : value;
  }

  protected override validateContent(value: Array<FieldValue<I>>): void {
    const failures: Array<[number, ValidationError]> = [];
    value.forEach((item, index) => {
      try {
        // Elements are never optional
        if (item === undefined || item === null) {
          throw new ValidationError("Field may not be null.");
        }
        this.inner.validate(item);
      } catch (err) {
        if (!(err instanceof ValidationError)) {
          throw err;
        }
        failures.push([index, err]);
      }
    });
    if (failures.length > 0) {
      throw this.#combine(failures);
    }
  }

  protected override get hasIoContent(): boolean {
    return this.inner.hasIoValidation;
  }

  /**
   * Run the inner field's chain once per element. Elements run concurrently;
   * failures are reported in list order once every element has finished.
   */
  protected override async ioValidateContent(value: Array<FieldValue<I>>, context: IoContext): Promise<void> {
    const results = await Promise.allSettled(value.map((item) => this.inner.ioValidate(item, context)));

    const failures: Array<[number, ValidationError]> = [];
    for (const [index, result] of results.entries()) {
      if (result.status === "fulfilled") continue;
      if (!(result.reason instanceof ValidationError)) {
        throw result.reason;
      }
      failures.push([index, result.reason]);
    }
    if (failures.length > 0) {
      throw this.#combine(failures);
    }
  }

  #combine(failures: Array<[number, ValidationError]>): ValidationError {
    const nested = failures.some(([, err]) => !Array.isArray(err.messages));
    if (!nested) {
      return new ValidationError(failures.flatMap(([, err]) => (Array.isArray(err.messages) ? err.messages : [])));
    }
    const tree: ErrorMessages = {};
    for (const [index, err] of failures) {
      tree[String(index)] = err.toTree();
    }
    return new ValidationError(tree);
  }
}

export const list = <I extends AnyField>(inner: I, options?: FieldOptions<Array<FieldValue<I>>>) =>
  new ListField(inner, options);
