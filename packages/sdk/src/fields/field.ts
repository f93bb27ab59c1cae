/**
 * Base field descriptor
 *
 * A field knows how to convert user input into its in-memory value, how to
 * translate that value to and from the wire, and how to validate it
 * (structurally, synchronously, then through its async validator chain).
 * Fields are bound to a name and storage attribute when their schema is
 * registered; a bound field cannot be reused under another name.
 */

import { DocumentDefinitionError, RequiredFieldError, UsageError, ValidationError } from "../errors.js";
import type { Schema } from "../schema/schema.js";
import type { TypeResolver } from "./reference.js";

/**
 * Synchronous validator. Signals failure by throwing `ValidationError`.
 */
export type Validator<T> = { bivarianceHack(value: T): void }["bivarianceHack"];

/**
 * Asynchronous validator. Signals failure by throwing (or rejecting with)
 * `ValidationError`. Validators declared on the same field run one after the
 * other in declaration order.
 */
export type IoValidator<T> = {
  bivarianceHack(field: Field<T, unknown>, value: T, context: IoContext): Promise<void> | void;
}["bivarianceHack"];

/**
 * Context handed to async validators
 */
export interface IoContext {
  /** Resolves registered document types by name */
  readonly resolver: TypeResolver;
}

export interface FieldOptions<T> {
  /** A missing value fails validation */
  required?: boolean;
  /** Values must be unique across the collection (absent values never conflict) */
  unique?: boolean;
  /** Value used by `create()` when none is given; factories are called per document */
  default?: T | (() => T);
  /** Name of the attribute in the wire payload (defaults to the field name) */
  attribute?: string;
  /** Synchronous validators, run in declaration order */
  validate?: Validator<T> | readonly Validator<T>[];
  /** Asynchronous validators, run as a sequential chain in declaration order */
  ioValidate?: IoValidator<T> | readonly IoValidator<T>[];
}

function isList<V>(value: V | readonly V[]): value is readonly V[] {
  return Array.isArray(value);
}

function toList<V>(value: V | readonly V[] | undefined): readonly V[] {
  if (value === undefined) return [];
  return isList(value) ? value : [value];
}

export abstract class Field<T = unknown, TInput = T> {
  /** Type-level only: in-memory value type */
  declare readonly _output: T;
  /** Type-level only: accepted input type */
  declare readonly _input: TInput;

  abstract readonly kind: string;

  readonly required: boolean;
  readonly unique: boolean;
  readonly validators: readonly Validator<T>[];
  readonly ioValidators: readonly IoValidator<T>[];

  #name: string | undefined;
  #attribute: string | undefined;
  #resolver: TypeResolver | undefined;
  readonly #default: FieldOptions<T>["default"];
  readonly #declaredAttribute: string | undefined;

  constructor(options: FieldOptions<T> = {}) {
    this.required = options.required ?? false;
    this.unique = options.unique ?? false;
    this.validators = toList(options.validate);
    this.ioValidators = toList(options.ioValidate);
    this.#default = options.default;
    this.#declaredAttribute = options.attribute;
  }

  /**
   * Field name inside its schema
   */
  get name(): string {
    if (this.#name === undefined) {
      throw new UsageError(`${this.kind} field is not bound to a schema`);
    }
    return this.#name;
  }

  /**
   * Attribute name used in the wire payload
   */
  get attribute(): string {
    return this.#attribute ?? this.#declaredAttribute ?? this.name;
  }

  /**
   * Attribute given in the options, if any
   */
  get declaredAttribute(): string | undefined {
    return this.#declaredAttribute;
  }

  protected get resolver(): TypeResolver {
    if (!this.#resolver) {
      throw new UsageError(`Field "${this.#name ?? this.kind}" is not bound to a registry`);
    }
    return this.#resolver;
  }

  /**
   * Bind the field to its name and registry. Called once at registration.
   */
  bind(name: string, resolver: TypeResolver): void {
    if (this.#name !== undefined && (this.#name !== name || this.#resolver !== resolver)) {
      throw new DocumentDefinitionError(
        `Field "${this.#name}" is already bound; declare a new field for "${name}"`
      );
    }
    this.#name = name;
    this.#attribute = this.#declaredAttribute ?? name;
    this.#resolver = resolver;
  }

  /**
   * Structural signature used to detect incompatible redeclarations
   */
  signature(): string {
    return this.kind;
  }

  /**
   * Whether the field may carry a unique constraint
   */
  get supportsUnique(): boolean {
    return true;
  }

  /**
   * Whether in-place mutation of the value must be detected by snapshot comparison
   */
  get isContainer(): boolean {
    return false;
  }

  get hasDefault(): boolean {
    return this.#default !== undefined;
  }

  /**
   * True when the default is a constant rather than a factory
   */
  get hasConstantDefault(): boolean {
    return this.#default !== undefined && typeof this.#default !== "function";
  }

  defaultValue(): T | undefined {
    const value = this.#default;
    return isFactory<T>(value) ? value() : value;
  }

  /**
   * Schema of embedded documents reachable through this field, for dotted paths
   */
  nestedSchema(): Schema | undefined {
    return undefined;
  }

  /**
   * Runtime check that a value has this field's in-memory type
   */
  abstract isValue(value: unknown): value is T;

  /**
   * Message reported when a present value has the wrong type
   */
  protected abstract invalidMessage(value: unknown): string;

  /**
   * Convert user input into the in-memory value
   */
  deserialize(input: unknown): unknown {
    return input;
  }

  /**
   * Convert an in-memory value into its wire form
   */
  toWire(value: unknown): unknown {
    return value;
  }

  /**
   * Convert a wire value read from the store into its in-memory form
   */
  fromWire(raw: unknown): unknown {
    return raw;
  }

  /**
   * Plain JSON-friendly representation of an in-memory value
   */
  toPlain(value: unknown): unknown {
    return value;
  }

  /**
   * Structural validation: required-ness, type conformance, nested content,
   * then every synchronous validator in declaration order. All validator
   * messages are collected before failing.
   * @throws {ValidationError} With the field's messages
   */
  validate(value: unknown): void {
    if (value === undefined || value === null) {
      if (this.required) {
        throw new RequiredFieldError();
      }
      return;
    }

    if (!this.isValue(value)) {
      throw new ValidationError(this.invalidMessage(value));
    }

    this.validateContent(value);

    const messages: string[] = [];
    for (const validator of this.validators) {
      try {
        validator(value);
      } catch (err) {
        if (!(err instanceof ValidationError)) {
          throw err;
        }
        messages.push(...(Array.isArray(err.messages) ? err.messages : [err.message]));
      }
    }
    if (messages.length > 0) {
      throw new ValidationError(messages);
    }
  }

  /**
   * Validate the content of container values (list elements, embedded fields)
   */
  protected validateContent(_value: T): void {}

  get hasIoValidation(): boolean {
    return this.ioValidators.length > 0 || this.hasIoContent;
  }

  protected get hasIoContent(): boolean {
    return false;
  }

  /**
   * Asynchronous validation chain. The first failing validator stops the
   * chain and is the only failure reported for the field.
   * @throws {ValidationError} From the first failing validator
   */
  async ioValidate(value: unknown, context: IoContext): Promise<void> {
    if (value === undefined || value === null || !this.isValue(value)) {
      return;
    }
    if (this.hasIoContent) {
      await this.ioValidateContent(value, context);
    }
    for (const validator of this.ioValidators) {
      await validator(this, value, context);
    }
  }

  protected async ioValidateContent(_value: T, _context: IoContext): Promise<void> {}
}

function isFactory<T>(value: T | (() => T) | undefined): value is () => T {
  return typeof value === "function";
}

/**
 * Any field, whatever its value type
 */
export type AnyField = Field<unknown, unknown>;

/**
 * Field name → field descriptor mapping declared by a template
 */
export type FieldMap = { readonly [name: string]: AnyField };

export type FieldValue<F extends AnyField> = F["_output"];
export type FieldInput<F extends AnyField> = F["_input"];

export type FieldName<F extends FieldMap> = keyof F & string;

/**
 * In-memory values of a document, all optional
 */
export type DocumentData<F extends FieldMap> = { [K in FieldName<F>]?: FieldValue<F[K]> };

/**
 * Values accepted by `create()`
 */
export type DocumentInput<F extends FieldMap> = {
  [K in FieldName<F>]?: FieldInput<F[K]> | FieldValue<F[K]>;
};

/**
 * Child field map: parent fields overridden and extended by the child's own
 */
export type Merge<P extends FieldMap, F extends FieldMap> = Omit<P, keyof F> & F;

export type EmptyFields = Record<never, never>;
