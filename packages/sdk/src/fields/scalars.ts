/**
 * Scalar field kinds
 *
 * Type conformance of each kind is a zod schema; a value that does not parse
 * fails structural validation with the kind's message.
 */

import { z } from "zod";
import { Field } from "./field.js";
import type { FieldOptions } from "./field.js";

export const StringSchema = z.string();
export const EmailSchema = z.string().email();
export const UrlSchema = z.string().url();
export const IntegerSchema = z.number().int().finite();
export const NumberSchema = z.number().finite();
export const BooleanSchema = z.boolean();
export const DateSchema = z.date();
export const DictSchema = z.record(z.string(), z.unknown());

export type Dict = z.infer<typeof DictSchema>;

/**
 * Field whose type conformance is a zod schema
 */
export class ScalarField<T, TInput = T> extends Field<T, TInput> {
  constructor(
    readonly kind: string,
    readonly schema: z.ZodType<T>,
    private readonly message: string,
    options: FieldOptions<T> = {}
  ) {
    super(options);
  }

  isValue(value: unknown): value is T {
    return this.schema.safeParse(value).success;
  }

  protected invalidMessage(): string {
    return this.message;
  }
}

/**
 * Date field. ISO 8601 strings and epoch milliseconds are accepted as input.
 */
export class DateField extends ScalarField<Date, Date | string | number> {
  constructor(options: FieldOptions<Date> = {}) {
    super("date", DateSchema, "Not a valid datetime.", options);
  }

  override deserialize(input: unknown): unknown {
    if (typeof input === "string" || typeof input === "number") {
      const date = new Date(input);
      return Number.isNaN(date.getTime()) ? input : date;
    }
    return input;
  }

  override fromWire(raw: unknown): unknown {
    return this.deserialize(raw);
  }

  override toPlain(value: unknown): unknown {
    return value instanceof Date ? value.toISOString() : value;
  }
}

/**
 * Free-form mapping. Mutations made in place are detected on commit.
 */
export class DictField extends ScalarField<Dict> {
  constructor(options: FieldOptions<Dict> = {}) {
    super("dict", DictSchema, "Not a valid mapping type.", options);
  }

  override get isContainer(): boolean {
    return true;
  }

  override get supportsUnique(): boolean {
    return false;
  }
}

export const string = (options?: FieldOptions<string>) =>
  new ScalarField("string", StringSchema, "Not a valid string.", options);

export const email = (options?: FieldOptions<string>) =>
  new ScalarField("email", EmailSchema, "Not a valid email address.", options);

export const url = (options?: FieldOptions<string>) =>
  new ScalarField("url", UrlSchema, "Not a valid URL.", options);

export const int = (options?: FieldOptions<number>) =>
  new ScalarField("int", IntegerSchema, "Not a valid integer.", options);

export const number = (options?: FieldOptions<number>) =>
  new ScalarField("number", NumberSchema, "Not a valid number.", options);

export const boolean = (options?: FieldOptions<boolean>) =>
  new ScalarField("boolean", BooleanSchema, "Not a valid boolean.", options);

export const date = (options?: FieldOptions<Date>) => new DateField(options);

export const dict = (options?: FieldOptions<Dict>) => new DictField(options);
