/**
 * Bound, immutable field sets
 */

import { DocumentDefinitionError, UsageError } from "../errors.js";
import type { AnyField, FieldMap } from "../fields/field.js";
import type { TypeResolver } from "../fields/reference.js";

export const ID_ATTRIBUTE = "_id";
export const DISCRIMINATOR_ATTRIBUTE = "_cls";

const RESERVED_ATTRIBUTES = new Set([ID_ATTRIBUTE, DISCRIMINATOR_ATTRIBUTE]);

/**
 * Ordered field map of a registered document or embedded type, with every
 * field bound to its name and wire attribute
 */
export class Schema {
  readonly name: string;
  readonly fields: Readonly<FieldMap>;
  readonly #byAttribute = new Map<string, AnyField>();

  constructor(name: string, fields: FieldMap, resolver: TypeResolver) {
    this.name = name;

    for (const [fieldName, field] of Object.entries(fields)) {
      if (fieldName === "id") {
        throw new DocumentDefinitionError(`${name}: "id" is reserved for the document identity`);
      }
      field.bind(fieldName, resolver);

      const attribute = field.attribute;
      if (RESERVED_ATTRIBUTES.has(attribute)) {
        throw new DocumentDefinitionError(`${name}.${fieldName}: attribute "${attribute}" is reserved`);
      }
      const clash = this.#byAttribute.get(attribute);
      if (clash) {
        throw new DocumentDefinitionError(
          `${name}: fields "${clash.name}" and "${fieldName}" share the attribute "${attribute}"`
        );
      }
      this.#byAttribute.set(attribute, field);
    }

    this.fields = Object.freeze({ ...fields });
  }

  get names(): string[] {
    return Object.keys(this.fields);
  }

  field(name: string): AnyField | undefined {
    return Object.hasOwn(this.fields, name) ? this.fields[name] : undefined;
  }

  entries(): Array<[string, AnyField]> {
    return Object.entries(this.fields);
  }

  /**
   * Translate a dotted field path into its wire path.
   * `id` maps to `_id`; numeric segments (list positions) pass through;
   * everything below a dict field is kept as written.
   * @throws {UsageError} If a segment names no field
   */
  translatePath(path: string): string {
    if (path === "id") {
      return ID_ATTRIBUTE;
    }

    const out: string[] = [];
    let schema: Schema | undefined = this;
    const segments = path.split(".");

    for (let i = 0; i < segments.length; i++) {
      const segment = segments[i];
      if (/^\d+$/.test(segment) && out.length > 0) {
        out.push(segment);
        continue;
      }
      const field: AnyField | undefined = schema?.field(segment);
      if (!field) {
        throw new UsageError(`Unknown field "${path}" in ${this.name}`);
      }
      out.push(field.attribute);
      if (field.kind === "dict") {
        out.push(...segments.slice(i + 1));
        break;
      }
      schema = field.nestedSchema();
    }

    return out.join(".");
  }
}
