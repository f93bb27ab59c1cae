/**
 * References to other documents
 *
 * A reference is a lazy (type, identity) pair. It is stored as the bare
 * identity and only resolved through the store when fetched or when its
 * integrity is checked during async validation.
 */

import { ReferenceNotFoundError } from "../errors.js";
import type { DocumentId } from "../types.js";
import { Field } from "./field.js";
import type { FieldOptions, IoContext } from "./field.js";

/**
 * Anything a reference can point at: a registered document type
 */
export interface ReferenceTarget<D = unknown> {
  readonly name: string;
  /** Names of the type and every registered subtype */
  descendants(): string[];
  isInstance(value: unknown): value is D;
  findOne(id: DocumentId): Promise<D | null>;
  exists(id: DocumentId): Promise<boolean>;
}

/**
 * Looks up registered document types by name
 */
export interface TypeResolver {
  resolve(name: string): ReferenceTarget;
}

export class Reference<D = unknown> {
  readonly #target: () => ReferenceTarget<D>;

  constructor(
    target: ReferenceTarget<D> | (() => ReferenceTarget<D>),
    readonly id: DocumentId
  ) {
    this.#target = typeof target === "function" ? target : () => target;
  }

  /**
   * Document type the reference points at
   */
  get type(): ReferenceTarget<D> {
    return this.#target();
  }

  /**
   * Load the referenced document
   * @throws {ReferenceNotFoundError} If it no longer exists
   */
  async fetch(): Promise<D> {
    const doc = await this.type.findOne(this.id);
    if (doc === null) {
      throw new ReferenceNotFoundError(this.type.name);
    }
    return doc;
  }

  equals(other: unknown): boolean {
    return other instanceof Reference && other.id === this.id && other.type.name === this.type.name;
  }

  toJSON(): DocumentId {
    return this.id;
  }

  toString(): string {
    return `Reference(${this.type.name}, ${this.id})`;
  }
}

export interface ReferenceFieldOptions<D> extends FieldOptions<Reference<D>> {
  /** Verify during async validation that the target exists (default: true) */
  checkIntegrity?: boolean;
}

function identityOf(value: unknown): DocumentId | undefined {
  if (typeof value === "object" && value !== null && "id" in value && typeof value.id === "string") {
    return value.id;
  }
  return undefined;
}

function isUncreatedDocument(value: unknown): boolean {
  return typeof value === "object" && value !== null && "id" in value && value.id === undefined;
}

/**
 * Adapt a target resolved by name to the field's document type
 */
function narrowTarget<D>(target: ReferenceTarget): ReferenceTarget<D> {
  const isInstance = (value: unknown): value is D => target.isInstance(value);
  return {
    name: target.name,
    descendants: () => target.descendants(),
    isInstance,
    async findOne(id) {
      const doc = await target.findOne(id);
      return isInstance(doc) ? doc : null;
    },
    exists: (id) => target.exists(id),
  };
}

/**
 * Field holding a `Reference`. Accepts a reference, a created document of the
 * target type, or a bare identity.
 */
export class ReferenceField<D = unknown> extends Field<Reference<D>, Reference<D> | D | DocumentId> {
  readonly kind = "reference";
  readonly checkIntegrity: boolean;
  readonly #declared: ReferenceTarget<D> | string;
  #resolved: ReferenceTarget<D> | undefined;

  constructor(target: ReferenceTarget<D> | string, options: ReferenceFieldOptions<D> = {}) {
    super(options);
    this.#declared = target;
    this.checkIntegrity = options.checkIntegrity ?? true;
  }

  get targetName(): string {
    return typeof this.#declared === "string" ? this.#declared : this.#declared.name;
  }

  /**
   * Target document type, resolved through the registry when declared by name
   */
  get target(): ReferenceTarget<D> {
    if (typeof this.#declared !== "string") {
      return this.#declared;
    }
    this.#resolved ??= narrowTarget<D>(this.resolver.resolve(this.#declared));
    return this.#resolved;
  }

  override signature(): string {
    return `reference<${this.targetName}>`;
  }

  /**
   * A reference to the target type or one of its subtypes
   */
  isValue(value: unknown): value is Reference<D> {
    return value instanceof Reference && this.target.descendants().includes(value.type.name);
  }

  protected invalidMessage(value: unknown): string {
    if (value instanceof Reference) {
      return `Reference to ${this.targetName} expected.`;
    }
    return isUncreatedDocument(value)
      ? "Cannot reference a document that has not been created yet."
      : "Not a valid reference.";
  }

  override deserialize(input: unknown): unknown {
    if (input instanceof Reference) {
      return input;
    }
    if (typeof input === "string") {
      return new Reference(() => this.target, input);
    }
    const id = identityOf(input);
    if (id !== undefined && this.target.isInstance(input)) {
      return new Reference(() => this.target, id);
    }
    return input;
  }

  override toWire(value: unknown): unknown {
    return value instanceof Reference ? value.id : value;
  }

  override fromWire(raw: unknown): unknown {
    return typeof raw === "string" ? new Reference(() => this.target, raw) : raw;
  }

  override toPlain(value: unknown): unknown {
    return value instanceof Reference ? value.id : value;
  }

  protected override get hasIoContent(): boolean {
    return this.checkIntegrity;
  }

  protected override async ioValidateContent(value: Reference<D>, _context: IoContext): Promise<void> {
    if (!(await this.target.exists(value.id))) {
      throw new ReferenceNotFoundError(this.targetName);
    }
  }
}

export const reference = <D = unknown>(target: ReferenceTarget<D> | string, options?: ReferenceFieldOptions<D>) =>
  new ReferenceField<D>(target, options);
