/**
 * Error types for docmap operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Field-level failures are always reported through `ValidationError.messages`,
 *   a tree that can be rendered as form/API errors without string parsing
 */

/**
 * Field-level error messages.
 * A leaf is the ordered list of messages for one field; embedded documents and
 * lists of embedded documents nest their own trees under the parent field
 * (list elements are keyed by their index).
 */
export type MessageTree = string[] | { [key: string]: MessageTree };

/**
 * Field name → messages mapping carried by a `ValidationError`
 */
export type ErrorMessages = { [field: string]: MessageTree };

/**
 * Base class for all docmap errors
 */
export abstract class DocmapError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when one or more fields fail validation.
 *
 * Validators raise it with a plain message (or list of messages); the
 * validation engine collects those into a single error keyed by field.
 */
export class ValidationError extends DocmapError {
  readonly code: string = "VALIDATION_ERROR";
  readonly messages: ErrorMessages | string[];

  constructor(messages: string | string[] | ErrorMessages, options?: ErrorOptions) {
    const normalized = typeof messages === "string" ? [messages] : messages;
    super(describeMessages(normalized), options);
    this.messages = normalized;
  }

  /**
   * Messages as a tree node, for merging under a parent field
   */
  toTree(): MessageTree {
    return this.messages;
  }
}

/**
 * Thrown when a required field has no value
 */
export class RequiredFieldError extends ValidationError {
  override readonly code = "REQUIRED";

  constructor(message = "Missing data for required field.", options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when a reference points at a document that does not exist
 */
export class ReferenceNotFoundError extends ValidationError {
  override readonly code = "REFERENCE_NOT_FOUND";

  constructor(
    public readonly targetType: string,
    options?: ErrorOptions
  ) {
    super(`Reference not found for document ${targetType}.`, options);
  }
}

/**
 * Thrown when a conditional update matched no document
 */
export class UpdateError extends DocmapError {
  readonly code = "UPDATE_ERROR";

  constructor(collection: string, options?: ErrorOptions) {
    super(
      `Update failed in collection "${collection}": conditions not met or document no longer exists`,
      options
    );
  }
}

/**
 * Thrown when a delete matched no document
 */
export class DeleteError extends DocmapError {
  readonly code = "DELETE_ERROR";

  constructor(collection: string, options?: ErrorOptions) {
    super(
      `Delete failed in collection "${collection}": conditions not met or document no longer exists`,
      options
    );
  }
}

/**
 * Thrown when a lifecycle operation is not valid for the document's current state
 */
export class NotCreatedError extends DocmapError {
  readonly code = "NOT_CREATED";

  constructor(type: string, operation: string, options?: ErrorOptions) {
    super(`Cannot ${operation} document ${type}: it does not exist in the store`, options);
  }
}

/**
 * Thrown on API misuse. These are programming errors, not data errors.
 */
export class UsageError extends DocmapError {
  readonly code = "USAGE_ERROR";
}

/**
 * Thrown when a document template cannot be registered
 */
export class DocumentDefinitionError extends DocmapError {
  readonly code = "DEFINITION_ERROR";
}

/**
 * Thrown when a type name is not known to the registry
 */
export class NotRegisteredError extends DocmapError {
  readonly code = "NOT_REGISTERED";

  constructor(name: string, options?: ErrorOptions) {
    super(`Document type "${name}" is not registered`, options);
  }
}

/**
 * Thrown when the store is used before a driver was bound to the registry
 */
export class NoDriverDefinedError extends DocmapError {
  readonly code = "NO_DRIVER";

  constructor(options?: ErrorOptions) {
    super("No store driver defined: pass one to createRegistry() or call registry.init()", options);
  }
}

/**
 * Generic store driver failure. The mapper never interprets or retries these.
 */
export class DriverError extends DocmapError {
  readonly code: string = "DRIVER_ERROR";
}

/**
 * Thrown by a driver when a write violates a unique index
 */
export class DuplicateKeyError extends DriverError {
  override readonly code = "DUPLICATE_KEY";

  constructor(
    public readonly collection: string,
    public readonly index: string,
    options?: ErrorOptions
  ) {
    super(`Duplicate key in collection "${collection}" for unique index "${index}"`, options);
  }
}

/**
 * Thrown by a driver when an index is redefined with different options
 */
export class IndexConflictError extends DriverError {
  override readonly code = "INDEX_CONFLICT";

  constructor(
    public readonly collection: string,
    public readonly index: string,
    options?: ErrorOptions
  ) {
    super(
      `Index "${index}" already exists in collection "${collection}" with a different definition`,
      options
    );
  }
}

function describeMessages(messages: string[] | ErrorMessages): string {
  if (Array.isArray(messages)) {
    return messages.join(" ");
  }
  const fields = Object.keys(messages);
  return `Validation failed for field${fields.length === 1 ? "" : "s"}: ${fields.join(", ")}`;
}
