/**
 * docmap SDK
 *
 * Schema-driven object-document mapper: typed documents, change tracking,
 * async validation, uniqueness and reference checks, polymorphic collections
 */

// Wire-level types and the driver contract
export type {
  DocumentId,
  WireDocument,
  FieldOperator,
  LogicalOperator,
  Filter,
  Sort,
  UpdatePayload,
  InsertResult,
  UpdateResult,
  DeleteResult,
  FindOptions,
  FindPageOptions,
  Page,
  Continuation,
  IndexDirection,
  IndexDescriptor,
  StoreDriver,
} from "./types.js";

// Fields and validators
export * as fields from "./fields/index.js";
export * as validators from "./validators.js";
export { Field } from "./fields/field.js";
export type {
  AnyField,
  DocumentData,
  DocumentInput,
  FieldInput,
  FieldMap,
  FieldName,
  FieldOptions,
  FieldValue,
  IoContext,
  IoValidator,
  Merge,
  Validator,
} from "./fields/field.js";
export { ScalarField, DateField, DictField } from "./fields/scalars.js";
export type { Dict } from "./fields/scalars.js";
export { ListField } from "./fields/list.js";
export { EmbeddedField } from "./fields/embedded.js";
export { Reference, ReferenceField } from "./fields/reference.js";
export type { ReferenceFieldOptions, ReferenceTarget, TypeResolver } from "./fields/reference.js";

// Templates, schemas and the registry
export { defineDocument, defineEmbedded, DocumentTemplate, EmbeddedTemplate } from "./schema/template.js";
export type {
  ChildDocumentDefinition,
  DocumentDefinition,
  DocumentHooks,
  HookResult,
  IndexDeclaration,
} from "./schema/template.js";
export { Schema, ID_ATTRIBUTE, DISCRIMINATOR_ATTRIBUTE } from "./schema/schema.js";
export { createRegistry, collectionName } from "./schema/registry.js";
export type { DocumentRegistry } from "./schema/registry.js";
export { parseRegistryOptions, isStoreDriver } from "./config.js";
export type { RegistryOptions, ResolvedRegistryOptions } from "./config.js";

// Documents
export { Document } from "./document.js";
export type { DocumentType, CursorOptions } from "./document-type.js";
export { EmbeddedDocument } from "./embedded.js";
export type { EmbeddedType } from "./embedded.js";
export type { DocumentStatus } from "./state.js";
export type { CommitOptions, CommitResult, DeleteOptions, IoValidateOptions } from "./lifecycle.js";
export { indexName } from "./indexes.js";
export { UNIQUE_FIELD_MESSAGE, uniqueTogetherMessage } from "./uniqueness.js";

// Drivers
export { MemoryDriver, createMemoryDriver } from "./drivers/memory.js";
export { matches, evaluateQuery, getPath } from "./query.js";
export { canonical, stableStringify } from "./format.js";

// Observability
export { Logger, logger, LOG_LEVELS } from "./observability/logs.js";
export type { LogEntry, LogLevel } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { Operation, OperationMetrics } from "./observability/metrics.js";

// Errors
export {
  DocmapError,
  ValidationError,
  RequiredFieldError,
  ReferenceNotFoundError,
  UpdateError,
  DeleteError,
  NotCreatedError,
  UsageError,
  DocumentDefinitionError,
  NotRegisteredError,
  NoDriverDefinedError,
  DriverError,
  DuplicateKeyError,
  IndexConflictError,
} from "./errors.js";
export type { ErrorMessages, MessageTree } from "./errors.js";
