/**
 * Internal contract between documents, their type and the registry
 */

import type { DocumentType } from "./document-type.js";
import type { TypeResolver } from "./fields/reference.js";
import type { UniqueConstraint } from "./indexes.js";
import type { LifecycleController } from "./lifecycle.js";
import type { Logger } from "./observability/logs.js";
import type { Schema } from "./schema/schema.js";
import type { DocumentHooks } from "./schema/template.js";
import type { DocumentId, StoreDriver } from "./types.js";

/**
 * Services a registry provides to the types registered in it
 */
export interface ModelHost extends TypeResolver {
  /** @throws {NoDriverDefinedError} Before a driver is bound */
  readonly driver: StoreDriver;
  readonly logger: Logger;
  readonly defaultBatchSize: number;
  generateId(): DocumentId;
  /** @throws {NotRegisteredError} For unknown names */
  model(name: string): Model;
}

/**
 * A registered document type, as seen from inside the mapper
 */
export interface Model {
  readonly name: string;
  readonly collection: string;
  readonly schema: Schema;
  readonly hooks: DocumentHooks;
  /** Value stored under `_cls`; undefined for non-polymorphic types */
  readonly discriminator: string | undefined;
  readonly parentModel: Model | undefined;
  readonly host: ModelHost;
  readonly lifecycle: LifecycleController;
  /** Public face of the model */
  readonly type: DocumentType;
  uniqueConstraints(): UniqueConstraint[];
}
