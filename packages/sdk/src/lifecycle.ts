/**
 * Document lifecycle controller
 *
 * State machine per document: transient → created → deleted, where a deleted
 * document may be committed again as a brand-new one.
 *
 * Invariants:
 * - Document state changes only after the driver acknowledged the write;
 *   a failed or abandoned operation leaves the instance as it was
 * - An update that matches nothing keeps the dirty-set
 * - Hooks are awaited before the next step
 * - Driver errors propagate unmodified, without retry
 */

import type { Document } from "./document.js";
import { DeleteError, NotCreatedError, UpdateError, UsageError, ValidationError } from "./errors.js";
import { translateFilter } from "./filters.js";
import type { Model } from "./model.js";
import { metrics } from "./observability/metrics.js";
import { ID_ATTRIBUTE } from "./schema/schema.js";
import type { DocumentState } from "./state.js";
import type { DeleteResult, Filter, InsertResult, UpdateResult, WireDocument } from "./types.js";
import { checkUniqueness } from "./uniqueness.js";
import { hasErrors, mergeMessages, validateIo, validateStructure } from "./validation/engine.js";

export interface CommitOptions {
  /** Extra conditions for the update query (field names, created documents only) */
  conditions?: Filter;
  /** Validate every field on update, not only the modified ones */
  ioValidateAll?: boolean;
}

export interface DeleteOptions {
  /** Extra conditions for the delete query (field names) */
  conditions?: Filter;
}

export interface IoValidateOptions {
  /** Validate every field, not only the modified ones */
  all?: boolean;
}

export type CommitResult = InsertResult | UpdateResult | null;

export class LifecycleController {
  constructor(readonly model: Model) {}

  get #log() {
    return this.model.host.logger;
  }

  /**
   * Structural, async and uniqueness validation. On insert (or with `all`)
   * every field is in scope; on update only the dirty ones.
   * @throws {ValidationError} With every collected message
   */
  async validate(state: DocumentState, all = false): Promise<void> {
    const { schema, collection } = this.model;
    const names = state.status === "created" && !all ? state.dirtyFields() : schema.names;
    const values = (name: string) => state.get(name);

    const errors = validateStructure(schema, values, names);
    mergeMessages(errors, await validateIo(schema, values, names, { resolver: this.model.host }, errors));

    const clean = new Set(names.filter((name) => !Object.hasOwn(errors, name)));
    const constraints = this.model.uniqueConstraints();
    if (constraints.length > 0 && clean.size > 0) {
      const conflicts = await checkUniqueness(constraints, clean, {
        driver: this.model.host.driver,
        collection,
        payload: state.toPayload(false),
        id: state.status === "created" ? state.id : undefined,
        discriminator: state.discriminator,
      });
      mergeMessages(errors, conflicts);
    }

    if (hasErrors(errors)) {
      this.#log.info("document.validation.failed", {
        type: this.model.name,
        collection,
        details: { fields: Object.keys(errors) },
      });
      throw new ValidationError(errors);
    }
  }

  /**
   * Insert a transient or deleted document, or write the modified fields of a
   * created one
   * @returns The driver result, or null when a created document had nothing to write
   */
  async commit(doc: Document, state: DocumentState, options: CommitOptions = {}): Promise<CommitResult> {
    if (state.status === "created") {
      return this.#update(doc, state, options);
    }
    if (options.conditions) {
      throw new UsageError(`Cannot commit ${this.model.name} with conditions: the document has not been created yet`);
    }
    return this.#insert(doc, state);
  }

  async #insert(doc: Document, state: DocumentState): Promise<InsertResult> {
    const { host, hooks, collection } = this.model;

    await this.validate(state, true);

    const id = host.generateId();
    const payload: WireDocument = { [ID_ATTRIBUTE]: id, ...state.toPayload(false) };

    await hooks.preInsert?.(doc, payload);
    const result = await metrics.track(collection, "insert", () => host.driver.insertOne(collection, payload));
    await hooks.postInsert?.(doc, result, payload);

    state.assignId(result.insertedId);
    state.clearDirty();
    state.status = "created";

    this.#log.debug("document.insert", { type: this.model.name, collection, details: { id: result.insertedId } });
    return result;
  }

  async #update(doc: Document, state: DocumentState, options: CommitOptions): Promise<UpdateResult | null> {
    const { host, hooks, collection, schema } = this.model;

    const payload = state.toPayload(true);
    if (payload === null) {
      this.#log.debug("document.update.noop", { type: this.model.name, collection, details: { id: state.id } });
      return null;
    }

    await this.validate(state, options.ioValidateAll ?? false);

    const query: Filter = {
      ...(options.conditions ? translateFilter(schema, options.conditions) : {}),
      [ID_ATTRIBUTE]: state.id,
    };
    const extra = await hooks.preUpdate?.(doc, query, payload);
    if (extra) {
      Object.assign(query, extra);
    }

    const result = await metrics.track(collection, "update", () =>
      host.driver.updateOne(collection, query, payload)
    );
    if (result.matchedCount === 0) {
      this.#log.warn("document.update", {
        type: this.model.name,
        collection,
        message: "no document matched",
        details: { query },
      });
      throw new UpdateError(collection);
    }
    await hooks.postUpdate?.(doc, result, payload);

    state.clearDirty();

    this.#log.debug("document.update", {
      type: this.model.name,
      collection,
      details: { id: state.id, fields: Object.keys({ ...payload.$set, ...payload.$unset }) },
    });
    return result;
  }

  /**
   * Delete a created document. Afterwards the instance is deleted, has no
   * identity, and every set field is dirty so a later commit re-inserts it.
   * @throws {NotCreatedError} If the document is not created
   * @throws {DeleteError} If nothing matched
   */
  async delete(doc: Document, state: DocumentState, options: DeleteOptions = {}): Promise<DeleteResult> {
    const { host, hooks, collection, schema } = this.model;
    if (state.status !== "created" || state.id === undefined) {
      throw new NotCreatedError(this.model.name, "delete");
    }

    const query: Filter = {
      ...(options.conditions ? translateFilter(schema, options.conditions) : {}),
      [ID_ATTRIBUTE]: state.id,
    };
    const extra = await hooks.preDelete?.(doc);
    if (extra) {
      Object.assign(query, extra);
    }

    const result = await metrics.track(collection, "delete", () => host.driver.deleteOne(collection, query));
    if (result.deletedCount === 0) {
      throw new DeleteError(collection);
    }
    await hooks.postDelete?.(doc, result);

    const id = state.id;
    state.status = "deleted";
    state.clearId();
    state.markAllDirty();

    this.#log.debug("document.delete", { type: this.model.name, collection, details: { id } });
    return result;
  }

  /**
   * Replace the document's values with what the store holds
   * @throws {NotCreatedError} If the document is not created or no longer exists
   */
  async reload(state: DocumentState): Promise<void> {
    const { host, collection } = this.model;
    if (state.status !== "created" || state.id === undefined) {
      throw new NotCreatedError(this.model.name, "reload");
    }
    const id = state.id;

    const [raw] = await metrics.track(collection, "find", () =>
      host.driver.find(collection, { [ID_ATTRIBUTE]: id }, { limit: 1 })
    );
    if (!raw) {
      throw new NotCreatedError(this.model.name, "reload");
    }
    state.replaceFromWire(raw);
  }
}
