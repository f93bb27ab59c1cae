/**
 * Core wire-level types and the store driver contract
 */

/**
 * Document identity as stored under `_id`
 */
export type DocumentId = string;

/**
 * A raw document as exchanged with the store driver
 */
export type WireDocument = Record<string, unknown>;

/**
 * Mango query operators for field-level conditions
 */
export type FieldOperator =
  | { $eq: unknown }
  | { $ne: unknown }
  | { $in: unknown[] }
  | { $nin: unknown[] }
  | { $all: unknown[] }
  | { $gt: unknown }
  | { $gte: unknown }
  | { $lt: unknown }
  | { $lte: unknown }
  | { $exists: boolean }
  | { $type: string };

/**
 * Logical operators for combining conditions
 */
export type LogicalOperator =
  | { $and: Filter[] }
  | { $or: Filter[] }
  | { $nor: Filter[] }
  | { $not: Filter };

/**
 * Filter object for Mango queries
 */
export type Filter = Record<string, unknown>;

/**
 * Sort specification (1 = ascending, -1 = descending)
 */
export type Sort = Record<string, 1 | -1>;

/**
 * Partial update directive produced for modified documents
 */
export interface UpdatePayload {
  $set?: WireDocument;
  $unset?: Record<string, "">;
}

export interface InsertResult {
  insertedId: DocumentId;
}

export interface UpdateResult {
  matchedCount: number;
  modifiedCount: number;
}

export interface DeleteResult {
  deletedCount: number;
}

/**
 * Options for find operations
 */
export interface FindOptions {
  /** Maximum number of results to return */
  limit?: number;
  /** Number of results to skip */
  skip?: number;
  /** Sort order for results */
  sort?: Sort;
}

/**
 * Options for paginated find operations
 */
export interface FindPageOptions extends FindOptions {
  /** Number of documents per batch */
  batchSize?: number;
}

/**
 * Restartable page of results.
 * `next` loads the following page; it is null once the store has no more data.
 */
export interface Page<T> {
  items: T[];
  next: Continuation<T> | null;
}

export type Continuation<T> = () => Promise<Page<T>>;

/**
 * Index direction (1 = ascending, -1 = descending)
 */
export type IndexDirection = 1 | -1;

/**
 * Wire-level index definition, named after its key in store convention
 * (`field_1_other_-1`)
 */
export interface IndexDescriptor {
  name: string;
  key: Array<[string, IndexDirection]>;
  unique?: boolean;
  sparse?: boolean;
  /** Only documents matching this filter are indexed */
  partialFilter?: Filter;
}

/**
 * Store driver contract.
 *
 * Every call names its target collection explicitly; drivers hold no implicit
 * "current collection". Transport and server failures surface as
 * `DriverError`s, which the mapper propagates untouched.
 */
export interface StoreDriver {
  insertOne(collection: string, doc: WireDocument): Promise<InsertResult>;
  updateOne(
    collection: string,
    query: Filter,
    update: UpdatePayload,
    options?: { upsert?: boolean }
  ): Promise<UpdateResult>;
  deleteOne(collection: string, query: Filter): Promise<DeleteResult>;
  find(collection: string, query: Filter, options?: FindOptions): Promise<WireDocument[]>;
  findPage(collection: string, query: Filter, options?: FindPageOptions): Promise<Page<WireDocument>>;
  count(collection: string, query: Filter): Promise<number>;
  createIndex(collection: string, index: IndexDescriptor): Promise<string>;
  listIndexes(collection: string): Promise<IndexDescriptor[]>;
  dropIndexes(collection: string): Promise<void>;
  drop(collection: string): Promise<void>;
}
