/**
 * Registry configuration
 */

import { z } from "zod";
import { UsageError } from "./errors.js";
import { LOG_LEVELS } from "./observability/logs.js";
import type { LogLevel } from "./observability/logs.js";
import type { StoreDriver } from "./types.js";

const DRIVER_METHODS = [
  "insertOne",
  "updateOne",
  "deleteOne",
  "find",
  "findPage",
  "count",
  "createIndex",
  "listIndexes",
  "dropIndexes",
  "drop",
] as const;

export function isStoreDriver(value: unknown): value is StoreDriver {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return DRIVER_METHODS.every((method) => typeof Reflect.get(value, method) === "function");
}

const LogLevelSchema = z.custom<LogLevel>(
  (value) => LOG_LEVELS.some((level) => level === value),
  { message: `logLevel must be one of: ${LOG_LEVELS.join(", ")}` }
);

export const RegistryOptionsSchema = z
  .object({
    /** Store driver; may also be bound later with `registry.init()` */
    driver: z
      .custom<StoreDriver>(isStoreDriver, { message: "driver must implement the StoreDriver contract" })
      .optional(),
    /** Identity factory for inserted documents (default: random UUIDs) */
    idFactory: z.function().args().returns(z.string()).optional(),
    /** Minimum level of the registry's own logger (default: the shared logger) */
    logLevel: LogLevelSchema.optional(),
    /** Page size of cursor reads */
    defaultBatchSize: z.number().int().positive().default(101),
  })
  .strict();

export type RegistryOptions = z.input<typeof RegistryOptionsSchema>;
export type ResolvedRegistryOptions = z.output<typeof RegistryOptionsSchema>;

/**
 * @throws {UsageError} Listing every invalid option
 */
export function parseRegistryOptions(options: unknown = {}): ResolvedRegistryOptions {
  const result = RegistryOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new UsageError(`Invalid registry options: ${issues.join("; ")}`);
  }
  return result.data;
}
