/**
 * Registry test utilities
 */

import { createMemoryDriver, createRegistry } from "@docmap/sdk";
import type { DocumentRegistry, MemoryDriver, RegistryOptions } from "@docmap/sdk";

export interface MemoryRegistry {
  registry: DocumentRegistry;
  driver: MemoryDriver;
}

/**
 * Create a registry bound to a fresh in-memory driver. Logging is reduced to
 * errors unless the options say otherwise.
 */
export function createMemoryRegistry(options: Omit<RegistryOptions, "driver"> = {}): MemoryRegistry {
  const driver = createMemoryDriver();
  const registry = createRegistry({ logLevel: "error", ...options, driver });
  return { registry, driver };
}

/**
 * Execute a function with a registry on an in-memory driver, dropping every
 * collection of the registered types afterwards
 * @param fn - Function to execute with the registry and its driver
 * @param options - Registry options (the driver is always a memory driver)
 * @returns Result of fn
 */
export async function withMemoryRegistry<T>(
  fn: (registry: DocumentRegistry, driver: MemoryDriver) => Promise<T>,
  options?: Omit<RegistryOptions, "driver">
): Promise<T> {
  const { registry, driver } = createMemoryRegistry(options);

  let fnError: unknown;
  try {
    return await fn(registry, driver);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    const collections = new Set(registry.list().map((name) => registry.resolve(name).collection));
    for (const collection of collections) {
      try {
        await driver.drop(collection);
      } catch (err) {
        cleanupError ??= err;
      }
    }
    if (!fnError && cleanupError) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}

/**
 * Sequential identities (`prefix-1`, `prefix-2`, ...) for predictable
 * assertions
 */
export function sequentialIds(prefix = "id"): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
