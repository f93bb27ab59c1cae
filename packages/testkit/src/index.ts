/**
 * Test helpers and fixtures for docmap
 */

export { createClassroomModel, seed } from "./fixtures.js";
export type { ClassroomModel } from "./fixtures.js";
export { createMemoryRegistry, sequentialIds, withMemoryRegistry } from "./registry.js";
export type { MemoryRegistry } from "./registry.js";
export { deferred, flushMicrotasks, sleep } from "./timers.js";
export type { Deferred } from "./timers.js";
