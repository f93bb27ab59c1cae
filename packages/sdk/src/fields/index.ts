/**
 * Field builders
 *
 * @example
 * ```ts
 * import { fields } from "@docmap/sdk";
 *
 * const Course = registry.register(
 *   defineDocument("Course", {
 *     fields: {
 *       name: fields.string({ required: true }),
 *       teacher: fields.reference("Teacher"),
 *       tags: fields.list(fields.string()),
 *     },
 *   })
 * );
 * ```
 */

export { string, email, url, int, number, boolean, date, dict } from "./scalars.js";
export { list } from "./list.js";
export { embedded } from "./embedded.js";
export { reference } from "./reference.js";
