/**
 * Shared document models for tests and examples
 */

import { defineDocument, defineEmbedded, fields, validators } from "@docmap/sdk";
import type { DocumentInput, DocumentRegistry, DocumentType, FieldMap } from "@docmap/sdk";

/**
 * Register a small school model: teachers, courses taught by a teacher, and
 * students enrolled in courses
 */
export function createClassroomModel(registry: DocumentRegistry) {
  const Address = registry.register(
    defineEmbedded("Address", {
      fields: {
        street: fields.string(),
        city: fields.string({ required: true }),
        zip: fields.string({ attribute: "z", validate: validators.regexp(/^\d{5}$/) }),
      },
    })
  );

  const Teacher = registry.register(
    defineDocument("Teacher", {
      fields: {
        name: fields.string({ required: true }),
        email: fields.email({ unique: true }),
      },
    })
  );

  const Course = registry.register(
    defineDocument("Course", {
      fields: {
        name: fields.string({ required: true, validate: validators.length({ min: 3 }) }),
        teacher: fields.reference(Teacher),
        level: fields.int({ default: 1, validate: validators.range({ min: 1, max: 5 }) }),
      },
      indexes: ["name"],
    })
  );

  const Student = registry.register(
    defineDocument("Student", {
      fields: {
        name: fields.string({ required: true }),
        birthday: fields.date(),
        address: fields.embedded(Address),
        courses: fields.list(fields.reference(Course)),
      },
      indexes: ["-birthday"],
    })
  );

  return { Address, Teacher, Course, Student };
}

export type ClassroomModel = ReturnType<typeof createClassroomModel>;

/**
 * Insert `count` documents built by `build`, one after the other
 * @returns The identities assigned, in insertion order
 */
export async function seed<F extends FieldMap>(
  type: DocumentType<F>,
  count: number,
  build: (index: number) => DocumentInput<F>
): Promise<string[]> {
  const ids: string[] = [];
  for (let i = 0; i < count; i++) {
    const doc = type.create(build(i));
    await doc.commit();
    if (doc.id !== undefined) {
      ids.push(doc.id);
    }
  }
  return ids;
}
