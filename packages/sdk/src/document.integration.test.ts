import { describe, it, expect, beforeEach } from "vitest";
import { createMemoryDriver } from "./drivers/memory.js";
import type { MemoryDriver } from "./drivers/memory.js";
import {
  DeleteError,
  NotCreatedError,
  UpdateError,
  UsageError,
  ValidationError,
} from "./errors.js";
import * as fields from "./fields/index.js";
import { Reference } from "./fields/reference.js";
import { createRegistry } from "./schema/registry.js";
import type { DocumentRegistry } from "./schema/registry.js";
import { defineDocument, defineEmbedded } from "./schema/template.js";
import type { Filter, UpdatePayload, WireDocument } from "./types.js";

function classroom(registry: DocumentRegistry) {
  const Teacher = registry.register(
    defineDocument("Teacher", { fields: { name: fields.string({ required: true }) } })
  );
  const Course = registry.register(
    defineDocument("Course", {
      fields: {
        name: fields.string({ required: true }),
        teacher: fields.reference(Teacher),
      },
    })
  );
  const Student = registry.register(
    defineDocument("Student", {
      fields: {
        name: fields.string({ required: true }),
        birthday: fields.date(),
        courses: fields.list(fields.reference(Course)),
      },
    })
  );
  return { Teacher, Course, Student };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected a rejection");
}

describe("document lifecycle", () => {
  let driver: MemoryDriver;
  let registry: DocumentRegistry;
  let model: ReturnType<typeof classroom>;
  let nextId: number;

  beforeEach(() => {
    nextId = 0;
    driver = createMemoryDriver();
    registry = createRegistry({ driver, logLevel: "error", idFactory: () => `id-${++nextId}` });
    model = classroom(registry);
  });

  it("should create a document", async () => {
    const { Student } = model;
    const john = Student.create({ name: "John Doe", birthday: new Date("1995-12-12T00:00:00.000Z") });
    expect(john.status).toBe("transient");
    expect(john.id).toBeUndefined();

    const result = await john.commit();
    expect(result).toEqual({ insertedId: "id-1" });
    expect(john.id).toBe("id-1");
    expect(john.isCreated).toBe(true);
    expect(john.toPayload(false)).toEqual({
      _id: "id-1",
      name: "John Doe",
      birthday: new Date("1995-12-12T00:00:00.000Z"),
    });

    const john2 = await Student.findOne(john.id ?? "");
    expect(john2?.toPlain()).toEqual(john.toPlain());

    // A second commit with nothing modified writes nothing
    expect(await john.commit()).toBeNull();
  });

  it("should update modified fields only", async () => {
    const { Student } = model;
    const john = Student.create({ name: "John Doe", birthday: new Date("1995-12-12T00:00:00.000Z") });
    await john.commit();

    john.set("name", "William Doe");
    expect(john.toPayload(true)).toEqual({ $set: { name: "William Doe" } });
    expect(await john.commit()).toEqual({ matchedCount: 1, modifiedCount: 1 });
    expect(john.toPayload(true)).toBeNull();

    const john2 = await Student.findOne(john.id ?? "");
    expect(john2?.get("name")).toBe("William Doe");

    // Assigning the same value still writes it
    john.set("name", john.get("name"));
    expect(await john.commit()).toEqual({ matchedCount: 1, modifiedCount: 0 });
  });

  it("should apply commit conditions", async () => {
    const { Student } = model;
    const john = Student.create({ name: "William Doe" });
    await john.commit();

    john.set("name", "Zorro Doe");
    await expect(john.commit({ conditions: { name: "Bad Name" } })).rejects.toThrow(UpdateError);
    // The failed update keeps the modification pending
    expect(john.dirtyFields()).toEqual(["name"]);

    await john.commit({ conditions: { name: "William Doe" } });
    await john.reload();
    expect(john.get("name")).toBe("Zorro Doe");
  });

  it("should refuse conditions on a document that was never created", async () => {
    const { Student } = model;
    await expect(Student.create({ name: "Joe" }).commit({ conditions: { name: "dummy" } })).rejects.toThrow(
      UsageError
    );
  });

  it("should delete and re-insert a document", async () => {
    const { Student } = model;
    const john = Student.create({ name: "John Doe" });
    await expect(john.delete()).rejects.toThrow(NotCreatedError);

    await john.commit();
    expect(await Student.find()).toHaveLength(1);

    expect(await john.delete()).toEqual({ deletedCount: 1 });
    expect(john.isCreated).toBe(false);
    expect(john.status).toBe("deleted");
    expect(john.id).toBeUndefined();
    expect(await Student.find()).toHaveLength(0);
    await expect(john.delete()).rejects.toThrow(NotCreatedError);

    // Committing again inserts a brand-new document
    await john.commit();
    expect(john.isCreated).toBe(true);
    expect(john.id).toBe("id-2");
    const students = await Student.find();
    expect(students).toHaveLength(1);
    expect(students[0].get("name")).toBe("John Doe");

    await students[0].delete();
    await expect(john.delete()).rejects.toThrow(DeleteError);
  });

  it("should reload what the store holds", async () => {
    const { Student } = model;
    await Student.create({ name: "Other dude" }).commit();
    const john = Student.create({ name: "John Doe" });
    await expect(john.reload()).rejects.toThrow(NotCreatedError);
    await john.commit();

    const john2 = await Student.findOne(john.id ?? "");
    john2?.set("name", "William Doe");
    await john2?.commit();

    await john.reload();
    expect(john.get("name")).toBe("William Doe");
    expect(john.isDirty).toBe(false);
  });

  it("should refuse to reload a document removed from the store", async () => {
    const { Student } = model;
    const john = Student.create({ name: "John Doe" });
    await john.commit();
    await driver.deleteOne("student", { _id: john.id });
    await expect(john.reload()).rejects.toThrow(NotCreatedError);
  });

  describe("find", () => {
    beforeEach(async () => {
      for (let i = 0; i < 10; i++) {
        await model.Student.create({ name: `student-${i}` }).commit();
      }
    });

    it("should return a list", async () => {
      const results = await model.Student.find({}, { limit: 5, skip: 6 });
      expect(results.map((student) => student.get("name"))).toEqual([
        "student-6",
        "student-7",
        "student-8",
        "student-9",
      ]);
      expect(results.every((student) => model.Student.isInstance(student))).toBe(true);
    });

    it("should page with a cursor", async () => {
      const page = await model.Student.find({}, { limit: 5, skip: 6, cursor: true });
      expect(page.items).toHaveLength(4);
      const next = await page.next?.();
      expect(next?.items).toEqual([]);
      expect(next?.next).toBeNull();
    });

    it("should honour the batch size", async () => {
      const page = await model.Student.find({}, { cursor: true, batchSize: 6, sort: { name: -1 } });
      expect(page.items.map((student) => student.get("name"))).toEqual([
        "student-9",
        "student-8",
        "student-7",
        "student-6",
        "student-5",
        "student-4",
      ]);
      const next = await page.next?.();
      expect(next?.items).toHaveLength(4);
    });

    it("should filter by field and by identity", async () => {
      const [third] = await model.Student.find({ name: "student-3" });
      expect(third.id).toBe("id-4");
      expect((await model.Student.findOne({ id: "id-4" }))?.get("name")).toBe("student-3");
      expect(await model.Student.findOne("missing")).toBeNull();
      expect(await model.Student.count({ name: { $in: ["student-1", "student-2", "nobody"] } })).toBe(2);
      expect(await model.Student.exists("id-1")).toBe(true);
    });

    it("should refuse unknown fields in filters", async () => {
      await expect(model.Student.find({ nickname: "x" })).rejects.toThrow(UsageError);
    });
  });

  describe("references", () => {
    it("should store references as identities", async () => {
      const { Student, Teacher, Course } = model;
      const student = Student.create({ name: "Marty McFly", birthday: new Date("1968-06-09T00:00:00.000Z") });
      await student.commit();
      const teacher = Teacher.create({ name: "M. Strickland" });
      await teacher.commit();
      const course = Course.create({ name: "Overboard 101", teacher });
      await course.commit();

      expect(student.get("courses")).toBeUndefined();
      student.set("courses", [course]);
      await student.commit();
      expect(student.toPayload(false)).toEqual({
        _id: student.id,
        name: "Marty McFly",
        birthday: new Date("1968-06-09T00:00:00.000Z"),
        courses: [course.id],
      });

      const reference = course.get("teacher");
      expect(reference).toBeInstanceOf(Reference);
      const fetched = await reference?.fetch();
      expect(fetched?.id).toBe(teacher.id);
      expect(fetched?.get("name")).toBe("M. Strickland");
    });

    it("should query by referenced document", async () => {
      const { Teacher, Course } = model;
      const teacher = Teacher.create({ name: "M. Strickland" });
      await teacher.commit();
      await Course.create({ name: "Overboard 101", teacher }).commit();
      await Course.create({ name: "Physics" }).commit();

      const courses = await Course.find({ teacher });
      expect(courses.map((course) => course.get("name"))).toEqual(["Overboard 101"]);
    });

    it("should report dangling references", async () => {
      const { Teacher, Course } = model;
      const teacher = Teacher.create({ name: "M. Strickland" });
      await teacher.commit();
      const course = Course.create({ name: "Overboard 101", teacher });
      await course.commit();

      course.set("teacher", new Reference(Teacher, "no-such-teacher"));
      const error = await rejection(course.ioValidate());
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.messages).toEqual({
        teacher: ["Reference not found for document Teacher."],
      });
    });

    it("should refuse references to documents not created yet", () => {
      const { Teacher, Course } = model;
      const course = Course.create({ name: "Overboard 101", teacher: Teacher.create({ name: "Nobody" }) });
      expect(() => course.validate()).toThrow(ValidationError);
    });
  });

  describe("validation", () => {
    it("should report the same required message from validate, ioValidate and commit", async () => {
      const { Student } = model;
      const student = Student.create({ birthday: new Date("1968-06-09T00:00:00.000Z") });
      const expected = { name: ["Missing data for required field."] };

      let syncError: unknown;
      try {
        student.validate();
      } catch (err) {
        syncError = err;
      }
      const ioError = await rejection(student.ioValidate());
      const commitError = await rejection(student.commit());

      for (const error of [syncError, ioError, commitError]) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error instanceof ValidationError && error.messages).toEqual(expected);
      }
      expect(student.isCreated).toBe(false);

      student.set("name", "Marty");
      await student.commit();
      expect(student.isCreated).toBe(true);
    });

    it("should reject unknown fields on create and update", () => {
      const { Student } = model;
      expect(() => Student.create({ name: "Marty", ...{ nickname: "M" } })).toThrow(ValidationError);
      const student = Student.create({ name: "Marty" });
      expect(() => student.update({ name: "Doc", ...{ nickname: "M" } })).toThrow(ValidationError);
    });

    it("should only validate modified fields on update", async () => {
      const { Student } = model;
      await driver.insertOne("student", { _id: "legacy", name: 42 });
      const [legacy] = await Student.find();
      legacy.set("birthday", new Date(0));
      await expect(legacy.commit()).resolves.toEqual({ matchedCount: 1, modifiedCount: 1 });
      await expect(legacy.commit({ ioValidateAll: true })).resolves.toBeNull();

      legacy.set("birthday", new Date(1));
      const error = await rejection(legacy.commit({ ioValidateAll: true }));
      expect(error instanceof ValidationError && error.messages).toEqual({ name: ["Not a valid string."] });
    });
  });

  describe("uniqueness", () => {
    it("should report unique field conflicts", async () => {
      const UniqueIndexDoc = registry.register(
        defineDocument("UniqueIndexDoc", {
          fields: {
            notUnique: fields.string({ unique: false }),
            sparseUnique: fields.int({ unique: true }),
            requiredUnique: fields.int({ unique: true, required: true }),
          },
        })
      );
      await UniqueIndexDoc.ensureIndexes();

      await UniqueIndexDoc.create({ notUnique: "a", requiredUnique: 1 }).commit();
      await UniqueIndexDoc.create({ notUnique: "a", sparseUnique: 1, requiredUnique: 2 }).commit();

      let error = await rejection(UniqueIndexDoc.create({ notUnique: "a", requiredUnique: 1 }).commit());
      expect(error instanceof ValidationError && error.messages).toEqual({
        requiredUnique: ["Field value must be unique."],
      });
      error = await rejection(UniqueIndexDoc.create({ notUnique: "a", sparseUnique: 1, requiredUnique: 3 }).commit());
      expect(error instanceof ValidationError && error.messages).toEqual({
        sparseUnique: ["Field value must be unique."],
      });
    });

    it("should report compound conflicts on every field of the group", async () => {
      const Doc = registry.register(
        defineDocument("UniqueIndexCompoundDoc", {
          fields: { compound1: fields.int(), compound2: fields.int(), notUnique: fields.string() },
          indexes: [{ key: ["compound1", "compound2"], unique: true }],
        })
      );
      for (const [compound1, compound2] of [[1, 1], [1, 2], [2, 1], [2, 2]]) {
        await Doc.create({ notUnique: "a", compound1, compound2 }).commit();
      }

      const error = await rejection(Doc.create({ notUnique: "a", compound1: 1, compound2: 1 }).commit());
      expect(error instanceof ValidationError && error.messages).toEqual({
        compound1: ["Values of fields [compound1, compound2] must be unique together."],
        compound2: ["Values of fields [compound1, compound2] must be unique together."],
      });
    });

    it("should not conflict with itself on update", async () => {
      const Account = registry.register(
        defineDocument("Account", {
          fields: { email: fields.email({ unique: true }), name: fields.string() },
        })
      );
      const account = Account.create({ email: "marty@example.com" });
      await account.commit();
      account.set("email", "marty@example.com");
      account.set("name", "Marty");
      await expect(account.commit()).resolves.toEqual({ matchedCount: 1, modifiedCount: 1 });

      const other = Account.create({ email: "doc@example.com" });
      await other.commit();
      other.set("email", "marty@example.com");
      const error = await rejection(other.commit());
      expect(error instanceof ValidationError && error.messages).toEqual({ email: ["Field value must be unique."] });
    });
  });

  describe("embedded documents", () => {
    function library(target: DocumentRegistry) {
      const Author = target.register(defineEmbedded("Author", { fields: { name: fields.string({ attribute: "an" }) } }));
      const Chapter = target.register(
        defineEmbedded("Chapter", { fields: { name: fields.string({ attribute: "cn", required: true }) } })
      );
      const Book = target.register(
        defineDocument("Book", {
          fields: {
            title: fields.string({ attribute: "t" }),
            author: fields.embedded(Author, { attribute: "a" }),
            chapters: fields.list(fields.embedded(Chapter), { attribute: "c" }),
          },
        })
      );
      return { Author, Chapter, Book };
    }

    it("should search through embedded paths", async () => {
      const { Book } = library(registry);
      await Book.create({
        title: "The Hobbit",
        author: { name: "JRR Tolkien" },
        chapters: [{ name: "An Unexpected Party" }, { name: "Roast Mutton" }, { name: "A Short Rest" }],
      }).commit();
      await Book.create({
        title: "A Wizard of Earthsea",
        author: { name: "Ursula K. Le Guin" },
        chapters: [{ name: "Warriors in the Mist" }, { name: "The Shadow" }],
      }).commit();
      await Book.create({
        title: "Dune",
        author: { name: "Frank Herbert" },
        chapters: [{ name: "Book One" }],
      }).commit();

      expect(await Book.find({ title: "The Hobbit" })).toHaveLength(1);
      expect(await Book.find({ "author.name": { $in: ["Frank Herbert", "JRR Tolkien"] } })).toHaveLength(2);
      expect(await Book.find({ $and: [{ "chapters.name": "Roast Mutton" }, { title: "The Hobbit" }] })).toHaveLength(1);
      expect(await Book.find({ "chapters.name": { $all: ["Roast Mutton", "A Short Rest"] } })).toHaveLength(1);
    });

    it("should store embedded documents under their attributes", async () => {
      const { Book } = library(registry);
      const book = Book.create({ title: "Dune", author: { name: "Frank Herbert" }, chapters: [{ name: "Book One" }] });
      await book.commit();
      const [raw] = await driver.find("book", {});
      expect(raw).toEqual({ _id: book.id, t: "Dune", a: { an: "Frank Herbert" }, c: [{ cn: "Book One" }] });
    });

    it("should track in-place changes of embedded documents", async () => {
      const { Book } = library(registry);
      const book = Book.create({ title: "Dune", author: { name: "F. Herbert" } });
      await book.commit();

      book.get("author")?.set("name", "Frank Herbert");
      expect(book.dirtyFields()).toEqual(["author"]);
      expect(book.toPayload(true)).toEqual({ $set: { a: { an: "Frank Herbert" } } });
    });

    it("should nest embedded messages under the parent field", () => {
      const { Book } = library(registry);
      const book = Book.create({ title: "Dune", chapters: [{ name: "Book One" }, {}] });
      let error: unknown;
      try {
        book.validate();
      } catch (err) {
        error = err;
      }
      expect(error instanceof ValidationError && error.messages).toEqual({
        chapters: { "1": { name: ["Missing data for required field."] } },
      });
    });

    it("should reject unknown embedded fields on create", () => {
      const { Book } = library(registry);
      expect(() => Book.create({ title: "Dune", author: { name: "Frank Herbert", ...{ pseudonym: "x" } } })).toThrow(ValidationError);
    });
  });

  describe("hooks", () => {
    it("should call hooks around each write", async () => {
      const callbacks: unknown[][] = [];
      const Person = registry.register(
        defineDocument("Person", {
          fields: { name: fields.string(), age: fields.int() },
          hooks: {
            preInsert: (_doc, payload: WireDocument) => {
              callbacks.push(["preInsert", payload]);
            },
            postInsert: (_doc, result, payload) => {
              callbacks.push(["postInsert", result, payload]);
            },
            preUpdate: (_doc, query: Filter, payload: UpdatePayload) => {
              callbacks.push(["preUpdate", { ...query }, payload]);
            },
            postUpdate: (_doc, result, payload) => {
              callbacks.push(["postUpdate", result, payload]);
            },
            preDelete: () => {
              callbacks.push(["preDelete"]);
            },
            postDelete: (_doc, result) => {
              callbacks.push(["postDelete", result]);
            },
          },
        })
      );

      const p = Person.create({ name: "John", age: 20 });
      await p.commit();
      expect(callbacks).toEqual([
        ["preInsert", { _id: "id-1", name: "John", age: 20 }],
        ["postInsert", { insertedId: "id-1" }, { _id: "id-1", name: "John", age: 20 }],
      ]);

      callbacks.length = 0;
      p.set("age", 22);
      await p.commit();
      expect(callbacks).toEqual([
        ["preUpdate", { _id: "id-1" }, { $set: { age: 22 } }],
        ["postUpdate", { matchedCount: 1, modifiedCount: 1 }, { $set: { age: 22 } }],
      ]);

      callbacks.length = 0;
      await p.delete();
      expect(callbacks).toEqual([["preDelete"], ["postDelete", { deletedCount: 1 }]]);
    });

    it("should await async hooks before moving on", async () => {
      const events: string[] = [];
      const Person = registry.register(
        defineDocument("Person", {
          fields: { name: fields.string() },
          hooks: {
            preInsert: async () => {
              events.push("start preInsert");
              await Promise.resolve();
              events.push("end preInsert");
            },
            postInsert: async () => {
              events.push("start postInsert");
              await Promise.resolve();
              events.push("end postInsert");
            },
          },
        })
      );

      await Person.create({ name: "John" }).commit();
      expect(events).toEqual(["start preInsert", "end preInsert", "start postInsert", "end postInsert"]);
    });

    it("should merge extra conditions from preUpdate", async () => {
      const Versioned = registry.register(
        defineDocument("Versioned", {
          fields: { name: fields.string(), version: fields.int() },
          hooks: {
            preUpdate: () => ({ version: 1 }),
          },
        })
      );
      const doc = Versioned.create({ name: "a", version: 2 });
      await doc.commit();
      doc.set("name", "b");
      await expect(doc.commit()).rejects.toThrow(UpdateError);
    });

    it("should leave the document untouched when a hook fails", async () => {
      const Fragile = registry.register(
        defineDocument("Fragile", {
          fields: { name: fields.string() },
          hooks: {
            preInsert: () => {
              throw new Error("refused");
            },
          },
        })
      );
      const doc = Fragile.create({ name: "a" });
      await expect(doc.commit()).rejects.toThrow("refused");
      expect(doc.status).toBe("transient");
      expect(doc.id).toBeUndefined();
      expect(await Fragile.count()).toBe(0);
    });
  });
});
