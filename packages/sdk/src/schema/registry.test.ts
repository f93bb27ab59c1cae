import { describe, it, expect } from "vitest";
import { parseRegistryOptions } from "../config.js";
import { createMemoryDriver } from "../drivers/memory.js";
import {
  DocumentDefinitionError,
  NoDriverDefinedError,
  NotRegisteredError,
  UsageError,
} from "../errors.js";
import * as fields from "../fields/index.js";
import { collectionName, createRegistry } from "./registry.js";
import { defineDocument, defineEmbedded } from "./template.js";

describe("collectionName", () => {
  it("should snake_case type names", () => {
    expect(collectionName("SimpleIndexDoc")).toBe("simple_index_doc");
    expect(collectionName("Student")).toBe("student");
    expect(collectionName("HTTPRequest")).toBe("http_request");
  });
});

describe("createRegistry", () => {
  it("should reject invalid options", () => {
    expect(() => createRegistry({ defaultBatchSize: 0 })).toThrow(UsageError);
    expect(() => createRegistry({ defaultBatchSize: 0 })).toThrow(/defaultBatchSize/);
  });

  it("should reject a driver that does not implement the contract", () => {
    expect(() => parseRegistryOptions({ driver: {} })).toThrow(
      "Invalid registry options: driver: driver must implement the StoreDriver contract"
    );
  });

  it("should require a driver before store access", () => {
    const registry = createRegistry();
    expect(registry.hasDriver).toBe(false);
    expect(() => registry.driver).toThrow(NoDriverDefinedError);

    const driver = createMemoryDriver();
    registry.init(driver);
    expect(registry.hasDriver).toBe(true);
    expect(registry.driver).toBe(driver);
  });
});

describe("register", () => {
  it("should build a schema with the declared fields in order", () => {
    const registry = createRegistry();
    const Student = registry.register(
      defineDocument("Student", {
        fields: {
          name: fields.string({ required: true }),
          birthday: fields.date({ attribute: "b" }),
        },
      })
    );

    expect(Student.name).toBe("Student");
    expect(Student.collection).toBe("student");
    expect(Student.schema.names).toEqual(["name", "birthday"]);
    expect(Student.schema.translatePath("birthday")).toBe("b");
    expect(Student.polymorphic).toBe(false);
    expect(registry.resolve("Student")).toBe(Student);
    expect(registry.list()).toEqual(["Student"]);
  });

  it("should honour an explicit collection", () => {
    const registry = createRegistry();
    const Doc = registry.register(defineDocument("Doc", { collection: "docs", fields: {} }));
    expect(Doc.collection).toBe("docs");
  });

  it("should reject duplicate names across document and embedded types", () => {
    const registry = createRegistry();
    registry.register(defineEmbedded("Address", { fields: { city: fields.string() } }));
    expect(() => registry.register(defineDocument("Address", { fields: {} }))).toThrow(DocumentDefinitionError);
  });

  it("should reject the reserved name id and reserved attributes", () => {
    const registry = createRegistry();
    expect(() => registry.register(defineDocument("A", { fields: { id: fields.string() } }))).toThrow(
      '"id" is reserved'
    );
    expect(() =>
      registry.register(defineDocument("B", { fields: { cls: fields.string({ attribute: "_cls" }) } }))
    ).toThrow('attribute "_cls" is reserved');
  });

  it("should reject fields sharing an attribute", () => {
    const registry = createRegistry();
    expect(() =>
      registry.register(
        defineDocument("C", { fields: { a: fields.string(), b: fields.string({ attribute: "a" }) } })
      )
    ).toThrow('fields "a" and "b" share the attribute "a"');
  });

  it("should reject unique fields that cannot be unique", () => {
    const registry = createRegistry();
    expect(() =>
      registry.register(defineDocument("D", { fields: { tags: fields.list(fields.string(), { unique: true }) } }))
    ).toThrow("list fields cannot be unique");
    expect(() =>
      registry.register(defineDocument("E", { fields: { code: fields.string({ unique: true, default: "x" }) } }))
    ).toThrow("a unique field cannot have a constant default");
  });

  it("should reject indexes on unknown fields", () => {
    const registry = createRegistry();
    expect(() =>
      registry.register(defineDocument("F", { fields: { a: fields.string() }, indexes: ["missing"] }))
    ).toThrow('index on unknown field "missing"');
    expect(registry.has("F")).toBe(false);
  });

  it("should report unknown types", () => {
    const registry = createRegistry();
    expect(() => registry.resolve("Nope")).toThrow(NotRegisteredError);
    expect(() => registry.resolveEmbedded("Nope")).toThrow(NotRegisteredError);
  });
});

describe("inheritance", () => {
  it("should merge parent fields and collection", () => {
    const registry = createRegistry();
    const Parent = registry.register(
      defineDocument("Parent", { allowInheritance: true, fields: { last: fields.string() } })
    );
    const Child = registry.register(
      defineDocument("Child", { extends: Parent, fields: { first: fields.string() } })
    );

    expect(Child.collection).toBe("parent");
    expect(Child.schema.names).toEqual(["last", "first"]);
    expect(Child.parent).toBe(Parent);
    expect(Child.polymorphic).toBe(true);
    expect(Child.isSubtypeOf(Parent)).toBe(true);
    expect(Parent.isSubtypeOf(Child)).toBe(false);
    expect(Parent.descendants()).toEqual(["Parent", "Child"]);
  });

  it("should refuse parents that do not allow inheritance", () => {
    const registry = createRegistry();
    const Closed = registry.register(defineDocument("Closed", { fields: {} }));
    expect(() => registry.register(defineDocument("Sub", { extends: Closed, fields: {} }))).toThrow(
      "Closed does not allow inheritance"
    );
  });

  it("should not pass allowInheritance on to children", () => {
    const registry = createRegistry();
    const Root = registry.register(defineDocument("Root", { allowInheritance: true, fields: {} }));
    const Mid = registry.register(defineDocument("Mid", { extends: Root, fields: {} }));
    expect(() => registry.register(defineDocument("Leaf", { extends: Mid, fields: {} }))).toThrow(
      "Mid does not allow inheritance"
    );
  });

  it("should refuse parents registered elsewhere", () => {
    const other = createRegistry();
    const Foreign = other.register(defineDocument("Foreign", { allowInheritance: true, fields: {} }));
    const registry = createRegistry();
    expect(() => registry.register(defineDocument("Local", { extends: Foreign, fields: {} }))).toThrow(
      "parent Foreign is not registered in this registry"
    );
  });

  it("should refuse a child collection different from the parent's", () => {
    const registry = createRegistry();
    const Base = registry.register(defineDocument("Base", { allowInheritance: true, fields: {} }));
    expect(() =>
      registry.register(defineDocument("Moved", { extends: Base, collection: "elsewhere", fields: {} }))
    ).toThrow(DocumentDefinitionError);
  });

  it("should refuse incompatible redeclarations", () => {
    const registry = createRegistry();
    const Base = registry.register(
      defineDocument("Base", { allowInheritance: true, fields: { age: fields.int() } })
    );
    expect(() =>
      registry.register(defineDocument("Sub", { extends: Base, fields: { age: fields.string() } }))
    ).toThrow("Sub.age: redeclared as string, inherited as int");
  });

  it("should refuse a redeclaration under another attribute", () => {
    const registry = createRegistry();
    const Base = registry.register(
      defineDocument("Base", { allowInheritance: true, fields: { pf: fields.int() } })
    );
    expect(() =>
      registry.register(defineDocument("Sub", { extends: Base, fields: { pf: fields.int({ attribute: "p" }) } }))
    ).toThrow('Sub.pf: redeclared with attribute "p", inherited as "pf"');
    expect(registry.has("Sub")).toBe(false);

    const Same = registry.register(
      defineDocument("Same", { extends: Base, fields: { pf: fields.int({ required: true }) } })
    );
    expect(Same.schema.translatePath("pf")).toBe("pf");
  });
});
