import { describe, it, expect } from "vitest";
import { ValidationError } from "../errors.js";
import type { IoContext } from "../fields/field.js";
import * as fields from "../fields/index.js";
import { Schema } from "../schema/schema.js";
import { length } from "../validators.js";
import { assertValid, mergeMessages, validateIo, validateStructure } from "./engine.js";

const context: IoContext = {
  resolver: {
    resolve(name) {
      throw new Error(`unexpected lookup of ${name}`);
    },
  },
};

function gate(): { promise: Promise<void>; open: () => void } {
  let open = () => {};
  const promise = new Promise<void>((resolve) => {
    open = () => resolve();
  });
  return { promise, open };
}

function source(values: Record<string, unknown>) {
  return (name: string) => values[name];
}

describe("validateStructure", () => {
  it("should check every field and report each failure", () => {
    const schema = new Schema(
      "Student",
      {
        name: fields.string({ required: true }),
        age: fields.int(),
        nick: fields.string({ validate: length({ max: 3 }) }),
      },
      context.resolver
    );

    expect(validateStructure(schema, source({ age: "old", nick: "Marty" }), schema.names)).toEqual({
      name: ["Missing data for required field."],
      age: ["Not a valid integer."],
      nick: ["Longer than maximum length 3."],
    });
  });

  it("should only check the given names", () => {
    const schema = new Schema("Student", { name: fields.string({ required: true }), age: fields.int() }, context.resolver);
    expect(validateStructure(schema, source({ age: 3 }), ["age"])).toEqual({});
  });
});

describe("validateIo", () => {
  it("should run chains sequentially per field and concurrently across fields", async () => {
    const called: number[] = [];
    const first = gate();
    const second = gate();
    const third = gate();

    const schema = new Schema(
      "IOStudent",
      {
        ioField1: fields.string({
          ioValidate: [
            async () => {
              called.push(1);
              first.open();
              await second.promise;
              called.push(3);
            },
            async () => {
              await third.promise;
              called.push(5);
            },
          ],
        }),
        ioField2: fields.string({
          ioValidate: [
            async () => {
              await first.promise;
              called.push(2);
              second.open();
            },
            () => {
              called.push(4);
              third.open();
            },
          ],
        }),
      },
      context.resolver
    );

    const errors = await validateIo(schema, source({ ioField1: "io1", ioField2: "io2" }), schema.names, context);
    expect(errors).toEqual({});
    expect(called).toEqual([1, 2, 3, 4, 5]);
  });

  it("should stop a chain at its first failure", async () => {
    const called: string[] = [];
    const schema = new Schema(
      "IOStudent",
      {
        ioField: fields.string({
          ioValidate: [
            () => {
              throw new ValidationError("Ho boys !");
            },
            () => {
              called.push("second");
            },
          ],
        }),
      },
      context.resolver
    );

    expect(await validateIo(schema, source({ ioField: "io?" }), schema.names, context)).toEqual({
      ioField: ["Ho boys !"],
    });
    expect(called).toEqual([]);
  });

  it("should skip fields that already failed", async () => {
    const called: string[] = [];
    const schema = new Schema(
      "IOStudent",
      {
        ioField: fields.string({
          ioValidate: () => {
            called.push("run");
          },
        }),
      },
      context.resolver
    );

    const skip = { ioField: ["Not a valid string."] };
    expect(await validateIo(schema, source({ ioField: "x" }), schema.names, context, skip)).toEqual({});
    expect(called).toEqual([]);
  });

  it("should skip absent values", async () => {
    const called: string[] = [];
    const schema = new Schema(
      "IOStudent",
      { ioField: fields.string({ ioValidate: () => void called.push("run") }) },
      context.resolver
    );
    await validateIo(schema, source({}), schema.names, context);
    expect(called).toEqual([]);
  });

  it("should propagate unexpected errors once every chain settled", async () => {
    const finished: string[] = [];
    const slow = gate();
    const schema = new Schema(
      "IOStudent",
      {
        broken: fields.string({
          ioValidate: () => {
            throw new TypeError("boom");
          },
        }),
        slow: fields.string({
          ioValidate: async () => {
            await slow.promise;
            finished.push("slow");
          },
        }),
      },
      context.resolver
    );

    const pending = validateIo(schema, source({ broken: "a", slow: "b" }), schema.names, context);
    slow.open();
    await expect(pending).rejects.toThrow("boom");
    expect(finished).toEqual(["slow"]);
  });
});

describe("mergeMessages", () => {
  it("should concatenate messages of the same field", () => {
    expect(mergeMessages({ a: ["one"] }, { a: ["two"], b: ["three"] })).toEqual({
      a: ["one", "two"],
      b: ["three"],
    });
  });

  it("should merge nested trees", () => {
    expect(mergeMessages({ address: { city: ["x"] } }, { address: { zip: ["y"] } })).toEqual({
      address: { city: ["x"], zip: ["y"] },
    });
  });
});

describe("assertValid", () => {
  it("should throw only when there are errors", () => {
    expect(() => assertValid({})).not.toThrow();
    expect(() => assertValid({ a: ["bad"] })).toThrow(ValidationError);
  });
});
