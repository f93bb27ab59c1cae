import { describe, it, expect } from "vitest";
import type { MemoryDriver } from "@docmap/sdk";
import { createClassroomModel, createMemoryRegistry, sequentialIds, withMemoryRegistry } from "../src/index.js";

describe("withMemoryRegistry", () => {
  it("should drop the collections of registered types afterwards", async () => {
    let captured: MemoryDriver | undefined;
    const result = await withMemoryRegistry(async (registry, driver) => {
      captured = driver;
      const { Teacher } = createClassroomModel(registry);
      await Teacher.create({ name: "Strickland" }).commit();
      expect(await driver.count("teacher", {})).toBe(1);
      return "done";
    });

    expect(result).toBe("done");
    expect(await captured?.count("teacher", {})).toBe(0);
  });

  it("should propagate errors from the callback", async () => {
    await expect(
      withMemoryRegistry(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
  });
});

describe("createMemoryRegistry", () => {
  it("should bind a memory driver", () => {
    const { registry, driver } = createMemoryRegistry();
    expect(registry.hasDriver).toBe(true);
    expect(registry.driver).toBe(driver);
  });
});

describe("sequentialIds", () => {
  it("should count from one per generator", () => {
    const ids = sequentialIds("t");
    expect([ids(), ids(), ids()]).toEqual(["t-1", "t-2", "t-3"]);
    expect(sequentialIds()()).toBe("id-1");
  });
});
