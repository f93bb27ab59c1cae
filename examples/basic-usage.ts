/**
 * Basic Usage Example
 *
 * Declares two document types, then walks one document through its
 * lifecycle against the in-memory driver.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { ValidationError, createMemoryDriver, createRegistry, defineDocument, fields, validators } from "@docmap/sdk";

async function main() {
  const registry = createRegistry({ driver: createMemoryDriver(), logLevel: "warn" });

  const Author = registry.register(
    defineDocument("Author", {
      fields: {
        name: fields.string({ required: true }),
        email: fields.email({ unique: true }),
      },
    })
  );

  const Task = registry.register(
    defineDocument("Task", {
      fields: {
        title: fields.string({ required: true, validate: validators.length({ max: 80 }) }),
        status: fields.string({ default: "open", validate: validators.oneOf(["open", "done"]) }),
        priority: fields.int({ validate: validators.range({ min: 1, max: 10 }) }),
        tags: fields.list(fields.string()),
        author: fields.reference(Author),
      },
      indexes: ["status", "-priority"],
    })
  );

  await registry.ensureIndexes();

  // CREATE
  console.log("✏️  Creating documents...");
  const author = Author.create({ name: "Ada", email: "ada@example.com" });
  await author.commit();
  const task = Task.create({ title: "Write the docs", priority: 8, tags: ["docs"], author });
  await task.commit();
  console.log(`✅ Created ${task.toString()}`, task.toPlain());

  // UPDATE: only modified fields are written
  task.set("status", "done");
  task.get("tags")?.push("shipped");
  console.log("\n✏️  Pending update:", task.toPayload(true));
  await task.commit();

  // READ
  const done = await Task.find({ status: "done" }, { sort: { priority: -1 } });
  console.log(`\n📖 ${done.length} task(s) done`);
  const owner = await done[0]?.get("author")?.fetch();
  console.log(`   Author: ${owner?.get("name") ?? "unknown"}`);

  // VALIDATION
  try {
    await Task.create({ title: "", priority: 42 }).commit();
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    console.log("\n❌ Rejected:", err.messages);
  }

  // DELETE
  await task.delete();
  console.log(`\n🗑️  Deleted; ${await Task.count()} task(s) left`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
