/**
 * Inheritance Example
 *
 * Several document types sharing one collection. Reads through a parent
 * type return instances of the concrete subtypes.
 * Run with: npx tsx examples/polymorphism.ts
 */

import { createMemoryDriver, createRegistry, defineDocument, fields } from "@docmap/sdk";

async function main() {
  const registry = createRegistry({ driver: createMemoryDriver(), logLevel: "warn" });

  const Vehicle = registry.register(
    defineDocument("Vehicle", {
      allowInheritance: true,
      fields: { plate: fields.string({ required: true, unique: true }) },
    })
  );
  const Car = registry.register(
    defineDocument("Car", { extends: Vehicle, fields: { seats: fields.int() } })
  );
  const Truck = registry.register(
    defineDocument("Truck", { extends: Vehicle, fields: { payload: fields.number() } })
  );

  console.log("📋 Indexes:", (await registry.ensureIndexes()).vehicle);

  await Car.create({ plate: "OUTATIME", seats: 2 }).commit();
  await Truck.create({ plate: "HV-4X4", payload: 1.5 }).commit();

  for (const vehicle of await Vehicle.find()) {
    console.log(`🚗 ${vehicle.typeName}`, vehicle.toPlain());
  }

  // Subtype fields can be queried through the parent
  const heavy = await Vehicle.findOne({ payload: { $gte: 1 } });
  console.log(`\n🔎 Heavy vehicle is a Truck: ${Truck.isInstance(heavy)}`);
  console.log(`   Cars: ${await Car.count()}, vehicles: ${await Vehicle.count()}`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
