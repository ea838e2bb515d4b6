/**
 * Ingestion Example
 *
 * Loads a directive mapping from a YAML file, queries it and renders records through templates.
 * Run with: npx tsx examples/shop-ingest.ts
 */

import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { defineRecordType, field, openRecordKit } from "@recordkit/sdk";

const ProductType = defineRecordType({
  name: "ProductModel",
  directive: "products",
  keyFields: ["prod_id"],
  fields: {
    prod_id: field.string(),
    name: field.string(),
    category: field.string(),
  },
});

const CustomerType = defineRecordType({
  name: "CustomerModel",
  directive: "customers",
  keyFields: ["email"],
  fields: {
    name: field.string(),
    age: field.integer({ minimum: 18 }),
    email: field.string({ format: "email" }),
    flagged_interests: field.oneToMany(ProductType),
  },
  // Categories in the data become the stored products of that category
  prepare(raw, { store }) {
    const categories = raw["flagged_interests"];
    if (!Array.isArray(categories)) {
      return raw;
    }
    return {
      ...raw,
      flagged_interests: categories.flatMap((category: unknown) => [...store.filter(ProductType, { category })]),
    };
  },
});

const SHOP = `products:
  - { prod_id: P1, name: Widget, category: tools }
  - { prod_id: P2, name: Hammer, category: tools }
  - { prod_id: P3, name: Novel, category: books }
customers:
  - { name: Ann, age: 30, email: ann@example.com, flagged_interests: [tools] }
  - { name: Bob, age: 41, email: bob@example.com, flagged_interests: [books, tools] }
`;

async function main(): Promise<void> {
  const dataDir = "./examples-data/shop";
  await rm(dataDir, { recursive: true, force: true });
  await mkdir(join(dataDir, "templates"), { recursive: true });
  await writeFile(join(dataDir, "shop.yaml"), SHOP);
  await writeFile(
    join(dataDir, "templates", "customer.j2"),
    "Dear {{ name }}, new in {% for p in flagged_interests %}{{ p.category }}: {{ p.name }}; {% endfor %}\n"
  );

  const kit = openRecordKit({
    types: [ProductType, CustomerType],
    templatesDir: join(dataDir, "templates"),
  });

  console.log("📂 Ingesting shop.yaml...");
  const created = await kit.ingestFile(join(dataDir, "shop.yaml"));
  console.log(`✅ Created ${created.length} records`);

  console.log("\n🔍 Tools:");
  for (const product of kit.filter(ProductType, { category: "tools" })) {
    console.log(`   ${product.values.prod_id} ${product.values.name}`);
  }

  console.log("\n✉️  Rendered:");
  for (const customer of kit.getAll(CustomerType)) {
    process.stdout.write(kit.render(customer));
  }

  // Conversion between formats goes through the same codecs
  const toml = await kit.codecs.convertFile(join(dataDir, "shop.yaml"), "toml");
  console.log(`\n📄 shop.toml:\n${toml}`);

  await rm(dataDir, { recursive: true, force: true });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
