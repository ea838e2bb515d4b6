/**
 * Sample "shop" record types: products, and customers interested in product categories
 *
 * Also loadable as a models module (RECORDKIT_MODELS_MODULES / --models).
 */

import { defineRecordType, field } from "@recordkit/sdk";

export const ProductType = defineRecordType({
  name: "ProductModel",
  directive: "products",
  keyFields: ["prod_id"],
  errorOnDuplicate: true,
  fields: {
    prod_id: field.string(),
    name: field.string(),
    category: field.string(),
  },
});

export const CustomerType = defineRecordType({
  name: "CustomerModel",
  directive: "customers",
  keyFields: ["email"],
  errorOnDuplicate: true,
  fields: {
    name: field.string(),
    age: field.integer({ minimum: 18, maximum: 100 }),
    send_ads: field.boolean({ default: false }),
    email: field.string({ format: "email" }),
    flagged_interests: field.oneToMany(ProductType),
  },
  // Interest categories resolve to every stored product of that category
  prepare(raw, { store }) {
    const categories = raw["flagged_interests"];
    if (!Array.isArray(categories)) {
      return raw;
    }
    const interests = categories.flatMap((category: unknown) => [...store.filter(ProductType, { category })]);
    return { ...raw, flagged_interests: interests };
  },
});

/**
 * A directive mapping with one product per category and customers referring to them
 */
export function shopData(): Record<string, unknown> {
  return {
    products: [
      { prod_id: "P2", name: "Hammer", category: "tools" },
      { prod_id: "P1", name: "Widget", category: "tools" },
      { prod_id: "P3", name: "Novel", category: "books" },
    ],
    customers: [
      { name: "Ann", age: 30, email: "ann@example.com", flagged_interests: ["tools"] },
      { name: "Bob", age: 41, send_ads: true, email: "bob@example.com", flagged_interests: ["books", "tools"] },
    ],
  };
}
