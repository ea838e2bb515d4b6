/**
 * Basic Usage Example
 *
 * Declares two record types, creates records through the lifecycle and queries the store.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { defineRecordType, elements, field, openRecordKit, AlreadyExistsError } from "@recordkit/sdk";

const TeamType = defineRecordType({
  name: "TeamModel",
  directive: "teams",
  keyFields: ["code"],
  errorOnDuplicate: true,
  fields: {
    code: field.string({ pattern: "^[A-Z]{3}$" }),
    title: field.string(),
  },
});

const MemberType = defineRecordType({
  name: "MemberModel",
  directive: "members",
  keyFields: ["team", "handle"],
  fields: {
    handle: field.string({ format: "identifier" }),
    team: field.ref(TeamType),
    skills: field.oneToMany(elements.string),
    settings: field.map(),
  },
});

function main(): void {
  const kit = openRecordKit({ types: [TeamType, MemberType] });

  // CREATE: records are validated, made hashable and saved in key order
  console.log("✏️  Creating teams...");
  const ops = kit.create(TeamType, { code: "OPS", title: "Operations" });
  const dev = kit.create(TeamType, { code: "DEV", title: "Development" });
  console.log(`✅ ${kit.getAll(TeamType).map((team) => team.values.code).join(", ")}`);

  console.log("\n✏️  Creating members...");
  kit.createFromLoadedData(MemberType, [
    { handle: "kim", team: ops, skills: ["linux", "dns"], settings: { shell: "zsh" } },
    { handle: "lee", team: dev, skills: ["typescript"] },
    { handle: "ada", team: dev, skills: ["typescript", "sql"], settings: { editor: { theme: "dark" } } },
  ]);

  // Saving an equal record again is a no-op for types that allow duplicates
  kit.create(MemberType, { handle: "lee", team: dev, skills: ["typescript"] });
  console.log(`✅ ${kit.store.count(MemberType)} members`);

  // QUERY: exact-match predicates, results sorted by key
  console.log("\n🔍 Members of DEV:");
  for (const member of kit.filter(MemberType, { team: dev })) {
    console.log(`   ${member.values.handle}: ${member.values.skills.items.join(", ")}`);
  }

  const kim = kit.get(MemberType, { handle: "kim" });
  console.log(`\n📖 ${kim.toString()}`);
  console.log(`   shell = ${String(kim.values.settings.get("shell"))}`);

  // Duplicates of a type declared errorOnDuplicate are refused
  try {
    kit.create(TeamType, { code: "OPS", title: "Operations" });
  } catch (err) {
    if (!(err instanceof AlreadyExistsError)) {
      throw err;
    }
    console.log(`\n⚠️  ${err.message}`);
  }

  // EXPORT: plain nested data, in store order
  console.log("\n📦 Export:");
  console.log(kit.dump("yaml"));
}

main();
