import test from "node:test";
import assert from "node:assert/strict";
import { AuditLog } from "../src/audit.js";
import { AUTO_CATEGORY_DESCRIPTION, CategoryResolver } from "../src/ontology/resolve.js";
import type { OntologyCategory } from "../src/types.js";

function category(label: string): OntologyCategory {
  return { label, description: "", aliases: [], externalRefs: [] };
}

test("resolution order is label, alias, pattern, then auto", () => {
  const audit = new AuditLog();
  const resolver = new CategoryResolver(
    { aliases: { "Space History": "space" }, patterns: { "(": "broken", history: "history" } },
    audit,
  );
  const categories: Record<string, OntologyCategory> = { history: category("History threads") };

  assert.deepEqual(resolver.resolve("history threads", categories), { slug: "history", rule: "label-match" });
  assert.deepEqual(resolver.resolve("Space history", categories), { slug: "space", rule: "alias-match" });
  assert.deepEqual(resolver.resolve("Roman history", categories), { slug: "history", rule: "regex:history" });
  assert.deepEqual(resolver.resolve("Dishwasher tips", categories), {
    slug: "auto-dishwasher-tips",
    rule: "auto",
  });

  assert.deepEqual(categories.space, {
    label: "Space",
    description: "Referenced by a seed alias; pending curation.",
    aliases: [],
    externalRefs: [],
  });
  assert.deepEqual(categories["auto-dishwasher-tips"], {
    label: "Dishwasher tips",
    description: AUTO_CATEGORY_DESCRIPTION,
    aliases: [],
    externalRefs: [],
  });

  const notes = audit.entries("ontology");
  assert.equal(notes.length, 1);
  assert.match(notes[0]?.message ?? "", /skipped invalid regex in seed pattern for "broken"/);
});

test("auto categories for carved topics are title-cased", () => {
  const resolver = new CategoryResolver({ aliases: {}, patterns: {} }, new AuditLog());
  const categories: Record<string, OntologyCategory> = {};
  assert.deepEqual(resolver.resolve("Auto: bloom", categories), { slug: "auto-auto-bloom", rule: "auto" });
  assert.equal(categories["auto-auto-bloom"]?.label, "Auto: Bloom");
});

test("resolution is deterministic for repeated topics", () => {
  const resolver = new CategoryResolver({ aliases: {}, patterns: {} }, new AuditLog());
  const categories: Record<string, OntologyCategory> = {};
  const first = resolver.resolve("Space history", categories);
  const second = resolver.resolve("Space history", categories);
  assert.equal(first.slug, second.slug);
  assert.equal(Object.keys(categories).length, 1);
});
