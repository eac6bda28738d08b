import test from "node:test";
import assert from "node:assert/strict";
import { dedupeRecords } from "../src/dedupe.js";
import { makeRecord } from "./fixtures.js";

test("duplicates merge provenance, tags, entities, priority and flag", () => {
  const a = makeRecord({
    excerpt: "same words",
    provenanceId: "A | t1",
    subtopicTags: ["export"],
    entities: [],
    priority: 3,
    memoryCandidate: false,
  });
  const b = makeRecord({
    excerpt: "same words",
    provenanceId: "B | t2",
    subtopicTags: ["csv"],
    entities: ["Termux"],
    priority: 2,
    memoryCandidate: true,
  });
  const [merged, ...rest] = dedupeRecords([a, b]);
  assert.equal(rest.length, 0);
  assert.deepEqual(merged, {
    ...a,
    provenanceId: "A | t1 || B | t2",
    subtopicTags: ["csv", "export"],
    entities: ["Termux"],
    priority: 2,
    memoryCandidate: true,
  });
});

test("the same excerpt from different roles is kept apart", () => {
  const out = dedupeRecords([
    makeRecord({ excerpt: "hello", role: "user" }),
    makeRecord({ excerpt: "hello", role: "assistant" }),
  ]);
  assert.equal(out.length, 2);
});

test("canonical record keeps its first position", () => {
  const out = dedupeRecords([
    makeRecord({ excerpt: "x", provenanceId: "1" }),
    makeRecord({ excerpt: "y", provenanceId: "2" }),
    makeRecord({ excerpt: "x", provenanceId: "3" }),
  ]);
  assert.deepEqual(
    out.map((r) => r.provenanceId),
    ["1 || 3", "2"],
  );
});

test("dedupe is idempotent and does not mutate its input", () => {
  const input = [
    makeRecord({ excerpt: "x", provenanceId: "1" }),
    makeRecord({ excerpt: "x", provenanceId: "2" }),
  ];
  const once = dedupeRecords(input);
  assert.deepEqual(dedupeRecords(once), once);
  assert.equal(input[0]?.provenanceId, "1");
});
