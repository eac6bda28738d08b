import test from "node:test";
import assert from "node:assert/strict";
import { applyPromotions, proposePromotions } from "../src/promotion.js";
import type { MemoryTiers, Ontology, PromotionProposal, TierEntry } from "../src/types.js";
import { makeEntry, makeRecord } from "./fixtures.js";

const ontology: Ontology = {
  values: [
    { id: "T0:a", label: "open cooperation wins", tier: 0 },
    { id: "T1:b", label: "cooperation patience wins", tier: 1 },
  ],
  categories: {},
  map: {},
  valueMap: {},
};

function proposalFor(entry: TierEntry, overrides: Partial<PromotionProposal> = {}): PromotionProposal {
  return {
    excerpt: entry.excerpt,
    provenance: entry.provenance,
    primaryTopic: entry.primaryTopic,
    fromTier: 3,
    toTier: 2,
    reasons: [],
    ...overrides,
  };
}

test("proposePromotions only considers user entries in tier 3", () => {
  const opinion = makeEntry({ primaryTopic: "Security", excerpt: "I think we should rotate keys", provenance: "p1" });
  const valueLinked = makeEntry({ excerpt: "open cooperation wins again", provenance: "p2" });
  const assistant = makeEntry({ excerpt: "You should try it", provenance: "p3", role: "assistant" });
  const frequent = makeEntry({ primaryTopic: "Garden", excerpt: "notes about gardening", provenance: "p4" });
  const plain = makeEntry({ excerpt: "plain remark", provenance: "p5" });

  const records = [
    makeRecord({ primaryTopic: "Security", excerpt: opinion.excerpt }),
    ...Array.from({ length: 5 }, (_, i) => makeRecord({ primaryTopic: "Garden", excerpt: `garden note ${i}` })),
  ];
  const tiers: MemoryTiers = { 0: [], 1: [], 2: [], 3: [opinion, valueLinked, assistant, frequent, plain] };

  assert.deepEqual(proposePromotions(tiers, records, ontology), [
    proposalFor(opinion, { reasons: ["strong-opinion"] }),
    proposalFor(valueLinked, { reasons: ["core-value-link"] }),
    proposalFor(frequent, { reasons: ["frequent-topic"] }),
  ]);
});

test("applyPromotions moves valid proposals and reports every skip", () => {
  const resident = makeEntry({ excerpt: "already here", provenance: "p0" });
  const first = makeEntry({ excerpt: "I think we should rotate keys", provenance: "p1" });
  const second = makeEntry({ excerpt: "open cooperation wins again", provenance: "p2" });
  const untiered = makeEntry({ excerpt: "only a record", provenance: "p7" });
  const tiers: MemoryTiers = { 0: [], 1: [], 2: [resident], 3: [first, second] };
  const records = [resident, first, second, untiered].map((e) =>
    makeRecord({ excerpt: e.excerpt, provenanceId: e.provenance }),
  );

  const proposals = [
    proposalFor(first),
    proposalFor(first),
    proposalFor(second, { fromTier: 2, toTier: 1 }),
    proposalFor(makeEntry({ excerpt: "gone", provenance: "p9" })),
    proposalFor(resident),
    proposalFor(second, { provenance: "other" }),
    proposalFor(untiered),
  ];
  const outcome = applyPromotions(tiers, proposals, records);

  assert.deepEqual(outcome.applied, [proposals[0]]);
  assert.deepEqual(outcome.skipped.map((s) => s.reason), [
    "already-at-destination",
    "invalid-transition",
    "stale",
    "already-at-destination",
    "stale",
    "missing-from-source-tier",
  ]);
  assert.deepEqual(outcome.tiers[2], [resident, first]);
  assert.deepEqual(outcome.tiers[3], [second]);
  assert.deepEqual(tiers[3], [first, second]);
});

test("applyPromotions treats a proposal whose provenance left the records as stale", () => {
  const old = makeEntry({ excerpt: "I think X", provenance: "old | t1" });
  const tiers: MemoryTiers = { 0: [], 1: [], 2: [], 3: [old] };
  const records = [makeRecord({ excerpt: "I think X", provenanceId: "new | t2" })];

  const proposal = proposalFor(old);
  const outcome = applyPromotions(tiers, [proposal], records);

  assert.deepEqual(outcome.applied, []);
  assert.deepEqual(outcome.skipped, [{ proposal, reason: "stale" }]);
  assert.deepEqual(outcome.tiers[2], []);
  assert.deepEqual(outcome.tiers[3], [old]);
});
