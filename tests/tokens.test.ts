import test from "node:test";
import assert from "node:assert/strict";
import { scoreValueCandidates, slugify, tokenize } from "../src/tokens.js";
import type { OntologyValue } from "../src/types.js";

test("slugify lowercases and hyphenates, with misc for empty input", () => {
  assert.equal(slugify("AI strategy & games"), "ai-strategy-games");
  assert.equal(slugify("  !!! "), "misc");
});

test("tokenize drops short tokens and stop words", () => {
  assert.deepEqual(tokenize("The Memory of an Elephant is huge, X1 ok"), ["memory", "elephant", "huge"]);
});

test("scoreValueCandidates breaks equal scores by value id", () => {
  const values: OntologyValue[] = [
    { id: "T1:b", label: "alpha beta gamma", tier: 1 },
    { id: "T1:a", label: "alpha beta delta", tier: 1 },
    { id: "T1:d", label: "alpha beta", tier: 1 },
    { id: "T1:c", label: "alpha zeta", tier: 1 },
  ];
  assert.deepEqual(scoreValueCandidates(["alpha", "beta", "gamma", "delta"], values), [
    { id: "T1:a", score: 3 },
    { id: "T1:b", score: 3 },
  ]);
});

test("scoreValueCandidates requires at least two shared tokens", () => {
  const values: OntologyValue[] = [{ id: "T0:x", label: "alpha zeta", tier: 0 }];
  assert.deepEqual(scoreValueCandidates(["alpha"], values), []);
});
