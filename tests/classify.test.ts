import test from "node:test";
import assert from "node:assert/strict";
import {
  classifyIntent,
  classifyTopic,
  extractEntities,
  extractSubtags,
  memoryFlagAndPriority,
  normalizeRole,
} from "../src/classify.js";

test("classifyIntent takes the first matching rule", () => {
  assert.equal(classifyIntent("What is this?"), "question");
  assert.equal(classifyIntent("Can you help me"), "request");
  assert.equal(classifyIntent("I want to remember this"), "meta");
  assert.equal(classifyIntent("Let's design the pipeline"), "design");
  assert.equal(classifyIntent("We should decide now"), "decision");
  assert.equal(classifyIntent("Nice weather"), "brainstorm");
});

test("space history wins over generic history", () => {
  assert.equal(classifyTopic("Apollo program history"), "Space history");
  assert.equal(classifyTopic("The history of Malta"), "History threads");
});

test("classifyTopic falls back to Misc", () => {
  assert.equal(classifyTopic("How do I export my Copilot chats"), "Copilot history");
  assert.equal(classifyTopic("random chatter"), "Misc");
});

test("extractSubtags unions matching groups and sorts them", () => {
  assert.deepEqual(extractSubtags("Export Copilot to csv and check privacy dashboard"), [
    "csv",
    "export",
    "privacy-dashboard",
  ]);
});

test("extractSubtags caps in rule order before sorting", () => {
  assert.deepEqual(extractSubtags("patience and termux rooted", 3), ["cooperation", "openness", "patience"]);
});

test("extractEntities returns a sorted union", () => {
  assert.deepEqual(extractEntities("Termux vs SafetyNet"), ["Play Integrity API", "Termux"]);
});

test("normalizeRole maps assistant labels", () => {
  assert.equal(normalizeRole("AI"), "assistant");
  assert.equal(normalizeRole(" Copilot "), "assistant");
  assert.equal(normalizeRole("Jane"), "user");
  assert.equal(normalizeRole(""), "user");
});

test("memoryFlagAndPriority favours user anchors, then operational topics", () => {
  assert.deepEqual(memoryFlagAndPriority("Memory feature", "user"), { memoryCandidate: true, priority: 1 });
  assert.deepEqual(memoryFlagAndPriority("Memory feature", "assistant"), { memoryCandidate: false, priority: 3 });
  assert.deepEqual(memoryFlagAndPriority("Licensing philosophy", "assistant"), {
    memoryCandidate: true,
    priority: 2,
  });
  assert.deepEqual(memoryFlagAndPriority("Misc", "user"), { memoryCandidate: false, priority: 3 });
});

test("data engineering is tiered as operational but keeps the default priority", () => {
  assert.deepEqual(memoryFlagAndPriority("Data engineering & logging", "user"), {
    memoryCandidate: false,
    priority: 3,
  });
  assert.deepEqual(memoryFlagAndPriority("Android dev & security", "user"), { memoryCandidate: true, priority: 2 });
});

test("classifyTopic matches bare privacy and dashboard mentions and plural shows", () => {
  assert.equal(classifyTopic("Check the privacy settings"), "Copilot history");
  assert.equal(classifyTopic("Where is that dashboard"), "Copilot history");
  assert.equal(classifyTopic("That film shows nothing new"), "Culture & media");
});
