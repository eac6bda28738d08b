import type { EngineConfig, MemoryRecord, TierEntry } from "../src/types.js";
import { parseConfig } from "../src/config.js";

export function makeRecord(overrides: Partial<MemoryRecord> = {}): MemoryRecord {
  return {
    timestamp: "2024-01-01T00:00:00Z",
    threadId: "thread",
    role: "user",
    intent: "brainstorm",
    primaryTopic: "Misc",
    subtopicTags: [],
    entities: [],
    excerpt: "placeholder excerpt",
    memoryCandidate: false,
    priority: 3,
    provenanceId: "thread | 2024-01-01T00:00:00Z",
    evolutionLink: "",
    ...overrides,
  };
}

export function makeEntry(overrides: Partial<TierEntry> = {}): TierEntry {
  return {
    primaryTopic: "Misc",
    coreBelief: "Mixed factual clarifications across topics.",
    excerpt: "placeholder excerpt",
    provenance: "thread | 2024-01-01T00:00:00Z",
    priority: 3,
    role: "user",
    ...overrides,
  };
}

export function testConfig(overrides: Record<string, unknown> = {}): EngineConfig {
  return parseConfig({ outDir: "/tmp/memory-tiers-test-out", stateDir: "/tmp/memory-tiers-test-state", ...overrides });
}
