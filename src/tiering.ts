/**
 * Tiering Engine
 *
 * Tier 0  fixed foundational statements authored here, independent of records
 * Tier 1  first user record of each anchor topic
 * Tier 2  first user + first assistant record of each operational topic
 * Tier 3  first user + first assistant record of every other topic
 *
 * Membership is assigned once per run. The only later move is an approved
 * 3 -> 2 promotion (see promotion.ts).
 */

import type {
  Clusters,
  MemoryRecord,
  MemoryTiers,
  Synthesis,
  TierEntry,
  TierLevel,
} from "./types.js";
import { ANCHOR_TOPICS, OPERATIONAL_TOPICS } from "./topic-rules.js";
import { classifyIntent } from "./classify.js";
import { parseTimestamp, UNTITLED_THREAD } from "./ingest.js";
import { GENERIC_TEMPLATE } from "./synthesis.js";
import { compareText } from "./tokens.js";

export const TIER_LEVELS: readonly TierLevel[] = [0, 1, 2, 3];

export const SYNTHESIS_PROVENANCE = "Synthesis";

const FOUNDATIONAL_STATEMENTS: ReadonlyArray<{ topic: string; statement: string }> = [
  {
    topic: "AI strategy & games",
    statement: "Strategic triad: openness+consistency+cooperation underpin long-term trust.",
  },
  {
    topic: "Memory feature",
    statement: "Memory hygiene: intentional, auditable, counter-bias by design.",
  },
];

export function emptyTiers(): MemoryTiers {
  return { 0: [], 1: [], 2: [], 3: [] };
}

export function cloneTiers(tiers: MemoryTiers): MemoryTiers {
  return { 0: [...tiers[0]], 1: [...tiers[1]], 2: [...tiers[2]], 3: [...tiers[3]] };
}

export function foundationalEntries(): TierEntry[] {
  return FOUNDATIONAL_STATEMENTS.map(({ topic, statement }): TierEntry => ({
    primaryTopic: topic,
    coreBelief: statement,
    excerpt: statement,
    provenance: SYNTHESIS_PROVENANCE,
    priority: 1,
    role: "system",
  }));
}

function toEntry(record: MemoryRecord, coreBelief: string): TierEntry {
  return {
    primaryTopic: record.primaryTopic,
    coreBelief,
    excerpt: record.excerpt,
    provenance: record.provenanceId,
    priority: record.priority,
    role: record.role,
  };
}

export function tierForTopic(topic: string): Exclude<TierLevel, 0> {
  if (ANCHOR_TOPICS.has(topic)) return 1;
  if (OPERATIONAL_TOPICS.has(topic)) return 2;
  return 3;
}

/**
 * Assign representative records to tiers. Clusters are visited in
 * first-appearance order, so entry order within a tier is stable.
 */
export function assignTiers(clusters: Clusters, syntheses: ReadonlyMap<string, Synthesis>): MemoryTiers {
  const tiers = emptyTiers();
  tiers[0].push(...foundationalEntries());

  for (const [topic, items] of clusters) {
    const belief = syntheses.get(topic)?.coreBelief ?? GENERIC_TEMPLATE.coreBelief;
    const firstUser = items.find((r) => r.role === "user");
    const firstAssistant = items.find((r) => r.role === "assistant");
    const tier = tierForTopic(topic);

    if (tier === 1) {
      if (firstUser) tiers[1].push(toEntry(firstUser, belief));
      continue;
    }
    if (firstUser) tiers[tier].push(toEntry(firstUser, belief));
    if (firstAssistant) tiers[tier].push(toEntry(firstAssistant, belief));
  }
  return tiers;
}

/**
 * Build per-(topic, role) chronologies. Each group is ordered by timestamp
 * (unparsable first) with the excerpt as tie-break, and every record links to
 * the provenance of its predecessor. Input order of the returned array is kept.
 */
export function linkEvolution(records: readonly MemoryRecord[]): MemoryRecord[] {
  const out = records.map((r) => ({ ...r }));
  const groups = new Map<string, MemoryRecord[]>();
  for (const r of out) {
    const key = JSON.stringify([r.primaryTopic, r.role]);
    const group = groups.get(key);
    if (group) {
      group.push(r);
    } else {
      groups.set(key, [r]);
    }
  }

  for (const group of groups.values()) {
    const ordered = [...group].sort((a, b) => {
      const ta = parseTimestamp(a.timestamp) ?? Number.NEGATIVE_INFINITY;
      const tb = parseTimestamp(b.timestamp) ?? Number.NEGATIVE_INFINITY;
      if (ta !== tb) return ta < tb ? -1 : 1;
      return compareText(a.excerpt, b.excerpt);
    });
    let prev: MemoryRecord | undefined;
    for (const r of ordered) {
      r.evolutionLink = prev ? prev.provenanceId : "";
      prev = r;
    }
  }
  return out;
}

/**
 * Refinement pass: fill defaults, force tier-0/1 excerpts into the memory set
 * with priority floored at 1, then rebuild evolution links.
 */
export function refineRecords(records: readonly MemoryRecord[], tiers: MemoryTiers): MemoryRecord[] {
  const coreExcerpts = new Set([...tiers[0], ...tiers[1]].map((e) => e.excerpt));
  const refined = records.map((r) => {
    const next = { ...r };
    if (!next.threadId) next.threadId = UNTITLED_THREAD;
    if (!next.intent) next.intent = classifyIntent(next.excerpt);
    if (coreExcerpts.has(next.excerpt)) {
      next.memoryCandidate = true;
      next.priority = Math.min(next.priority, 1);
    }
    return next;
  });
  return linkEvolution(refined);
}
