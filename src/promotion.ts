/**
 * Tier 3 -> Tier 2 promotion.
 *
 * proposePromotions() only suggests; applyPromotions() is the single place a
 * tier entry ever moves, and it re-validates every proposal against the
 * current tiers and record set first.
 */

import type {
  MemoryRecord,
  MemoryTiers,
  Ontology,
  PromotionOutcome,
  PromotionProposal,
  PromotionReason,
  PromotionSkipReason,
  TierEntry,
} from "./types.js";
import { linkValuesForEntry } from "./crossref.js";
import { cloneTiers } from "./tiering.js";

export const STRONG_OPINION_RX = /\b(?:should|must|prefer|I believe|I think|I want|I will)\b/i;
export const FREQUENT_TOPIC_MIN_USER_RECORDS = 5;

export function proposePromotions(
  tiers: MemoryTiers,
  records: readonly MemoryRecord[],
  ontology: Ontology,
): PromotionProposal[] {
  const userCounts = new Map<string, number>();
  for (const r of records) {
    if (r.role === "user") userCounts.set(r.primaryTopic, (userCounts.get(r.primaryTopic) ?? 0) + 1);
  }

  const proposals: PromotionProposal[] = [];
  for (const entry of tiers[3]) {
    if (entry.role !== "user") continue;
    const reasons: PromotionReason[] = [];
    if (STRONG_OPINION_RX.test(entry.excerpt)) reasons.push("strong-opinion");
    if (linkValuesForEntry(entry, ontology).some((v) => v.tier === 0 || v.tier === 1)) {
      reasons.push("core-value-link");
    }
    if ((userCounts.get(entry.primaryTopic) ?? 0) >= FREQUENT_TOPIC_MIN_USER_RECORDS) {
      reasons.push("frequent-topic");
    }
    if (reasons.length === 0) continue;
    proposals.push({
      excerpt: entry.excerpt,
      provenance: entry.provenance,
      primaryTopic: entry.primaryTopic,
      fromTier: 3,
      toTier: 2,
      reasons,
    });
  }
  return proposals;
}

function liveKey(excerpt: string, provenance: string): string {
  return JSON.stringify([excerpt, provenance]);
}

function sameEntry(entry: TierEntry, proposal: PromotionProposal): boolean {
  return entry.excerpt === proposal.excerpt && entry.provenance === proposal.provenance;
}

/**
 * Apply approved proposals. Inputs are not mutated.
 *
 * A proposal is skipped, and reported, when it is not a 3 -> 2 move, when no
 * record in `records` carries its (excerpt, provenance) pair any more (stale),
 * when the entry already sits in tier 2, or when tier 3 has no matching entry.
 */
export function applyPromotions(
  tiers: MemoryTiers,
  proposals: readonly PromotionProposal[],
  records: readonly MemoryRecord[],
): PromotionOutcome {
  const next = cloneTiers(tiers);
  const live = new Set(records.map((r) => liveKey(r.excerpt, r.provenanceId)));
  const applied: PromotionProposal[] = [];
  const skipped: Array<{ proposal: PromotionProposal; reason: PromotionSkipReason }> = [];

  for (const proposal of proposals) {
    let reason: PromotionSkipReason | null = null;
    const index = next[3].findIndex((e) => sameEntry(e, proposal));
    if (proposal.fromTier !== 3 || proposal.toTier !== 2) {
      reason = "invalid-transition";
    } else if (!live.has(liveKey(proposal.excerpt, proposal.provenance))) {
      reason = "stale";
    } else if (next[2].some((e) => sameEntry(e, proposal))) {
      reason = "already-at-destination";
    } else if (index < 0) {
      reason = "missing-from-source-tier";
    }

    if (reason) {
      skipped.push({ proposal, reason });
      continue;
    }
    const [entry] = next[3].splice(index, 1);
    if (entry) next[2].push(entry);
    applied.push(proposal);
  }

  return { tiers: next, applied, skipped };
}
