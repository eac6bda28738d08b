import type {
  MemoryRecord,
  MemoryTiers,
  OntologyCategory,
  OntologyValue,
  ValueTier,
} from "../types.js";
import {
  MAX_VALUE_LINKS,
  rankScored,
  scoreValueCandidates,
  slugify,
  tokenize,
  type ScoredValue,
} from "../tokens.js";

export const VALUE_ID_SLUG_MAX = 40;
export const SAMPLE_EXCERPTS_PER_TOPIC = 5;

export function valueId(tier: ValueTier, label: string): string {
  return `T${tier}:${slugify(label).slice(0, VALUE_ID_SLUG_MAX)}`;
}

/**
 * Durable values for the ontology.
 *
 * Tier-0 values already present in `existing` are kept verbatim and never
 * regenerated; only when none exist is tier 0 seeded from tiers[0]. Tier 1 is
 * rebuilt from tiers[1] on every call, deduplicated by label.
 */
export function deriveValues(tiers: MemoryTiers, existing: readonly OntologyValue[] = []): OntologyValue[] {
  const values: OntologyValue[] = existing
    .filter((v) => v.tier === 0)
    .map((v): OntologyValue => ({ id: v.id, label: v.label, tier: 0 }));
  const seenLabels = new Set(values.map((v) => v.label));
  const seenIds = new Set(values.map((v) => v.id));

  const add = (tier: ValueTier, label: string): void => {
    if (!label || seenLabels.has(label)) return;
    const id = valueId(tier, label);
    if (seenIds.has(id)) return;
    seenLabels.add(label);
    seenIds.add(id);
    values.push({ id, label, tier });
  };

  if (values.length === 0) {
    for (const e of tiers[0]) add(0, e.coreBelief || e.primaryTopic);
  }
  for (const e of tiers[1]) add(1, e.coreBelief || e.primaryTopic);
  return values;
}

/** Up to five excerpts per topic, in record order. */
export function sampleExcerpts(records: readonly MemoryRecord[]): Map<string, string[]> {
  const samples = new Map<string, string[]>();
  for (const r of records) {
    const bucket = samples.get(r.primaryTopic) ?? [];
    if (bucket.length < SAMPLE_EXCERPTS_PER_TOPIC) bucket.push(r.excerpt);
    samples.set(r.primaryTopic, bucket);
  }
  return samples;
}

/**
 * value_map suggestions: token overlap between (category label + sample
 * excerpts) and each value label. When several topics share a category the
 * best score per value wins before the top-2 cut.
 */
export function suggestValueLinks(
  map: Readonly<Record<string, string>>,
  categories: Readonly<Record<string, OntologyCategory>>,
  samples: ReadonlyMap<string, string[]>,
  values: readonly OntologyValue[],
): Record<string, string[]> {
  const bestBySlug = new Map<string, Map<string, number>>();
  for (const [topic, slug] of Object.entries(map)) {
    const label = categories[slug]?.label ?? topic;
    const text = `${label} ${(samples.get(topic) ?? []).join(" ")}`;
    const scored = scoreValueCandidates(tokenize(text), values, Number.POSITIVE_INFINITY);
    if (scored.length === 0) continue;
    const best = bestBySlug.get(slug) ?? new Map<string, number>();
    for (const s of scored) best.set(s.id, Math.max(best.get(s.id) ?? 0, s.score));
    bestBySlug.set(slug, best);
  }

  const out: Record<string, string[]> = {};
  for (const [slug, best] of bestBySlug) {
    const ranked: ScoredValue[] = rankScored([...best.entries()].map(([id, score]) => ({ id, score })));
    out[slug] = ranked.slice(0, MAX_VALUE_LINKS).map((s) => s.id);
  }
  return out;
}

/** Order-preserving union; never removes an existing link. */
export function unionLinks(existing: readonly string[] = [], incoming: readonly string[] = []): string[] {
  const out = [...existing];
  for (const id of incoming) {
    if (!out.includes(id)) out.push(id);
  }
  return out;
}
