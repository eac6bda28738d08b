import type {
  CrossReferenceRow,
  LinkedValue,
  MemoryTiers,
  Ontology,
  TierEntry,
} from "./types.js";
import {
  MAX_VALUE_LINKS,
  STOP_WORDS,
  rankScored,
  scoreValueCandidates,
  slugify,
  tokenize,
} from "./tokens.js";

export const CROSSREF_EXCERPT_WORDS = 15;
export const MAX_INFLUENCES = 3;

const MONTHS = new Set([
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
]);

const PLACEHOLDER_RX = /\[[A-Z]+(?::[^\]]*)?\]/g;
const CAPITALIZED_PHRASE_RX = /\b[A-Z][A-Za-z'-]*(?:\s+[A-Z][A-Za-z'-]*){0,2}/g;

/** Category slug for a topic: the ontology mapping, else its plain slug. */
export function categoryFor(topic: string, ontology: Ontology): string {
  return ontology.map[topic] ?? slugify(topic);
}

export function truncateWords(text: string, maxWords: number = CROSSREF_EXCERPT_WORDS): string {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  if (words.length <= maxWords) return words.join(" ");
  return `${words.slice(0, maxWords).join(" ")}…`;
}

/**
 * Up to two values for one tier entry. Curated `valueMap` links for the
 * entry's category always outrank token-overlap scores.
 */
export function linkValuesForEntry(entry: TierEntry, ontology: Ontology): LinkedValue[] {
  const slug = categoryFor(entry.primaryTopic, ontology);
  const label = ontology.categories[slug]?.label ?? entry.primaryTopic;
  const best = new Map<string, { score: number; manual: boolean }>();

  for (const id of ontology.valueMap[slug] ?? []) {
    best.set(id, { score: Number.POSITIVE_INFINITY, manual: true });
  }
  const computed = scoreValueCandidates(
    tokenize(`${label} ${entry.excerpt}`),
    ontology.values,
    Number.POSITIVE_INFINITY,
  );
  for (const s of computed) {
    const cur = best.get(s.id);
    if (!cur || s.score > cur.score) best.set(s.id, { score: s.score, manual: false });
  }

  const ranked = rankScored([...best.entries()].map(([id, v]) => ({ id, score: v.score })));
  return ranked.slice(0, MAX_VALUE_LINKS).map((s) => {
    const value = ontology.values.find((v) => v.id === s.id);
    return {
      id: s.id,
      label: value?.label,
      tier: value?.tier,
      score: s.score,
      manual: best.get(s.id)?.manual ?? false,
    };
  });
}

/** Capitalized 1-3 word phrases that look like names, works or events. */
export function extractInfluences(excerpt: string): string[] {
  const text = excerpt.replace(PLACEHOLDER_RX, " ");
  const out: string[] = [];
  for (const m of text.matchAll(CAPITALIZED_PHRASE_RX)) {
    const phrase = m[0].trim();
    const words = phrase.split(/\s+/);
    const first = (words[0] ?? "").toLowerCase();
    if (STOP_WORDS.has(first) || MONTHS.has(first)) continue;
    if (words.length === 1 && phrase.length <= 3) continue;
    if (out.includes(phrase)) continue;
    out.push(phrase);
    if (out.length >= MAX_INFLUENCES) break;
  }
  return out;
}

function rowFor(tier: 2 | 3, entry: TierEntry, ontology: Ontology): CrossReferenceRow {
  return {
    tier,
    excerpt: truncateWords(entry.excerpt),
    category: categoryFor(entry.primaryTopic, ontology),
    values: linkValuesForEntry(entry, ontology),
    influences: extractInfluences(entry.excerpt),
    provenance: entry.provenance,
    primaryTopic: entry.primaryTopic,
  };
}

/** One row per tier-2 entry, then one per tier-3 entry, in tier order. */
export function buildCrossReference(tiers: MemoryTiers, ontology: Ontology): CrossReferenceRow[] {
  return [
    ...tiers[2].map((e) => rowFor(2, e, ontology)),
    ...tiers[3].map((e) => rowFor(3, e, ontology)),
  ];
}
