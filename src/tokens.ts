import type { OntologyValue } from "./types.js";

/** Stop words excluded from ontology and auto-carve tokenization. */
export const STOP_WORDS = new Set(
  (
    "a an the and or but if then else for to of in on at by with without from this that these those " +
    "is are was were be been being do does did not no yes it its itself you your i me my mine we our " +
    "they them their as into about over under within across up down out more most less least many much " +
    "few lot lots very just here there now new old other another same different also than while when " +
    "where why how which who whom whose because so such can could should would will shall may might " +
    "must own per vs via etc"
  ).split(" "),
);

export function slugify(text: string): string {
  const slug = (text ?? "")
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "misc";
}

/**
 * Lowercase alphanumeric-with-hyphen tokens of length >= 3, stop words removed.
 * Order and repeats are preserved; callers wrap in a Set where they need one.
 */
export function tokenize(text: string): string[] {
  const matches = (text ?? "").toLowerCase().match(/[a-z0-9][a-z0-9-]{2,}/g) ?? [];
  return matches.filter((t) => !STOP_WORDS.has(t));
}

export interface ScoredValue {
  id: string;
  score: number;
}

export const MIN_VALUE_SCORE = 2;
export const MAX_VALUE_LINKS = 2;

/** Plain code-unit comparison so ordering never depends on the host locale. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Score values by token-set overlap with `tokens`.
 * Keeps scores >= 2, orders by score desc then value id asc, returns at most 2.
 */
export function scoreValueCandidates(
  tokens: Iterable<string>,
  values: readonly OntologyValue[],
  limit: number = MAX_VALUE_LINKS,
): ScoredValue[] {
  const haystack = new Set(tokens);
  const scored: ScoredValue[] = [];
  for (const value of values) {
    const valueTokens = new Set(tokenize(value.label));
    if (valueTokens.size === 0) continue;
    let score = 0;
    for (const t of valueTokens) {
      if (haystack.has(t)) score += 1;
    }
    if (score >= MIN_VALUE_SCORE) scored.push({ id: value.id, score });
  }
  return rankScored(scored).slice(0, limit);
}

export function rankScored(scored: ScoredValue[]): ScoredValue[] {
  return [...scored].sort((a, b) => b.score - a.score || compareText(a.id, b.id));
}
