/**
 * Incremental ontology patching
 *
 * suggestOntologyPatch() computes only additive differences against the
 * current ontology. applyOntologyPatch() is a pure merge of such a patch.
 * Neither ever touches `values` or an existing map/category entry.
 */

import type {
  CategoryDecision,
  MemoryRecord,
  Ontology,
  OntologyCategory,
  OntologySeeds,
  SourceRecord,
} from "../types.js";
import { AuditLog } from "../audit.js";
import { CategoryResolver } from "./resolve.js";
import { sampleExcerpts, suggestValueLinks, unionLinks } from "./values.js";
import { promoteWikiCategories } from "./promote.js";
import { observedTopics } from "./builder.js";

export interface OntologyPatch {
  /** New topic -> slug entries. */
  map: Record<string, string>;
  /** New category skeletons. */
  categories: Record<string, OntologyCategory>;
  /** New value links per slug (only ids not already linked). */
  valueMap: Record<string, string[]>;
}

export interface SuggestPatchInput {
  records: readonly MemoryRecord[];
  seeds: OntologySeeds;
  sources: readonly SourceRecord[];
  wikiCategoryThreshold: number;
  audit: AuditLog;
}

export function emptyPatch(): OntologyPatch {
  return { map: {}, categories: {}, valueMap: {} };
}

export function isEmptyPatch(patch: OntologyPatch): boolean {
  return (
    Object.keys(patch.map).length === 0 &&
    Object.keys(patch.categories).length === 0 &&
    Object.keys(patch.valueMap).length === 0
  );
}

/**
 * pre:  none; any ontology is a valid base.
 * post: categories and map entries are added only where absent; valueMap links
 *       are unioned; `values` is returned as the same content. Applying the
 *       same patch twice equals applying it once.
 */
export function applyOntologyPatch(current: Ontology, patch: OntologyPatch): Ontology {
  const categories = { ...current.categories };
  for (const [slug, cat] of Object.entries(patch.categories)) {
    if (!(slug in categories)) categories[slug] = cat;
  }
  const map = { ...current.map };
  for (const [topic, slug] of Object.entries(patch.map)) {
    if (!(topic in map)) map[topic] = slug;
  }
  const valueMap = { ...current.valueMap };
  for (const [slug, ids] of Object.entries(patch.valueMap)) {
    valueMap[slug] = unionLinks(valueMap[slug], ids);
  }
  return { values: current.values, categories, map, valueMap };
}

function newLinks(
  base: Readonly<Record<string, string[]>>,
  next: Readonly<Record<string, string[]>>,
): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [slug, ids] of Object.entries(next)) {
    const have = new Set(base[slug] ?? []);
    const fresh = ids.filter((id) => !have.has(id));
    if (fresh.length > 0) out[slug] = fresh;
  }
  return out;
}

export function suggestOntologyPatch(
  current: Ontology,
  input: SuggestPatchInput,
): { patch: OntologyPatch; decisions: CategoryDecision[] } {
  const patch = emptyPatch();
  const decisions: CategoryDecision[] = [];

  // Resolution sees curated seed categories too, but only what gets used is proposed.
  const working: Record<string, OntologyCategory> = { ...input.seeds.categories, ...current.categories };
  const resolver = new CategoryResolver(input.seeds, input.audit);
  for (const topic of observedTopics(input.records)) {
    if (topic in current.map) continue;
    const { slug, rule } = resolver.resolve(topic, working);
    patch.map[topic] = slug;
    decisions.push({ topic, slug, rule });
    const candidate = working[slug];
    if (!(slug in current.categories) && candidate) patch.categories[slug] = candidate;
  }

  const withMap = applyOntologyPatch(current, patch);
  const suggested = suggestValueLinks(
    withMap.map,
    withMap.categories,
    sampleExcerpts(input.records),
    current.values,
  );
  patch.valueMap = newLinks(current.valueMap, suggested);

  const base = applyOntologyPatch(current, patch);
  const promoted = promoteWikiCategories(base, input.sources, input.wikiCategoryThreshold);
  for (const slug of promoted.created) {
    const cat = promoted.ontology.categories[slug];
    if (cat) patch.categories[slug] = cat;
  }
  for (const [slug, ids] of Object.entries(newLinks(base.valueMap, promoted.ontology.valueMap))) {
    patch.valueMap[slug] = unionLinks(patch.valueMap[slug], ids);
  }

  return { patch, decisions };
}
