import type { Ontology, SourceRecord } from "../types.js";
import { scoreValueCandidates, slugify, tokenize } from "../tokens.js";
import { unionLinks } from "./values.js";

export const PROMOTED_CATEGORY_DESCRIPTION = "Promoted from frequent Wikipedia category source (auto).";

export interface WikiPromotionResult {
  ontology: Ontology;
  /** Slugs created by this call. Empty on a repeat run. */
  created: string[];
  /** Slugs at or above the threshold, created now or earlier. */
  eligible: string[];
}

/**
 * Promote frequent `wikipedia_category` sources into first-class categories.
 *
 * pre:  `sources` is the merged registry for this run.
 * post: every eligible slug exists in `categories` exactly once; existing
 *       categories are untouched; value links are unioned, never removed.
 *       Applying the result again yields the same ontology.
 */
export function promoteWikiCategories(
  ontology: Ontology,
  sources: readonly SourceRecord[],
  threshold: number,
): WikiPromotionResult {
  const categories = { ...ontology.categories };
  const valueMap = { ...ontology.valueMap };
  const created: string[] = [];
  const eligible: string[] = [];

  for (const s of sources) {
    if (s.type !== "wikipedia_category" || s.count < threshold) continue;
    const title = (s.label || s.id).trim();
    if (!title) continue;
    const slug = slugify(title);
    if (!eligible.includes(slug)) eligible.push(slug);

    if (!(slug in categories)) {
      categories[slug] = {
        label: title.replace(/_/g, " "),
        description: PROMOTED_CATEGORY_DESCRIPTION,
        aliases: [],
        externalRefs: s.url ? [s.url] : [],
      };
      created.push(slug);
    }

    const links = scoreValueCandidates(tokenize(title), ontology.values).map((v) => v.id);
    if (links.length > 0) valueMap[slug] = unionLinks(valueMap[slug], links);
  }

  return { ontology: { ...ontology, categories, valueMap }, created, eligible };
}
