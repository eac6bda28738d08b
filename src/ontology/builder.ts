import type {
  CategoryDecision,
  MemoryRecord,
  MemoryTiers,
  Ontology,
  OntologySeeds,
  SourceRecord,
} from "../types.js";
import { AuditLog } from "../audit.js";
import { compareText } from "../tokens.js";
import { CategoryResolver } from "./resolve.js";
import { deriveValues, sampleExcerpts, suggestValueLinks } from "./values.js";
import { promoteWikiCategories } from "./promote.js";

export interface BuildOntologyInput {
  records: readonly MemoryRecord[];
  tiers: MemoryTiers;
  seeds: OntologySeeds;
  /** Persisted ontology; only its tier-0 values survive a rebuild. */
  existing: Ontology | null;
  /** Source registry already merged with this run's discoveries. */
  sources: readonly SourceRecord[];
  wikiCategoryThreshold: number;
  audit: AuditLog;
}

export interface BuildOntologyResult {
  ontology: Ontology;
  decisions: CategoryDecision[];
  promotedCategories: string[];
}

export function emptyOntology(): Ontology {
  return { values: [], categories: {}, map: {}, valueMap: {} };
}

/** Distinct topic labels in code-unit order. */
export function observedTopics(records: readonly MemoryRecord[]): string[] {
  return [...new Set(records.map((r) => r.primaryTopic || "Misc"))].sort(compareText);
}

/**
 * Full deterministic build from seeds and the current record set. Also used
 * for the first-run bootstrap, where `existing` is null.
 *
 * Given the same records, tiers, seeds, registry and tier-0 values, the result
 * is identical on every call.
 */
export function buildOntology(input: BuildOntologyInput): BuildOntologyResult {
  const values = deriveValues(input.tiers, input.existing?.values ?? []);

  const categories = { ...input.seeds.categories };
  const resolver = new CategoryResolver(input.seeds, input.audit);
  const map: Record<string, string> = {};
  const decisions: CategoryDecision[] = [];
  for (const topic of observedTopics(input.records)) {
    const { slug, rule } = resolver.resolve(topic, categories);
    map[topic] = slug;
    decisions.push({ topic, slug, rule });
  }

  const valueMap = suggestValueLinks(map, categories, sampleExcerpts(input.records), values);

  const promoted = promoteWikiCategories(
    { values, categories, map, valueMap },
    input.sources,
    input.wikiCategoryThreshold,
  );
  for (const slug of promoted.created) {
    input.audit.note("ontology", `promoted wikipedia category into \`${slug}\``);
  }

  return { ontology: promoted.ontology, decisions, promotedCategories: promoted.created };
}
