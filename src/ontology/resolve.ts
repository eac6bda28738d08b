import type { OntologyCategory, OntologySeeds } from "../types.js";
import { AuditLog, compilePattern } from "../audit.js";
import { slugify } from "../tokens.js";

export const AUTO_CATEGORY_PREFIX = "auto-";
export const AUTO_CATEGORY_DESCRIPTION = "Auto-added from observed dataset topic (pending curation).";

export type ResolutionRule = "label-match" | "alias-match" | `regex:${string}` | "auto";

export interface Resolution {
  slug: string;
  rule: ResolutionRule;
}

function titleCase(text: string): string {
  return text.replace(/\b([a-z])/g, (c) => c.toUpperCase());
}

export function autoCategory(topic: string): OntologyCategory {
  return {
    label: topic.toLowerCase().startsWith("auto") ? titleCase(topic) : topic,
    description: AUTO_CATEGORY_DESCRIPTION,
    aliases: [],
    externalRefs: [],
  };
}

export function skeletonCategory(slug: string): OntologyCategory {
  return {
    label: titleCase(slug.replace(/-/g, " ")),
    description: "Referenced by a seed alias; pending curation.",
    aliases: [],
    externalRefs: [],
  };
}

/**
 * Deterministic topic -> category resolution:
 *   (a) case-insensitive label match against known categories
 *   (b) seed alias table
 *   (c) first matching seed pattern, in declaration order
 *   (d) `auto-<topic-slug>`, created when absent
 *
 * Seed patterns are compiled once; invalid ones are skipped and audited.
 */
export class CategoryResolver {
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly patterns: ReadonlyArray<{ source: string; re: RegExp; slug: string }>;

  constructor(seeds: Pick<OntologySeeds, "aliases" | "patterns">, audit: AuditLog) {
    this.aliases = new Map(
      Object.entries(seeds.aliases).map(([alias, slug]) => [alias.trim().toLowerCase(), slug]),
    );
    const compiled: Array<{ source: string; re: RegExp; slug: string }> = [];
    for (const [source, slug] of Object.entries(seeds.patterns)) {
      const re = compilePattern(source, audit, "ontology", `seed pattern for "${slug}"`);
      if (re) compiled.push({ source, re, slug });
    }
    this.patterns = compiled;
  }

  /**
   * Resolve `topic` against `categories`. When the result names a category that
   * does not exist yet (auto fallback, or an alias pointing at an uncurated
   * slug) a skeleton is added to `categories` in place.
   */
  resolve(topic: string, categories: Record<string, OntologyCategory>): Resolution {
    const lowered = topic.toLowerCase();

    for (const [slug, meta] of Object.entries(categories)) {
      if (meta.label.toLowerCase() === lowered) return { slug, rule: "label-match" };
    }

    const aliasSlug = this.aliases.get(lowered);
    if (aliasSlug) {
      if (!(aliasSlug in categories)) categories[aliasSlug] = skeletonCategory(aliasSlug);
      return { slug: aliasSlug, rule: "alias-match" };
    }

    for (const p of this.patterns) {
      if (p.re.test(topic)) {
        if (!(p.slug in categories)) categories[p.slug] = skeletonCategory(p.slug);
        return { slug: p.slug, rule: `regex:${p.source}` };
      }
    }

    const slug = `${AUTO_CATEGORY_PREFIX}${slugify(topic)}`;
    if (!(slug in categories)) categories[slug] = autoCategory(topic);
    return { slug, rule: "auto" };
  }
}
