/**
 * Source discovery
 *
 * Scans excerpts for external references (URLs, Wikipedia pages and
 * categories, ISBNs, seed-registered authors) and aggregates them into a
 * registry keyed by (type, id). The registry is append-merged across runs.
 *
 * Counts are backed by hashed observation keys, one per contributing turn and
 * occurrence, so feeding the same log twice leaves every count unchanged.
 */

import {
  PROVENANCE_SEPARATOR,
  type AuthorSeed,
  type MemoryRecord,
  type SourceRecord,
  type SourceType,
} from "../types.js";
import { AuditLog, compilePattern } from "../audit.js";
import { dedupeKey } from "../dedupe.js";
import { sha256String } from "../transfer/fs-utils.js";
import { compareText, slugify } from "../tokens.js";

const URL_RX = /https?:\/\/([\w.-]+)(?:\/([^\s#?]*))?/gi;
const REDACTED_URL_RX = /\[URL:([\w.-]+)\]/g;
const WIKI_CATEGORY_RX = /^wiki\/Category:(.+)$/i;
const WIKI_PAGE_RX = /^wiki\/([^/]+)$/i;
const ISBN_RX = /\bISBN(?:-1[03])?:?\s*([0-9Xx-]{10,17})\b/g;

type Discovered = Omit<SourceRecord, "count">;

export function normalizeIsbn(raw: string): string {
  return raw.replace(/-/g, "").toUpperCase();
}

/**
 * Provenance alone is not unique per turn: undated turns of one conversation,
 * or a user and an assistant turn in the same second, share it. The record key
 * and the position inside a merged provenance chain tell them apart.
 */
function observationKey(
  recordKey: string,
  provenance: string,
  position: number,
  type: SourceType,
  id: string,
  occurrence: number,
): string {
  return sha256String(
    [recordKey, provenance, position, type, id, occurrence].join("\u0000"),
  ).sha256.slice(0, 16);
}

function sourceKey(type: string, id: string): string {
  return `${type}\u0000${id}`;
}

function referencesInText(text: string): Array<Omit<Discovered, "observations" | "lastSeen">> {
  const refs: Array<Omit<Discovered, "observations" | "lastSeen">> = [];

  for (const m of text.matchAll(URL_RX)) {
    const domain = (m[1] ?? "").toLowerCase();
    const urlPath = m[2] ?? "";
    if (domain.endsWith("wikipedia.org")) {
      const cat = WIKI_CATEGORY_RX.exec(urlPath);
      if (cat?.[1]) {
        const id = cat[1];
        refs.push({
          type: "wikipedia_category",
          id,
          url: `https://${domain}/wiki/Category:${id}`,
          label: id.replace(/_/g, " "),
        });
        continue;
      }
      const page = WIKI_PAGE_RX.exec(urlPath);
      if (page?.[1]) {
        const id = page[1];
        refs.push({
          type: "wikipedia_page",
          id,
          url: `https://${domain}/wiki/${id}`,
          label: id.replace(/_/g, " "),
        });
        continue;
      }
    }
    refs.push({ type: "url_domain", id: domain, label: domain });
  }

  for (const m of text.matchAll(REDACTED_URL_RX)) {
    const domain = (m[1] ?? "").toLowerCase();
    if (domain) refs.push({ type: "url_domain", id: domain, label: domain });
  }

  for (const m of text.matchAll(ISBN_RX)) {
    const isbn = normalizeIsbn(m[1] ?? "");
    if (isbn) refs.push({ type: "isbn", id: isbn, label: `ISBN ${isbn}` });
  }
  return refs;
}

interface CompiledAuthor {
  seed: AuthorSeed;
  isbns: Set<string>;
  patterns: RegExp[];
}

function compileAuthors(authors: readonly AuthorSeed[], audit: AuditLog): CompiledAuthor[] {
  return authors
    .filter((a) => a.name.trim().length > 0)
    .map((seed) => ({
      seed,
      isbns: new Set(seed.isbns.map(normalizeIsbn)),
      patterns: seed.bookPatterns
        .map((p) => compilePattern(p, audit, "sources", `book pattern for author "${seed.name}"`))
        .filter((re): re is RegExp => re !== null),
    }));
}

/**
 * Discover sources in every record's excerpt and aggregate them.
 * Each provenance id behind a (merged) record counts as its own observation.
 */
export function discoverSources(
  records: readonly MemoryRecord[],
  authors: readonly AuthorSeed[],
  audit: AuditLog,
): SourceRecord[] {
  const compiledAuthors = compileAuthors(authors, audit);
  const found: SourceRecord[] = [];

  for (const record of records) {
    const text = record.excerpt ?? "";
    const lastSeen = record.timestamp ?? "";
    const refs = referencesInText(text);

    const rowIsbns = new Set(refs.filter((r) => r.type === "isbn").map((r) => r.id));
    for (const author of compiledAuthors) {
      const byIsbn = [...author.isbns].some((i) => rowIsbns.has(i));
      const matched = byIsbn || author.patterns.some((re) => re.test(text));
      if (matched) {
        refs.push({
          type: "author",
          id: slugify(author.seed.name),
          label: author.seed.name,
          subjects: [...author.seed.subjects],
        });
      }
    }

    const recordKey = dedupeKey(record);
    const provenances = record.provenanceId.split(PROVENANCE_SEPARATOR);
    const occurrences = new Map<string, number>();
    for (const ref of refs) {
      const key = sourceKey(ref.type, ref.id);
      const occurrence = occurrences.get(key) ?? 0;
      occurrences.set(key, occurrence + 1);
      const observations = provenances.map((p, position) =>
        observationKey(recordKey, p, position, ref.type, ref.id, occurrence),
      );
      found.push({ ...ref, lastSeen, count: observations.length, observations });
    }
  }

  return mergeSources([], found);
}

/**
 * Append-merge `found` into `existing`, keyed by (type, id). Counts grow only
 * by observations not seen before; the newest lastSeen wins; a missing url or
 * label is filled in. Existing entries keep their order, new ones append.
 */
export function mergeSources(
  existing: readonly SourceRecord[],
  found: readonly SourceRecord[],
): SourceRecord[] {
  const index = new Map<string, SourceRecord>();
  for (const s of existing) {
    index.set(sourceKey(s.type, s.id), { ...s, observations: [...s.observations] });
  }

  for (const s of found) {
    const key = sourceKey(s.type, s.id);
    const cur = index.get(key);
    if (!cur) {
      index.set(key, { ...s, observations: [...s.observations] });
      continue;
    }
    const seen = new Set(cur.observations);
    const fresh = s.observations.filter((o) => !seen.has(o));
    if (s.observations.length === 0) {
      cur.count += s.count;
    } else {
      cur.observations.push(...fresh);
      cur.count += fresh.length;
    }
    if (s.lastSeen && (!cur.lastSeen || compareText(s.lastSeen, cur.lastSeen) > 0)) {
      cur.lastSeen = s.lastSeen;
    }
    if (!cur.url && s.url) cur.url = s.url;
    if (!cur.label && s.label) cur.label = s.label;
    if (!cur.subjects && s.subjects) cur.subjects = [...s.subjects];
  }
  return [...index.values()];
}

/**
 * Add curated seed sources the registry does not know yet. Seeds never add to
 * the count of an entry that is already registered.
 */
export function withSeedSources(
  registry: readonly SourceRecord[],
  seeds: readonly SourceRecord[],
): SourceRecord[] {
  const known = new Set(registry.map((s) => sourceKey(s.type, s.id)));
  const fresh = seeds.filter((s) => !known.has(sourceKey(s.type, s.id)));
  return mergeSources(registry, fresh);
}

/** Highest count first, then type and id; used for the build log and the CLI. */
export function topSources(sources: readonly SourceRecord[], limit: number): SourceRecord[] {
  return [...sources]
    .sort((a, b) => b.count - a.count || compareText(a.type, b.type) || compareText(a.id, b.id))
    .slice(0, limit);
}

export interface SourceSuggestions {
  categoryProposals: Array<{ slug: string; title: string; count: number; url: string }>;
  unmappedIsbns: SourceRecord[];
}

export function suggestSourceImprovements(
  sources: readonly SourceRecord[],
  authors: readonly AuthorSeed[],
  threshold: number,
): SourceSuggestions {
  const categoryProposals = sources
    .filter((s) => s.type === "wikipedia_category" && s.count >= threshold)
    .map((s) => {
      const title = (s.label || s.id).replace(/_/g, " ");
      return { slug: slugify(title), title, count: s.count, url: s.url ?? "" };
    })
    .sort((a, b) => compareText(a.title, b.title));

  const knownIsbns = new Set(authors.flatMap((a) => a.isbns.map(normalizeIsbn)));
  const unmappedIsbns = sources
    .filter((s) => s.type === "isbn" && !knownIsbns.has(s.id.toUpperCase()))
    .sort((a, b) => b.count - a.count || compareText(a.id, b.id))
    .slice(0, 20);

  return { categoryProposals, unmappedIsbns };
}
