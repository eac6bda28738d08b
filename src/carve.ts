/**
 * Auto-Carve
 *
 * Second-chance topic assignment for records the classifier left in "Misc".
 * Named regex directives run first; whatever is still unclassified goes to an
 * UnclassifiedTopicDiscovery strategy (document-frequency by default).
 */

import type { CarveDirective, MemoryRecord } from "./types.js";
import { AuditLog, compilePattern } from "./audit.js";
import { MISC_TOPIC } from "./topic-rules.js";
import { compareText, tokenize } from "./tokens.js";

export const AUTO_TOPIC_PREFIX = "Auto: ";

/**
 * Pluggable discovery of topics for unclassified excerpts.
 * Returns one entry per excerpt: the new topic label, or null to leave it in Misc.
 */
export interface UnclassifiedTopicDiscovery {
  readonly name: string;
  assign(excerpts: readonly string[]): Array<string | null>;
}

export interface TokenFrequency {
  token: string;
  docFreq: number;
}

/**
 * Document frequency per token: how many excerpts contain it at least once.
 */
export function documentFrequencies(excerpts: readonly string[]): Map<string, number> {
  const docFreq = new Map<string, number>();
  for (const excerpt of excerpts) {
    for (const token of new Set(tokenize(excerpt))) {
      docFreq.set(token, (docFreq.get(token) ?? 0) + 1);
    }
  }
  return docFreq;
}

/**
 * Top-N tokens with docFreq >= minDocFreq, ranked by (docFreq desc, token asc)
 * so the selection is fully deterministic.
 */
export function selectCarveTokens(
  excerpts: readonly string[],
  topN: number,
  minDocFreq: number,
): TokenFrequency[] {
  return [...documentFrequencies(excerpts).entries()]
    .filter(([, docFreq]) => docFreq >= minDocFreq)
    .map(([token, docFreq]) => ({ token, docFreq }))
    .sort((a, b) => b.docFreq - a.docFreq || compareText(a.token, b.token))
    .slice(0, topN);
}

export class FrequencyTopicDiscovery implements UnclassifiedTopicDiscovery {
  readonly name = "document-frequency";

  constructor(
    private readonly topN: number = 8,
    private readonly minDocFreq: number = 3,
  ) {}

  assign(excerpts: readonly string[]): Array<string | null> {
    const selected = selectCarveTokens(excerpts, this.topN, this.minDocFreq);
    if (selected.length === 0) return excerpts.map(() => null);

    return excerpts.map((excerpt) => {
      const tokens = new Set(tokenize(excerpt));
      const hit = selected.find((s) => tokens.has(s.token));
      return hit ? `${AUTO_TOPIC_PREFIX}${hit.token}` : null;
    });
  }
}

export interface CarveOptions {
  directives: readonly CarveDirective[];
  discovery: UnclassifiedTopicDiscovery | null;
  audit: AuditLog;
}

/**
 * Reassign "Misc" records. Records with any other topic pass through untouched
 * and every record keeps its position.
 */
export function carveRecords(records: readonly MemoryRecord[], opts: CarveOptions): MemoryRecord[] {
  const compiled: Array<{ name: string; re: RegExp }> = [];
  for (const d of opts.directives) {
    const re = compilePattern(d.pattern, opts.audit, "carve", `carve directive "${d.name}"`);
    if (re) compiled.push({ name: d.name, re });
  }

  const out = records.map((r) => ({ ...r }));
  const remaining: number[] = [];
  let directed = 0;

  for (let i = 0; i < out.length; i++) {
    const record = out[i];
    if (!record || record.primaryTopic !== MISC_TOPIC) continue;
    const directive = compiled.find((d) => d.re.test(record.excerpt));
    if (directive) {
      record.primaryTopic = directive.name;
      directed += 1;
    } else {
      remaining.push(i);
    }
  }
  if (compiled.length > 0) {
    opts.audit.note("carve", `directives moved ${directed} record(s) out of ${MISC_TOPIC}`);
  }

  if (!opts.discovery || remaining.length === 0) return out;

  const assignments = opts.discovery.assign(
    remaining.map((i) => out[i]?.excerpt ?? ""),
  );
  let discovered = 0;
  remaining.forEach((recordIndex, k) => {
    const topic = assignments[k];
    const record = out[recordIndex];
    if (topic && record) {
      record.primaryTopic = topic;
      discovered += 1;
    }
  });
  opts.audit.note(
    "carve",
    `${opts.discovery.name} discovery moved ${discovered} of ${remaining.length} remaining ${MISC_TOPIC} record(s)`,
  );
  return out;
}
