import { PROVENANCE_SEPARATOR, type MemoryRecord } from "./types.js";
import { compareText } from "./tokens.js";

export function dedupeKey(record: Pick<MemoryRecord, "excerpt" | "role">): string {
  return JSON.stringify([record.excerpt, record.role]);
}

function sortedUnion(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])].sort(compareText);
}

/**
 * Fold `incoming` into `canonical`. Provenance is appended (never dropped),
 * tags and entities are unioned, the more important priority wins, and the
 * memory flag is sticky.
 */
export function mergeRecords(canonical: MemoryRecord, incoming: MemoryRecord): MemoryRecord {
  return {
    ...canonical,
    provenanceId: `${canonical.provenanceId}${PROVENANCE_SEPARATOR}${incoming.provenanceId}`,
    subtopicTags: sortedUnion(canonical.subtopicTags, incoming.subtopicTags),
    entities: sortedUnion(canonical.entities, incoming.entities),
    priority: Math.min(canonical.priority, incoming.priority),
    memoryCandidate: canonical.memoryCandidate || incoming.memoryCandidate,
  };
}

/**
 * Collapse records sharing (excerpt, role). The first record seen is canonical
 * and keeps its position; later ones merge into it in input order.
 */
export function dedupeRecords(records: readonly MemoryRecord[]): MemoryRecord[] {
  const byKey = new Map<string, MemoryRecord>();
  for (const record of records) {
    const key = dedupeKey(record);
    const prev = byKey.get(key);
    byKey.set(key, prev ? mergeRecords(prev, record) : { ...record });
  }
  return [...byKey.values()];
}
