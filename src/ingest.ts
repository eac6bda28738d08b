import type { DateRange, EngineConfig, MemoryRecord, RawTurn } from "./types.js";
import {
  classifyIntent,
  classifyTopic,
  extractEntities,
  extractSubtags,
  memoryFlagAndPriority,
  normalizeRole,
} from "./classify.js";
import { buildExcerpt } from "./redact.js";

export const UNTITLED_THREAD = "Untitled";

/** Milliseconds since epoch, or null when the timestamp is blank or unparsable. */
export function parseTimestamp(ts: string | null | undefined): number | null {
  if (!ts) return null;
  const ms = Date.parse(ts.trim());
  return Number.isFinite(ms) ? ms : null;
}

/** Inclusive range check. Undated and unparsable timestamps are kept. */
export function inDateRange(ts: string | null | undefined, range: DateRange): boolean {
  const ms = parseTimestamp(ts);
  if (ms === null) return true;
  if (range.start && ms < range.start.getTime()) return false;
  if (range.end && ms > range.end.getTime()) return false;
  return true;
}

export function provenanceFor(turn: RawTurn): string {
  return `${turn.conversationId.trim()} | ${turn.timestamp.trim()}`;
}

export type IngestOptions = Pick<EngineConfig, "dateRange" | "excerptMaxChars" | "subtagCap" | "urlAllowList">;

export function classifyTurn(turn: RawTurn, opts: IngestOptions): MemoryRecord {
  const convo = turn.conversationId.trim();
  const ts = turn.timestamp.trim();
  const role = normalizeRole(turn.author);
  const context = `${convo}\n${turn.text}`;
  const topic = classifyTopic(context);
  const { memoryCandidate, priority } = memoryFlagAndPriority(topic, role);

  return {
    timestamp: ts.length > 0 ? ts : null,
    threadId: convo || UNTITLED_THREAD,
    role,
    intent: classifyIntent(turn.text),
    primaryTopic: topic,
    subtopicTags: extractSubtags(context, opts.subtagCap),
    entities: extractEntities(turn.text),
    excerpt: buildExcerpt(turn.text, { maxChars: opts.excerptMaxChars, allowList: opts.urlAllowList }),
    memoryCandidate,
    priority,
    provenanceId: provenanceFor(turn),
    evolutionLink: "",
  };
}

/** Filter turns by date range and classify each into a record, preserving input order. */
export function classifyTurns(turns: readonly RawTurn[], opts: IngestOptions): MemoryRecord[] {
  const out: MemoryRecord[] = [];
  for (const turn of turns) {
    if (!inDateRange(turn.timestamp, opts.dateRange)) continue;
    out.push(classifyTurn(turn, opts));
  }
  return out;
}
