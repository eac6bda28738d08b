import type { Role } from "./types.js";
import { ANCHOR_TOPICS, MISC_TOPIC, PRIORITY_TWO_TOPICS, TOPIC_RULES } from "./topic-rules.js";
import { DEFAULT_SUBTAG_CAP } from "./config.js";
import { compareText } from "./tokens.js";

export const DEFAULT_INTENT = "brainstorm";

const INTENT_RULES: ReadonlyArray<{ re: RegExp; intent: string }> = [
  { re: /\?\s*$/, intent: "question" },
  { re: /^can you|^could you|^please|^help\b/i, intent: "request" },
  { re: /remember|memory|store|synthesi|tier|schema/i, intent: "meta" },
  { re: /design|architect|schema|build|implement|ETL|pipeline/i, intent: "design" },
  { re: /decide|decision|choose|pick|approve|consent/i, intent: "decision" },
];

const SUBTAG_RULES: ReadonlyArray<{ re: RegExp; tags: string[] }> = [
  { re: /privacy dashboard|apps and services activity/i, tags: ["privacy-dashboard"] },
  { re: /excel|csv|export/i, tags: ["export", "csv"] },
  { re: /patience|cooperation|openness|consistency/i, tags: ["patience", "cooperation", "openness", "consistency"] },
  { re: /modern slavery act|document retention/i, tags: ["msa2015", "doc-retention"] },
  { re: /malta|napoleon|duchy of warsaw|tsar paul/i, tags: ["malta", "napoleon", "poland"] },
  { re: /\broot(?:ed|ing)?\b|safetynet|play integrity|termux|docker|podman/i, tags: ["root", "integrity", "termux", "containers"] },
];

const ENTITY_RULES: ReadonlyArray<{ re: RegExp; entity: string }> = [
  { re: /Microsoft Privacy Dashboard|Privacy Dashboard/i, entity: "Microsoft Privacy Dashboard" },
  { re: /Modern Slavery Act 2015/i, entity: "Modern Slavery Act 2015" },
  { re: /Play Integrity API|SafetyNet/i, entity: "Play Integrity API" },
  { re: /Termux/i, entity: "Termux" },
  { re: /\bVOC\b|Dutch East India Company/i, entity: "VOC" },
];

const ASSISTANT_LABELS = new Set(["ai", "assistant", "bot", "copilot", "model"]);

export function classifyIntent(text: string): string {
  const source = text ?? "";
  return INTENT_RULES.find((r) => r.re.test(source))?.intent ?? DEFAULT_INTENT;
}

export function classifyTopic(text: string): string {
  const source = text ?? "";
  return TOPIC_RULES.find((r) => r.re.test(source))?.topic ?? MISC_TOPIC;
}

/** Union of every matching tag group, capped in rule order, then sorted. */
export function extractSubtags(text: string, cap: number = DEFAULT_SUBTAG_CAP): string[] {
  const source = text ?? "";
  const tags = new Set<string>();
  for (const rule of SUBTAG_RULES) {
    if (rule.re.test(source)) {
      for (const t of rule.tags) tags.add(t);
    }
  }
  return [...tags].slice(0, cap).sort(compareText);
}

export function extractEntities(text: string): string[] {
  const source = text ?? "";
  const found = new Set(ENTITY_RULES.filter((r) => r.re.test(source)).map((r) => r.entity));
  return [...found].sort(compareText);
}

export function normalizeRole(label: string): Role {
  return ASSISTANT_LABELS.has((label ?? "").trim().toLowerCase()) ? "assistant" : "user";
}

export function memoryFlagAndPriority(
  topic: string,
  role: Role,
): { memoryCandidate: boolean; priority: number } {
  if (role === "user" && ANCHOR_TOPICS.has(topic)) {
    return { memoryCandidate: true, priority: 1 };
  }
  if (PRIORITY_TWO_TOPICS.has(topic)) {
    return { memoryCandidate: true, priority: 2 };
  }
  return { memoryCandidate: false, priority: 3 };
}
