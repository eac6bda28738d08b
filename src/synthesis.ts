import type { Clusters, MemoryRecord, Synthesis } from "./types.js";
import { TOPIC_LABELS, type TopicLabel } from "./topic-rules.js";

export interface SynthesisTemplate {
  coreBelief: string;
  decisionRules: string[];
  /** At most three. */
  openQuestions: string[];
}

export const STANCE_EVOLUTION_NOTE =
  "See the provenance chain inside this topic for stance and tooling refinements over time.";

export const GENERIC_TEMPLATE: SynthesisTemplate = {
  coreBelief: "Mixed factual clarifications across topics.",
  decisionRules: [],
  openQuestions: [],
};

/**
 * One template per classifier topic. Every label in TOPIC_LABELS must have an
 * entry; `satisfies` enforces that at compile time and
 * missingSynthesisTemplates() re-checks it at startup.
 *
 * | Topic                      | Rules | Open questions |
 * |----------------------------|-------|----------------|
 * | Copilot history            | 2     | 2              |
 * | Memory feature             | 2     | 2              |
 * | AI strategy & games        | 2     | 1              |
 * | Modern slavery Q&A         | 1     | 0              |
 * | Space history              | 1     | 0              |
 * | History threads            | 1     | 0              |
 * | Dishwasher tips            | 1     | 0              |
 * | Materials & outdoor        | 1     | 0              |
 * | Android dev & security     | 2     | 1              |
 * | Licensing philosophy       | 1     | 1              |
 * | Data engineering & logging | 2     | 1              |
 * | Culture & media            | 0     | 0              |
 * | Ethics & policy            | 1     | 0              |
 * | Misc                       | 0     | 0              |
 */
export const SYNTHESIS_TEMPLATES = {
  "Copilot history": {
    coreBelief: "Users should be able to access and export their Copilot history; the current UX needs work.",
    decisionRules: [
      "If using Microsoft 365 Copilot, then use in-app Conversations; else use the Privacy Dashboard.",
      "If processing share URLs, then scrape HTML/JSON; do not treat them as chat logs.",
    ],
    openQuestions: [
      "Exact dashboard paths or APIs for Copilot items.",
      "Whether exports include assistant turns verbatim.",
    ],
  },
  "Memory feature": {
    coreBelief: "Memory must be intentional, auditable, and explainable; avoid echo chambers.",
    decisionRules: [
      "If revisiting a topic, then it influences but is not remembered unless asked.",
      "If maintaining memory hygiene, then review stored items, delete narrow preferences, and seek counterarguments.",
    ],
    openQuestions: [
      "Scope of bulk memory ingestion vs curated summaries.",
      "How often tier 0/1 statements should be re-reviewed by a human.",
    ],
  },
  "AI strategy & games": {
    coreBelief: "Cooperation, openness, and principled consistency enable long-term strategy; encode patience.",
    decisionRules: [
      "If designing systems, then reward long horizons and reputation; penalize betrayal long-term.",
      "If possible, then prefer positive-sum framing and declare consistent principles.",
    ],
    openQuestions: ["Metrics for engineered patience and principled consistency."],
  },
  "Modern slavery Q&A": {
    coreBelief: "Affirm Modern Slavery Act principles; recognize indicators like document retention.",
    decisionRules: ["If an employer retains identity documents, then treat it as a forced-labour indicator."],
    openQuestions: [],
  },
  "Space history": {
    coreBelief: "Programme decisions and institutional pressure explain most space-age successes and failures.",
    decisionRules: ["If comparing missions, then anchor on dates and the decision record before outcomes."],
    openQuestions: [],
  },
  "History threads": {
    coreBelief: "Clarify timelines and causality; institutions often outperform individuals.",
    decisionRules: ["If a claim hinges on a date, then verify the sequence before drawing conclusions."],
    openQuestions: [],
  },
  "Dishwasher tips": {
    coreBelief: "Rinse aid depletes per cycle; salt less often; map symbols correctly.",
    decisionRules: ["If the rinse-aid light is on, then refill rinse aid, not salt."],
    openQuestions: [],
  },
  "Materials & outdoor": {
    coreBelief: "Sisal tolerates UV; flax rots faster; pick materials per moisture exposure.",
    decisionRules: ["If a rope stays wet outdoors, then prefer sisal or synthetic fibre over flax."],
    openQuestions: [],
  },
  "Android dev & security": {
    coreBelief: "Android root is disabled by default; bank apps detect it via integrity checks; Docker is limited.",
    decisionRules: [
      "If an app relies on Play Integrity, then expect it to fail on rooted devices.",
      "If containers are needed on a phone, then use Termux with userland tools rather than Docker.",
    ],
    openQuestions: ["Which integrity signals survive a locked bootloader with custom ROMs."],
  },
  "Licensing philosophy": {
    coreBelief: "Question global license enforceability; prefer public-domain-first ideals.",
    decisionRules: ["If choosing a license, then prefer the most permissive one that still protects attribution."],
    openQuestions: ["How copyleft obligations are enforced across jurisdictions."],
  },
  "Data engineering & logging": {
    coreBelief: "Log succinctly; avoid duplicated noise; measure bytes; prefer structured logging.",
    decisionRules: [
      "If a log line repeats per record, then aggregate it into a summary line.",
      "If storage cost matters, then measure bytes before and after each transformation.",
    ],
    openQuestions: ["Retention budget for raw logs vs derived artifacts."],
  },
  "Culture & media": {
    coreBelief: "Clarify cultural references and media history; separate fact from myth.",
    decisionRules: [],
    openQuestions: [],
  },
  "Ethics & policy": {
    coreBelief: "Maintain moral clarity on harms; nuance where appropriate, clarity where required.",
    decisionRules: ["If a question concerns serious harm, then answer with clarity before nuance."],
    openQuestions: [],
  },
  Misc: GENERIC_TEMPLATE,
} satisfies Record<TopicLabel, SynthesisTemplate>;

const TEMPLATE_TABLE: ReadonlyMap<string, SynthesisTemplate> = new Map(Object.entries(SYNTHESIS_TEMPLATES));

/** Classifier topics without a template; empty when the table is complete. */
export function missingSynthesisTemplates(
  topics: readonly string[] = TOPIC_LABELS,
): string[] {
  return topics.filter((t) => !TEMPLATE_TABLE.has(t));
}

export function templateFor(topic: string): SynthesisTemplate {
  return TEMPLATE_TABLE.get(topic) ?? GENERIC_TEMPLATE;
}

/** Group by primary topic; clusters and their members keep first-appearance order. */
export function clusterRecords(records: readonly MemoryRecord[]): Clusters {
  const clusters: Clusters = new Map();
  for (const r of records) {
    const bucket = clusters.get(r.primaryTopic);
    if (bucket) {
      bucket.push(r);
    } else {
      clusters.set(r.primaryTopic, [r]);
    }
  }
  return clusters;
}

export function synthesizeCluster(topic: string, items: readonly MemoryRecord[]): Synthesis {
  const template = templateFor(topic);
  return {
    topic,
    count: items.length,
    coreBelief: template.coreBelief,
    decisionRules: [...template.decisionRules],
    openQuestions: template.openQuestions.slice(0, 3),
    stanceEvolution: STANCE_EVOLUTION_NOTE,
  };
}

export function synthesizeClusters(clusters: Clusters): Map<string, Synthesis> {
  const out = new Map<string, Synthesis>();
  for (const [topic, items] of clusters) out.set(topic, synthesizeCluster(topic, items));
  return out;
}
