/**
 * Topic catalog
 *
 * Ordered first-match topic rules. Narrow rules sit above broad ones: a text
 * mentioning both Apollo and "history" must land in "Space history" because
 * that rule is checked before "History threads". Reordering this list changes
 * classification results.
 */

export const MISC_TOPIC = "Misc";

export const TOPIC_LABELS = [
  "Copilot history",
  "Memory feature",
  "AI strategy & games",
  "Modern slavery Q&A",
  "Space history",
  "History threads",
  "Dishwasher tips",
  "Materials & outdoor",
  "Android dev & security",
  "Licensing philosophy",
  "Data engineering & logging",
  "Culture & media",
  "Ethics & policy",
  MISC_TOPIC,
] as const;

export type TopicLabel = (typeof TOPIC_LABELS)[number];

export const TOPIC_RULES: ReadonlyArray<{ re: RegExp; topic: TopicLabel }> = [
  { re: /copilot|privacy|dashboard|activity history|\bexport(?:s|ed|ing)?\b/i, topic: "Copilot history" },
  { re: /memory|remember|echo chamber/i, topic: "Memory feature" },
  {
    re: /grand strategy|paradox|europa|cooperation|patience|zero-sum|openness|consistency/i,
    topic: "AI strategy & games",
  },
  { re: /modern slavery|slavery act|debt bondage|domestic servitude/i, topic: "Modern slavery Q&A" },
  { re: /\bapollo\b|challenger|space shuttle|space race|moon landing|\bnasa\b/i, topic: "Space history" },
  {
    re: /napoleon|malta|french revolution|\broma\b|\bsinti\b|roosevelt|thanksgiving|\bhistory\b|historical/i,
    topic: "History threads",
  },
  { re: /dishwasher|rinse aid|\bsalt\b|siemens/i, topic: "Dishwasher tips" },
  { re: /sisal|\bflax\b|\bvlas\b|manila|\bflask\b/i, topic: "Materials & outdoor" },
  {
    re: /android|\broot(?:ed|ing)?\b|safetynet|play integrity|termux|docker|podman/i,
    topic: "Android dev & security",
  },
  { re: /\bgpl\b|licen[cs]e|rijnsburg/i, topic: "Licensing philosophy" },
  {
    re: /\bdbt\b|\bbytes?\b|gigabyte|log\(|logging|data (?:engineering|pipeline)/i,
    topic: "Data engineering & logging",
  },
  { re: /downton abbey|bob marley|\bactors?\b|\bseries\b|\bshow(?:s|n|ed|ing)?\b|\bmovies?\b/i, topic: "Culture & media" },
  { re: /murder|ethics|\bmorals?\b|\ballowed\b/i, topic: "Ethics & policy" },
];

/** Topics whose first user record is a tier-1 anchor. */
export const ANCHOR_TOPICS: ReadonlySet<string> = new Set<TopicLabel>([
  "Copilot history",
  "Memory feature",
  "AI strategy & games",
]);

/** Topics whose records are memory candidates at priority 2, for either role. */
export const PRIORITY_TWO_TOPICS: ReadonlySet<string> = new Set<TopicLabel>([
  "Android dev & security",
  "Licensing philosophy",
]);

/** Topics whose first user and assistant records are tier-2 operational notes. */
export const OPERATIONAL_TOPICS: ReadonlySet<string> = new Set<TopicLabel>([
  "Android dev & security",
  "Licensing philosophy",
  "Data engineering & logging",
]);
