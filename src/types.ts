export type Role = "user" | "assistant";
export type EntryRole = Role | "system";
export type TierLevel = 0 | 1 | 2 | 3;
export type ValueTier = 0 | 1;
export type OntologyMode = "load" | "rebuild" | "suggest";
export type SourceType =
  | "url_domain"
  | "wikipedia_page"
  | "wikipedia_category"
  | "isbn"
  | "author";

/** Separator placed between provenance ids when duplicate records merge. */
export const PROVENANCE_SEPARATOR = " || ";

export interface RawTurn {
  conversationId: string;
  /** Best-effort ISO-8601; may be blank or unparsable. */
  timestamp: string;
  author: string;
  text: string;
}

export interface MemoryRecord {
  timestamp: string | null;
  threadId: string;
  role: Role;
  intent: string;
  primaryTopic: string;
  subtopicTags: string[];
  entities: string[];
  excerpt: string;
  memoryCandidate: boolean;
  /** 1 is the highest importance. */
  priority: number;
  provenanceId: string;
  /** Provenance of the chronologically preceding record with the same topic and role. */
  evolutionLink: string;
}

export type Clusters = Map<string, MemoryRecord[]>;

export interface Synthesis {
  topic: string;
  count: number;
  coreBelief: string;
  decisionRules: string[];
  openQuestions: string[];
  stanceEvolution: string;
}

export interface TierEntry {
  primaryTopic: string;
  coreBelief: string;
  excerpt: string;
  provenance: string;
  priority: number;
  role: EntryRole;
}

export type MemoryTiers = Record<TierLevel, TierEntry[]>;

export interface OntologyValue {
  id: string;
  label: string;
  tier: ValueTier;
}

export interface OntologyCategory {
  label: string;
  description: string;
  aliases: string[];
  externalRefs: string[];
}

export interface Ontology {
  values: OntologyValue[];
  categories: Record<string, OntologyCategory>;
  /** topic label -> category slug */
  map: Record<string, string>;
  /** category slug -> value ids */
  valueMap: Record<string, string[]>;
}

export interface SourceRecord {
  type: SourceType;
  id: string;
  label: string;
  count: number;
  lastSeen: string;
  url?: string;
  subjects?: string[];
  /** Hashed keys of occurrences already counted; keeps re-runs from inflating counts. */
  observations: string[];
}

export interface AuthorSeed {
  name: string;
  isbns: string[];
  bookPatterns: string[];
  subjects: string[];
}

export interface OntologySeeds {
  categories: Record<string, OntologyCategory>;
  /** lowercase alias -> category slug */
  aliases: Record<string, string>;
  /** regex source -> category slug, tried in declaration order */
  patterns: Record<string, string>;
  sources: SourceRecord[];
  authors: AuthorSeed[];
}

export interface CarveDirective {
  name: string;
  pattern: string;
}

export interface DateRange {
  start: Date | null;
  end: Date | null;
}

export interface EngineConfig {
  inputPath: string | undefined;
  outDir: string;
  stateDir: string;
  dateRange: DateRange;
  carveDirectives: CarveDirective[];
  autoCarveEnabled: boolean;
  autoCarveTopN: number;
  autoCarveMinDocFreq: number;
  compactMode: boolean;
  ontologyMode: OntologyMode;
  ontologyAutoApply: boolean;
  sourcesSuggest: boolean;
  wikiCategoryThreshold: number;
  excerptMaxChars: number;
  subtagCap: number;
  /** Domains whose URLs survive redaction in full. */
  urlAllowList: string[];
  applyPromotions: boolean;
  sqliteExportPath: string | undefined;
  /** Ontology backups older than this many days are pruned on save. */
  backupRetentionDays: number;
  debug: boolean;
}

export interface CategoryDecision {
  topic: string;
  slug: string;
  rule: string;
}

export interface LinkedValue {
  id: string;
  label: string | undefined;
  tier: ValueTier | undefined;
  score: number;
  manual: boolean;
}

export interface CrossReferenceRow {
  tier: 2 | 3;
  excerpt: string;
  category: string;
  values: LinkedValue[];
  influences: string[];
  provenance: string;
  primaryTopic: string;
}

export type PromotionReason = "strong-opinion" | "core-value-link" | "frequent-topic";

export interface PromotionProposal {
  excerpt: string;
  provenance: string;
  primaryTopic: string;
  fromTier: TierLevel;
  toTier: TierLevel;
  reasons: PromotionReason[];
}

export type PromotionSkipReason =
  | "invalid-transition"
  | "missing-from-source-tier"
  | "stale"
  | "already-at-destination";

export interface PromotionOutcome {
  tiers: MemoryTiers;
  applied: PromotionProposal[];
  skipped: Array<{ proposal: PromotionProposal; reason: PromotionSkipReason }>;
}
