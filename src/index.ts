export type * from "./types.js";
export { PROVENANCE_SEPARATOR } from "./types.js";
export { initLogger, log } from "./logger.js";
export { AuditLog, compilePattern, type AuditSection, type AuditNote } from "./audit.js";
export { parseConfig, configFromEnv, configFromFlags } from "./config.js";
export { buildExcerpt, collapseWhitespace, redactText } from "./redact.js";
export {
  classifyIntent,
  classifyTopic,
  extractEntities,
  extractSubtags,
  memoryFlagAndPriority,
  normalizeRole,
} from "./classify.js";
export { TOPIC_LABELS, TOPIC_RULES, type TopicLabel } from "./topic-rules.js";
export { classifyTurns } from "./ingest.js";
export { dedupeRecords } from "./dedupe.js";
export {
  carveRecords,
  FrequencyTopicDiscovery,
  type UnclassifiedTopicDiscovery,
} from "./carve.js";
export {
  clusterRecords,
  missingSynthesisTemplates,
  synthesizeCluster,
  SYNTHESIS_TEMPLATES,
  type SynthesisTemplate,
} from "./synthesis.js";
export { assignTiers, linkEvolution, refineRecords } from "./tiering.js";
export { scoreValueCandidates, slugify, tokenize } from "./tokens.js";
export { CategoryResolver } from "./ontology/resolve.js";
export { buildOntology } from "./ontology/builder.js";
export { discoverSources, mergeSources, suggestSourceImprovements } from "./ontology/sources.js";
export { promoteWikiCategories } from "./ontology/promote.js";
export { applyOntologyPatch, suggestOntologyPatch, type OntologyPatch } from "./ontology/patch.js";
export { OntologyStore } from "./ontology/store.js";
export { buildCrossReference, extractInfluences, linkValuesForEntry } from "./crossref.js";
export { applyPromotions, proposePromotions } from "./promotion.js";
export { readTurns, parseTurns } from "./log-reader.js";
export { MemoryPipeline, type PipelineResult, type PipelineOptions } from "./pipeline.js";
export { writeArtifacts } from "./artifacts.js";
export { exportSqlite } from "./transfer/export-sqlite.js";
