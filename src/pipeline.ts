import type {
  CategoryDecision,
  Clusters,
  CrossReferenceRow,
  EngineConfig,
  MemoryRecord,
  MemoryTiers,
  Ontology,
  OntologySeeds,
  PromotionOutcome,
  PromotionProposal,
  RawTurn,
  SourceRecord,
  Synthesis,
} from "./types.js";
import { log } from "./logger.js";
import { AuditLog } from "./audit.js";
import { classifyTurns } from "./ingest.js";
import { dedupeRecords } from "./dedupe.js";
import { carveRecords, FrequencyTopicDiscovery, type UnclassifiedTopicDiscovery } from "./carve.js";
import { clusterRecords, missingSynthesisTemplates, synthesizeClusters } from "./synthesis.js";
import { assignTiers, refineRecords } from "./tiering.js";
import { buildOntology, observedTopics } from "./ontology/builder.js";
import {
  applyOntologyPatch,
  isEmptyPatch,
  suggestOntologyPatch,
  type OntologyPatch,
} from "./ontology/patch.js";
import { promoteWikiCategories } from "./ontology/promote.js";
import {
  discoverSources,
  mergeSources,
  suggestSourceImprovements,
  withSeedSources,
  type SourceSuggestions,
} from "./ontology/sources.js";
import { OntologyStore } from "./ontology/store.js";
import { buildCrossReference, truncateWords } from "./crossref.js";
import { applyPromotions, proposePromotions } from "./promotion.js";

export interface PipelineResult {
  builtAt: Date;
  /** Classified, deduplicated and carved records. */
  records: MemoryRecord[];
  /** Records after the refinement pass, with evolution links. */
  refinedRecords: MemoryRecord[];
  clusters: Clusters;
  syntheses: Map<string, Synthesis>;
  /** Final tiers, after any approved promotions. */
  tiers: MemoryTiers;
  ontology: Ontology;
  seeds: OntologySeeds;
  sources: SourceRecord[];
  decisions: CategoryDecision[];
  crossReference: CrossReferenceRow[];
  proposals: PromotionProposal[];
  promotionOutcome: PromotionOutcome;
  /** Set in suggest mode only. */
  patch: OntologyPatch | null;
  suggestions: SourceSuggestions | null;
  backupPath: string | null;
  audit: AuditLog;
}

export interface PipelineOptions {
  /** Replaces the default frequency-based discovery for leftover Misc records. */
  discovery?: UnclassifiedTopicDiscovery;
}

/**
 * One batch run over a conversation log. Persisted state under
 * `config.stateDir` is read once at the start of the ontology stage and
 * written once at the end.
 */
export class MemoryPipeline {
  private readonly discovery: UnclassifiedTopicDiscovery;

  constructor(
    private readonly config: EngineConfig,
    options: PipelineOptions = {},
  ) {
    const missing = missingSynthesisTemplates();
    if (missing.length > 0) {
      throw new Error(`synthesis templates missing for topic(s): ${missing.join(", ")}`);
    }
    this.discovery =
      options.discovery ?? new FrequencyTopicDiscovery(config.autoCarveTopN, config.autoCarveMinDocFreq);
  }

  async run(turns: readonly RawTurn[], now: Date = new Date()): Promise<PipelineResult> {
    const cfg = this.config;
    const audit = new AuditLog();
    const store = new OntologyStore(cfg.stateDir, audit, { backupRetentionDays: cfg.backupRetentionDays });

    const classified = classifyTurns(turns, cfg);
    const deduped = dedupeRecords(classified);
    const records = carveRecords(deduped, {
      directives: cfg.carveDirectives,
      discovery: cfg.autoCarveEnabled ? this.discovery : null,
      audit,
    });
    const clusters = clusterRecords(records);
    const syntheses = synthesizeClusters(clusters);
    const baseTiers = assignTiers(clusters, syntheses);
    const refinedRecords = refineRecords(records, baseTiers);
    log.info(
      `pipeline: ${turns.length} turn(s) -> ${classified.length} in range -> ${records.length} record(s) in ${clusters.size} topic(s)`,
    );

    const [persisted, registry, seeds, approved] = await Promise.all([
      store.loadOntology(),
      store.loadSources(),
      store.loadSeeds(),
      store.loadApprovedPromotions(),
    ]);

    const sources = mergeSources(
      withSeedSources(registry, seeds.sources),
      discoverSources(refinedRecords, seeds.authors, audit),
    );
    audit.note("sources", `registry holds ${sources.length} source(s)`);

    let ontology: Ontology;
    let decisions: CategoryDecision[];
    let patch: OntologyPatch | null = null;
    let ontologyChanged = false;

    if (cfg.ontologyMode === "rebuild" || !persisted) {
      if (!persisted && cfg.ontologyMode !== "rebuild") {
        audit.note("ontology", "no persisted ontology; bootstrapping from this run");
      }
      const built = buildOntology({
        records: refinedRecords,
        tiers: baseTiers,
        seeds,
        existing: persisted,
        sources,
        wikiCategoryThreshold: cfg.wikiCategoryThreshold,
        audit,
      });
      ontology = built.ontology;
      decisions = built.decisions;
      ontologyChanged = true;
    } else if (cfg.ontologyMode === "suggest") {
      const suggested = suggestOntologyPatch(persisted, {
        records: refinedRecords,
        seeds,
        sources,
        wikiCategoryThreshold: cfg.wikiCategoryThreshold,
        audit,
      });
      patch = suggested.patch;
      decisions = suggested.decisions;
      ontology = persisted;
      if (isEmptyPatch(patch)) {
        audit.note("ontology", "suggest: no additive changes");
      } else if (cfg.ontologyAutoApply) {
        ontology = applyOntologyPatch(persisted, patch);
        ontologyChanged = true;
        audit.note("ontology", "suggest: patch applied");
      } else {
        const patchPath = await store.savePatch(patch);
        audit.note("ontology", `suggest: patch written to ${patchPath} for review`);
      }
    } else {
      ontology = persisted;
      const unmapped = observedTopics(refinedRecords).filter((t) => !(t in persisted.map));
      decisions = observedTopics(refinedRecords)
        .filter((t) => t in persisted.map)
        .map((topic) => ({ topic, slug: persisted.map[topic] ?? "", rule: "persisted" }));
      if (unmapped.length > 0) {
        audit.note(
          "ontology",
          `${unmapped.length} observed topic(s) missing from the persisted map: ${unmapped.join(", ")}`,
        );
      }
      // Load mode never promotes; report what rebuild or suggest would add.
      const unpromoted = promoteWikiCategories(persisted, sources, cfg.wikiCategoryThreshold).eligible.filter(
        (slug) => !(slug in persisted.categories),
      );
      if (unpromoted.length > 0) {
        audit.note(
          "ontology",
          `${unpromoted.length} wikipedia categor${unpromoted.length === 1 ? "y" : "ies"} at or above the threshold not yet promoted: ${unpromoted.join(", ")} (run rebuild or suggest)`,
        );
      }
    }

    const proposals = proposePromotions(baseTiers, refinedRecords, ontology);
    const toApply = approved ?? (cfg.applyPromotions ? proposals : []);
    if (approved) audit.note("promotion", `${approved.length} approved proposal(s) loaded`);
    const promotionOutcome = applyPromotions(baseTiers, toApply, refinedRecords);
    for (const p of promotionOutcome.applied) {
      audit.note("promotion", `promoted to tier 2: "${truncateWords(p.excerpt, 8)}" (${p.provenance})`);
    }
    for (const { proposal, reason } of promotionOutcome.skipped) {
      audit.note("promotion", `skipped (${reason}): "${truncateWords(proposal.excerpt, 8)}"`);
    }
    const tiers = promotionOutcome.tiers;
    const crossReference = buildCrossReference(tiers, ontology);

    const suggestions = cfg.sourcesSuggest
      ? suggestSourceImprovements(sources, seeds.authors, cfg.wikiCategoryThreshold)
      : null;

    const backupPath = ontologyChanged ? await store.saveOntology(ontology, now) : null;
    await store.saveSources(sources);

    return {
      builtAt: now,
      records,
      refinedRecords,
      clusters,
      syntheses,
      tiers,
      ontology,
      seeds,
      sources,
      decisions,
      crossReference,
      proposals,
      promotionOutcome,
      patch,
      suggestions,
      backupPath,
      audit,
    };
  }
}
