import path from "node:path";
import type {
  CategoryDecision,
  CrossReferenceRow,
  EngineConfig,
  MemoryTiers,
  PromotionOutcome,
  PromotionProposal,
  SourceRecord,
  Synthesis,
  TierEntry,
  TierLevel,
} from "./types.js";
import { log } from "./logger.js";
import { compareText } from "./tokens.js";
import { TIER_LEVELS } from "./tiering.js";
import { topSources, type SourceSuggestions } from "./ontology/sources.js";
import { writeJsonFile, writeTextFile } from "./transfer/fs-utils.js";
import { exportSqlite } from "./transfer/export-sqlite.js";
import type { PipelineResult } from "./pipeline.js";

export const BUILD_LOG_TOP_SOURCES = 15;

function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\s+/g, " ").trim();
}

export function tiersToJson(tiers: MemoryTiers): Array<TierEntry & { tier: TierLevel }> {
  return TIER_LEVELS.flatMap((tier) => tiers[tier].map((e) => ({ tier, ...e })));
}

export function renderMemoryMart(tiers: MemoryTiers): string {
  const lines = ["# Memory Mart (Tier 0/1)", ""];
  for (const tier of [0, 1] as const) {
    lines.push(`## Tier ${tier}`);
    for (const e of tiers[tier]) {
      if (tier === 0) {
        lines.push(`- [${e.primaryTopic}] ${e.coreBelief}`);
      } else {
        lines.push(`- [${e.primaryTopic}] ${e.coreBelief} — "${e.excerpt}" (from ${e.provenance})`);
      }
    }
    lines.push("");
  }
  return lines.join("\n");
}

export function renderCrossReference(rows: readonly CrossReferenceRow[]): string {
  const lines = [
    "# Cross-reference (Tier 2/3)",
    "",
    "| Tier | Excerpt | Category | Values | Influences | Provenance |",
    "|---:|---|---|---|---|---|",
  ];
  for (const r of rows) {
    const values = r.values
      .map((v) => (v.tier !== undefined ? `${v.id} (T${v.tier})` : v.id))
      .join(", ");
    lines.push(
      `| ${r.tier} | ${cell(r.excerpt)} | \`${r.category}\` | ${cell(values) || "-"} | ${cell(r.influences.join(", ")) || "-"} | ${cell(r.provenance)} |`,
    );
  }
  if (rows.length === 0) lines.push("| - | (no tier 2/3 entries) | - | - | - | - |");
  lines.push("");
  return lines.join("\n");
}

function proposalLine(p: PromotionProposal): string {
  return `- [${p.primaryTopic}] "${p.excerpt}" (from ${p.provenance}) T${p.fromTier} -> T${p.toTier}: ${p.reasons.join(", ")}`;
}

export function renderPromotions(proposals: readonly PromotionProposal[], outcome: PromotionOutcome): string {
  const lines = ["# Promotions", "", "## Proposed"];
  if (proposals.length === 0) lines.push("- (none)");
  for (const p of proposals) lines.push(proposalLine(p));
  lines.push("", "## Applied");
  if (outcome.applied.length === 0) lines.push("- (none)");
  for (const p of outcome.applied) lines.push(proposalLine(p));
  lines.push("", "## Skipped");
  if (outcome.skipped.length === 0) lines.push("- (none)");
  for (const { proposal, reason } of outcome.skipped) {
    lines.push(`- (${reason}) "${proposal.excerpt}" (from ${proposal.provenance})`);
  }
  lines.push("");
  return lines.join("\n");
}

export function renderBuildLog(
  decisions: readonly CategoryDecision[],
  valueMap: Readonly<Record<string, string[]>>,
  sources: readonly SourceRecord[],
): string {
  const lines = ["# Ontology build log", "", "## Topic → category mapping decisions"];
  if (decisions.length === 0) lines.push("- (none)");
  for (const d of decisions) lines.push(`- '${d.topic}' → \`${d.slug}\` (${d.rule})`);

  lines.push("", "## value_map (category → Tier 0/1 value IDs)");
  const slugs = Object.keys(valueMap).sort(compareText);
  if (slugs.length === 0) lines.push("- (none)");
  for (const slug of slugs) lines.push(`- \`${slug}\` → ${(valueMap[slug] ?? []).join(", ")}`);

  lines.push("", `## Discovered sources (top ${BUILD_LOG_TOP_SOURCES})`);
  const top = topSources(sources, BUILD_LOG_TOP_SOURCES);
  if (top.length === 0) lines.push("- (none)");
  for (const s of top) {
    const url = s.url ? ` url: ${s.url}` : "";
    lines.push(`- [${s.type}] ${s.label || s.id} — count: ${s.count} last_seen: ${s.lastSeen}${url}`);
  }
  lines.push("");
  return lines.join("\n");
}

export function renderReport(syntheses: Iterable<Synthesis>): string {
  const all = [...syntheses];
  const lines = ["# Cluster Index", "", "| Topic | Items |", "|---|---:|"];
  for (const s of [...all].sort((a, b) => compareText(a.topic, b.topic))) {
    lines.push(`| ${cell(s.topic)} | ${s.count} |`);
  }
  for (const s of all) {
    lines.push("", `## ${s.topic} (${s.count})`, "", `- Core Belief: ${s.coreBelief}`, "- Decision Rules:");
    for (const r of s.decisionRules) lines.push(`  - ${r}`);
    lines.push("- Open Questions:");
    for (const q of s.openQuestions) lines.push(`  - ${q}`);
    lines.push(`- Stance Evolution: ${s.stanceEvolution}`);
  }
  lines.push("");
  return lines.join("\n");
}

export function renderSourceSuggestions(suggestions: SourceSuggestions): string {
  const lines = ["# Sources suggestions", ""];
  if (suggestions.categoryProposals.length > 0) {
    lines.push("## Proposed new categories from frequent Wikipedia categories");
    for (const p of suggestions.categoryProposals) {
      lines.push(`- \`${p.slug}\`: ${p.title} — mentions: ${p.count} wiki: ${p.url}`);
    }
    lines.push("");
  }
  if (suggestions.unmappedIsbns.length > 0) {
    lines.push("## ISBNs without author mapping (consider adding to seeds.authors)");
    for (const s of suggestions.unmappedIsbns) lines.push(`- ${s.id} — last_seen: ${s.lastSeen}`);
    lines.push("");
  }
  if (suggestions.categoryProposals.length === 0 && suggestions.unmappedIsbns.length === 0) {
    lines.push("- (none)", "");
  }
  return lines.join("\n");
}

/**
 * Write every report for a finished run under `config.outDir`.
 * Compact mode skips the record dumps and the cluster report.
 * Returns the written paths, relative to outDir.
 */
export async function writeArtifacts(result: PipelineResult, config: EngineConfig): Promise<string[]> {
  const outDir = path.resolve(config.outDir);
  const written: string[] = [];
  const json = async (rel: string, value: unknown): Promise<void> => {
    await writeJsonFile(path.join(outDir, rel), value);
    written.push(rel);
  };
  const text = async (rel: string, content: string): Promise<void> => {
    await writeTextFile(path.join(outDir, rel), content);
    written.push(rel);
  };

  await json("memory_tiers.json", tiersToJson(result.tiers));
  await text("memory_mart_tier01.md", renderMemoryMart(result.tiers));
  await text(path.join("final", "crossref.md"), renderCrossReference(result.crossReference));
  await text(path.join("final", "promotions.md"), renderPromotions(result.proposals, result.promotionOutcome));
  await text(
    path.join("final", "ontology_build_log.md"),
    renderBuildLog(result.decisions, result.ontology.valueMap, result.sources),
  );

  if (!config.compactMode) {
    await json("normalized.json", result.records);
    await json("refined_normalized.json", result.refinedRecords);
    await text("report.md", renderReport(result.syntheses.values()));
  }
  if (result.suggestions) {
    await text(path.join("final", "sources_suggestions.md"), renderSourceSuggestions(result.suggestions));
  }
  if (config.sqliteExportPath) {
    await exportSqlite({
      outFile: config.sqliteExportPath,
      records: result.refinedRecords,
      tiers: result.tiers,
      ontology: result.ontology,
      sources: result.sources,
      builtAt: result.builtAt,
    });
    log.info(`sqlite export written to ${config.sqliteExportPath}`);
  }

  await text(path.join("final", "audit_log.md"), result.audit.render(result.builtAt));
  log.info(`wrote ${written.length} artifact(s) to ${outDir}`);
  return written;
}
