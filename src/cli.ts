#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { Command } from "commander";
import { configFromEnv, configFromFlags, parseConfig } from "./config.js";
import { initLogger, log } from "./logger.js";
import { AuditLog } from "./audit.js";
import { readTurns } from "./log-reader.js";
import { MemoryPipeline } from "./pipeline.js";
import { writeArtifacts } from "./artifacts.js";
import { OntologyStore } from "./ontology/store.js";
import { topSources } from "./ontology/sources.js";

async function getPackageVersion(): Promise<string> {
  // Source runs sit one level below the package root, built ones two.
  for (const rel of ["../package.json", "../../package.json"]) {
    try {
      const raw = await readFile(new URL(rel, import.meta.url), "utf-8");
      const parsed = JSON.parse(raw) as { name?: string; version?: string };
      if (parsed.name === "memory-tiers" && parsed.version) return parsed.version;
    } catch {
      continue;
    }
  }
  return "unknown";
}

async function runCommand(options: Record<string, unknown>): Promise<void> {
  const config = parseConfig({ ...configFromEnv(process.env), ...configFromFlags(options) });
  initLogger({ debug: config.debug });
  if (!config.inputPath) {
    throw new Error("no input log: pass --input <file> or set MEMORY_INPUT");
  }

  const turns = await readTurns(config.inputPath);
  const pipeline = new MemoryPipeline(config);
  const result = await pipeline.run(turns);
  const written = await writeArtifacts(result, config);

  console.log(`Records: ${result.records.length} (${result.clusters.size} topics)`);
  console.log(
    `Tiers: T0=${result.tiers[0].length} T1=${result.tiers[1].length} T2=${result.tiers[2].length} T3=${result.tiers[3].length}`,
  );
  console.log(`Ontology (${config.ontologyMode}): ${Object.keys(result.ontology.categories).length} categories`);
  console.log(`Promotions: ${result.proposals.length} proposed, ${result.promotionOutcome.applied.length} applied`);
  console.log(`Artifacts in ${config.outDir}:`);
  for (const rel of written) console.log(`  ${rel}`);
}

async function sourcesCommand(options: Record<string, unknown>): Promise<void> {
  const config = parseConfig({
    ...configFromEnv(process.env),
    ...configFromFlags({ state: options.state }),
  });
  initLogger({ debug: config.debug });
  const limit = Number.parseInt(String(options.limit ?? "20"), 10);
  const type = typeof options.type === "string" ? options.type : "";

  const audit = new AuditLog();
  const store = new OntologyStore(config.stateDir, audit);
  const registry = (await store.loadSources()).filter((s) => !type || s.type === type);
  const top = topSources(registry, Number.isFinite(limit) && limit > 0 ? limit : 20);
  if (top.length === 0) {
    console.log(`No sources registered in ${config.stateDir}`);
    return;
  }
  for (const s of top) {
    const url = s.url ? `  ${s.url}` : "";
    console.log(`${String(s.count).padStart(5)}  [${s.type}] ${s.label || s.id}  last_seen: ${s.lastSeen || "-"}${url}`);
  }
}

function failWith(err: unknown): void {
  log.error("command failed", err instanceof Error ? err : new Error(String(err)));
  process.exitCode = 1;
}

const program = new Command();

program
  .name("memory-tiers")
  .description("Turn a conversation log into a tiered, ontology-linked memory store")
  .version(await getPackageVersion());

program
  .command("run")
  .description("Run the pipeline over a log and write artifacts")
  .option("-i, --input <file>", "Conversation log (JSON array or JSON lines)")
  .option("-o, --out <dir>", "Artifact output directory")
  .option("-s, --state <dir>", "Persisted ontology state directory")
  .option("-m, --mode <mode>", "Ontology mode: load|rebuild|suggest")
  .option("--auto-apply", "Apply suggested ontology patches instead of writing them for review")
  .option("--sources-suggest", "Write source-driven ontology suggestions")
  .option("--apply-promotions", "Apply this run's promotion proposals when no approval file exists")
  .option("--start <date>", "Drop turns before this date (inclusive range)")
  .option("--end <date>", "Drop turns after this date (inclusive range)")
  .option("--carve <json>", "Carve directives as JSON: [{\"name\":\"Topic\",\"pattern\":\"regex\"}]")
  .option("--no-auto-carve", "Disable frequency-based discovery for Misc records")
  .option("--wiki-threshold <n>", "Mentions needed to promote a Wikipedia category")
  .option("--sqlite <file>", "Also export the run into a SQLite file")
  .option("--verbose", "Write record dumps and the cluster report too")
  .option("--debug", "Debug logging")
  .action(async (...args: unknown[]) => {
    const options = (args[0] ?? {}) as Record<string, unknown>;
    await runCommand(options).catch(failWith);
  });

program
  .command("sources")
  .description("Show the most frequent entries of the source registry")
  .option("-s, --state <dir>", "Persisted ontology state directory")
  .option("-n, --limit <n>", "Number of entries", "20")
  .option("-t, --type <type>", "Only this source type")
  .action(async (...args: unknown[]) => {
    const options = (args[0] ?? {}) as Record<string, unknown>;
    await sourcesCommand(options).catch(failWith);
  });

await program.parseAsync();
