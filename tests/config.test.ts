import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { configFromEnv, configFromFlags, parseConfig } from "../src/config.js";

test("parseConfig fills documented defaults", () => {
  const cfg = parseConfig({});
  assert.equal(cfg.inputPath, undefined);
  assert.equal(cfg.outDir, path.join(process.cwd(), "memory_artifacts"));
  assert.equal(cfg.stateDir, path.join(process.cwd(), "memory_artifacts", "state"));
  assert.deepEqual(cfg.dateRange, { start: null, end: null });
  assert.equal(cfg.ontologyMode, "load");
  assert.equal(cfg.compactMode, true);
  assert.equal(cfg.autoCarveEnabled, true);
  assert.equal(cfg.autoCarveTopN, 8);
  assert.equal(cfg.autoCarveMinDocFreq, 3);
  assert.equal(cfg.wikiCategoryThreshold, 3);
  assert.equal(cfg.excerptMaxChars, 400);
  assert.equal(cfg.subtagCap, 7);
  assert.deepEqual(cfg.urlAllowList, ["wikipedia.org"]);
  assert.equal(cfg.applyPromotions, false);
  assert.equal(cfg.sqliteExportPath, undefined);
  assert.equal(cfg.backupRetentionDays, 30);
});

test("MEMORY_BACKUP_RETENTION_DAYS sets the backup retention window", () => {
  assert.equal(parseConfig(configFromEnv({ MEMORY_BACKUP_RETENTION_DAYS: "7" })).backupRetentionDays, 7);
  assert.equal(parseConfig(configFromEnv({ MEMORY_BACKUP_RETENTION_DAYS: "0" })).backupRetentionDays, 30);
});

test("ONTOLOGY_BUILD wins over ONTOLOGY_SUGGEST", () => {
  assert.equal(configFromEnv({ ONTOLOGY_BUILD: "1", ONTOLOGY_SUGGEST: "true" }).ontologyMode, "rebuild");
  assert.equal(configFromEnv({ ONTOLOGY_BUILD: "0", ONTOLOGY_SUGGEST: "true" }).ontologyMode, "suggest");
  assert.equal(configFromEnv({}).ontologyMode, undefined);
});

test("command-line flags override environment values key by key", () => {
  const cfg = parseConfig({
    ...configFromEnv({ ONTOLOGY_SUGGEST: "1", MEMORY_OUT_DIR: "/env/out", MEMORY_STATE_DIR: "/env/state", COMPACT_MODE: "1" }),
    ...configFromFlags({ mode: "rebuild", out: "/flag/out", verbose: true, autoCarve: false, wikiThreshold: "5" }),
  });
  assert.equal(cfg.ontologyMode, "rebuild");
  assert.equal(cfg.outDir, "/flag/out");
  assert.equal(cfg.stateDir, "/env/state");
  assert.equal(cfg.compactMode, false);
  assert.equal(cfg.autoCarveEnabled, false);
  assert.equal(cfg.wikiCategoryThreshold, 5);
});

test("unusable flag values are dropped", () => {
  assert.deepEqual(configFromFlags({ carve: "not json", mode: "bogus" }), {});
  assert.deepEqual(configFromEnv({ MEMORY_CARVE: "[oops" }), {});
});

test("carve directives keep only named string patterns", () => {
  const cfg = parseConfig({
    carveDirectives: [{ name: "A", pattern: "a" }, { name: "", pattern: "x" }, "junk", { name: "B" }],
  });
  assert.deepEqual(cfg.carveDirectives, [{ name: "A", pattern: "a" }]);
});

test("date bounds are parsed and invalid ones ignored", () => {
  const cfg = parseConfig({ startDate: "2024-01-01", endDate: "not a date" });
  assert.equal(cfg.dateRange.start?.toISOString(), "2024-01-01T00:00:00.000Z");
  assert.equal(cfg.dateRange.end, null);
});
