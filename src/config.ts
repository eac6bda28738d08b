import path from "node:path";
import type { CarveDirective, EngineConfig, OntologyMode } from "./types.js";
import { log } from "./logger.js";

const DEFAULT_OUT_DIR = path.join(process.cwd(), "memory_artifacts");
const DEFAULT_STATE_DIR = path.join(process.cwd(), "memory_artifacts", "state");

export const DEFAULT_EXCERPT_MAX_CHARS = 400;
export const DEFAULT_SUBTAG_CAP = 7;
export const DEFAULT_WIKI_CATEGORY_THRESHOLD = 3;
export const DEFAULT_BACKUP_RETENTION_DAYS = 30;
export const DEFAULT_URL_ALLOW_LIST = ["wikipedia.org"];

const VALID_MODES: readonly OntologyMode[] = ["load", "rebuild", "suggest"];

function isOntologyMode(value: unknown): value is OntologyMode {
  return VALID_MODES.some((m) => m === value);
}

function parseDate(value: unknown, label: string): Date | null {
  if (value instanceof Date) return Number.isFinite(value.getTime()) ? value : null;
  if (typeof value !== "string" || value.trim().length === 0) return null;
  const ms = Date.parse(value.trim());
  if (!Number.isFinite(ms)) {
    log.warn(`ignoring ${label}: "${value}" is not a valid date`);
    return null;
  }
  return new Date(ms);
}

function parseCarveDirectives(raw: unknown): CarveDirective[] {
  if (!Array.isArray(raw)) return [];
  const out: CarveDirective[] = [];
  for (const item of raw) {
    if (!item || typeof item !== "object") continue;
    const rec = item as Record<string, unknown>;
    if (typeof rec.name === "string" && rec.name.length > 0 && typeof rec.pattern === "string") {
      out.push({ name: rec.name, pattern: rec.pattern });
    }
  }
  return out;
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback;
}

export function parseConfig(raw: unknown): EngineConfig {
  const cfg =
    raw && typeof raw === "object" && !Array.isArray(raw)
      ? (raw as Record<string, unknown>)
      : {};

  const ontologyMode: OntologyMode = isOntologyMode(cfg.ontologyMode) ? cfg.ontologyMode : "load";

  const dateRange = {
    start: parseDate(cfg.startDate, "startDate"),
    end: parseDate(cfg.endDate, "endDate"),
  };
  if (dateRange.start && dateRange.end && dateRange.start > dateRange.end) {
    log.warn("startDate is after endDate; every dated turn will be filtered out");
  }

  return {
    inputPath:
      typeof cfg.inputPath === "string" && cfg.inputPath.length > 0 ? cfg.inputPath : undefined,
    outDir:
      typeof cfg.outDir === "string" && cfg.outDir.length > 0 ? cfg.outDir : DEFAULT_OUT_DIR,
    stateDir:
      typeof cfg.stateDir === "string" && cfg.stateDir.length > 0 ? cfg.stateDir : DEFAULT_STATE_DIR,
    dateRange,
    carveDirectives: parseCarveDirectives(cfg.carveDirectives),
    autoCarveEnabled: cfg.autoCarveEnabled !== false,
    autoCarveTopN: positiveInt(cfg.autoCarveTopN, 8),
    autoCarveMinDocFreq: positiveInt(cfg.autoCarveMinDocFreq, 3),
    compactMode: cfg.compactMode !== false,
    ontologyMode,
    ontologyAutoApply: cfg.ontologyAutoApply === true,
    sourcesSuggest: cfg.sourcesSuggest === true,
    wikiCategoryThreshold: positiveInt(cfg.wikiCategoryThreshold, DEFAULT_WIKI_CATEGORY_THRESHOLD),
    excerptMaxChars: positiveInt(cfg.excerptMaxChars, DEFAULT_EXCERPT_MAX_CHARS),
    subtagCap: positiveInt(cfg.subtagCap, DEFAULT_SUBTAG_CAP),
    urlAllowList: Array.isArray(cfg.urlAllowList)
      ? cfg.urlAllowList.filter((d): d is string => typeof d === "string").map((d) => d.toLowerCase())
      : DEFAULT_URL_ALLOW_LIST,
    applyPromotions: cfg.applyPromotions === true,
    sqliteExportPath:
      typeof cfg.sqliteExportPath === "string" && cfg.sqliteExportPath.length > 0
        ? cfg.sqliteExportPath
        : undefined,
    backupRetentionDays: positiveInt(cfg.backupRetentionDays, DEFAULT_BACKUP_RETENTION_DAYS),
    debug: cfg.debug === true,
  };
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.length === 0) return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

function envInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Translate parsed `run` command options into a raw config object. Only
 * options the user actually passed are set, so they override env values key
 * by key when spread over configFromEnv().
 */
export function configFromFlags(options: Record<string, unknown>): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  const str = (key: string): string | undefined =>
    typeof options[key] === "string" && String(options[key]).length > 0 ? String(options[key]) : undefined;

  const input = str("input");
  if (input) raw.inputPath = input;
  const out = str("out");
  if (out) raw.outDir = out;
  const state = str("state");
  if (state) raw.stateDir = state;
  const start = str("start");
  if (start) raw.startDate = start;
  const end = str("end");
  if (end) raw.endDate = end;
  const mode = str("mode");
  if (mode) {
    if (isOntologyMode(mode)) {
      raw.ontologyMode = mode;
    } else {
      log.warn(`ignoring --mode ${mode}: expected one of ${VALID_MODES.join(", ")}`);
    }
  }
  const sqlite = str("sqlite");
  if (sqlite) raw.sqliteExportPath = sqlite;

  if (options.verbose === true) raw.compactMode = false;
  if (options.autoApply === true) raw.ontologyAutoApply = true;
  if (options.sourcesSuggest === true) raw.sourcesSuggest = true;
  if (options.applyPromotions === true) raw.applyPromotions = true;
  if (options.autoCarve === false) raw.autoCarveEnabled = false;
  if (options.debug === true) raw.debug = true;

  const threshold = envInt(str("wikiThreshold"));
  if (threshold !== undefined) raw.wikiCategoryThreshold = threshold;

  const carve = str("carve");
  if (carve) {
    try {
      raw.carveDirectives = JSON.parse(carve) as unknown;
    } catch {
      log.warn("ignoring --carve: not valid JSON");
    }
  }
  return raw;
}

/**
 * Translate the documented environment flags into a raw config object for
 * parseConfig(). ONTOLOGY_BUILD wins over ONTOLOGY_SUGGEST when both are set.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  if (env.MEMORY_INPUT) raw.inputPath = env.MEMORY_INPUT;
  if (env.MEMORY_OUT_DIR) raw.outDir = env.MEMORY_OUT_DIR;
  if (env.MEMORY_STATE_DIR) raw.stateDir = env.MEMORY_STATE_DIR;
  if (env.MEMORY_START_DATE) raw.startDate = env.MEMORY_START_DATE;
  if (env.MEMORY_END_DATE) raw.endDate = env.MEMORY_END_DATE;

  const compact = envFlag(env.COMPACT_MODE);
  if (compact !== undefined) raw.compactMode = compact;

  if (envFlag(env.ONTOLOGY_BUILD)) {
    raw.ontologyMode = "rebuild";
  } else if (envFlag(env.ONTOLOGY_SUGGEST)) {
    raw.ontologyMode = "suggest";
  }
  if (envFlag(env.ONTOLOGY_AUTO_APPLY)) raw.ontologyAutoApply = true;
  if (envFlag(env.ONTOLOGY_SOURCES_SUGGEST)) raw.sourcesSuggest = true;
  if (envFlag(env.PROMOTIONS_APPLY)) raw.applyPromotions = true;
  if (envFlag(env.MEMORY_DEBUG)) raw.debug = true;

  const threshold = envInt(env.WIKI_CATEGORY_THRESHOLD);
  if (threshold !== undefined) raw.wikiCategoryThreshold = threshold;
  const retention = envInt(env.MEMORY_BACKUP_RETENTION_DAYS);
  if (retention !== undefined) raw.backupRetentionDays = retention;

  if (env.MEMORY_CARVE) {
    try {
      raw.carveDirectives = JSON.parse(env.MEMORY_CARVE) as unknown;
    } catch {
      log.warn("ignoring MEMORY_CARVE: not valid JSON");
    }
  }
  return raw;
}
