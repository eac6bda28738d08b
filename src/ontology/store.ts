import path from "node:path";
import type { z } from "zod";
import type { Ontology, OntologySeeds, PromotionProposal, SourceRecord } from "../types.js";
import { AuditLog } from "../audit.js";
import { log } from "../logger.js";
import {
  ApprovedPromotionsSchema,
  OntologySchema,
  OntologySeedsSchema,
  SourceRecordSchema,
} from "../schemas.js";
import { readJsonFileIfExists, writeJsonFile } from "../transfer/fs-utils.js";
import { backupStateFile } from "../transfer/backup.js";
import type { OntologyPatch } from "./patch.js";

export const ONTOLOGY_FILE = "ontology.json";
export const SOURCES_FILE = "ontology_sources.json";
export const SEEDS_FILE = "ontology_seeds.json";
export const PATCH_FILE = "ontology_patch.json";
export const APPROVED_PROMOTIONS_FILE = "promotions_approved.json";
export const BACKUP_DIR = "backups";

const SourceRegistrySchema = SourceRecordSchema.array();

export interface OntologyStoreOptions {
  /** Days an ontology backup is kept; unset keeps every backup. */
  backupRetentionDays?: number;
}

export function emptySeeds(): OntologySeeds {
  return { categories: {}, aliases: {}, patterns: {}, sources: [], authors: [] };
}

/**
 * Persisted ontology state under one directory. Everything read here is
 * validated; a file that fails to parse or validate is treated as absent and
 * the reset is recorded in the audit log.
 */
export class OntologyStore {
  constructor(
    readonly stateDir: string,
    private readonly audit: AuditLog,
    private readonly options: OntologyStoreOptions = {},
  ) {}

  private file(name: string): string {
    return path.join(this.stateDir, name);
  }

  private async readState<T>(
    name: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | null> {
    const filePath = this.file(name);
    let raw: unknown;
    try {
      raw = await readJsonFileIfExists(filePath);
    } catch (err) {
      this.audit.warn("state", `${name} is not valid JSON; reset to empty (${String(err)})`);
      return null;
    }
    if (raw === undefined) return null;

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "unknown issue";
      this.audit.warn("state", `${name} failed validation at ${where}; reset to empty`);
      return null;
    }
    return parsed.data;
  }

  async loadOntology(): Promise<Ontology | null> {
    return this.readState(ONTOLOGY_FILE, OntologySchema);
  }

  async loadSources(): Promise<SourceRecord[]> {
    return (await this.readState(SOURCES_FILE, SourceRegistrySchema)) ?? [];
  }

  async loadSeeds(): Promise<OntologySeeds> {
    return (await this.readState(SEEDS_FILE, OntologySeedsSchema)) ?? emptySeeds();
  }

  /** Operator-approved proposals, or null when no approval file exists. */
  async loadApprovedPromotions(): Promise<PromotionProposal[] | null> {
    const approved = await this.readState(APPROVED_PROMOTIONS_FILE, ApprovedPromotionsSchema);
    return approved ? approved.proposals : null;
  }

  /** Back up the current ontology file (if any), then overwrite it. Returns the backup path. */
  async saveOntology(ontology: Ontology, now: Date = new Date()): Promise<string | null> {
    const target = this.file(ONTOLOGY_FILE);
    const backup = await backupStateFile({
      sourceFile: target,
      outDir: this.file(BACKUP_DIR),
      prefix: "ontology",
      retentionDays: this.options.backupRetentionDays,
      now,
    });
    if (backup) log.debug(`backed up ontology to ${backup}`);
    await writeJsonFile(target, ontology);
    return backup;
  }

  async saveSources(sources: readonly SourceRecord[]): Promise<void> {
    await writeJsonFile(this.file(SOURCES_FILE), sources);
  }

  async savePatch(patch: OntologyPatch): Promise<string> {
    const target = this.file(PATCH_FILE);
    await writeJsonFile(target, patch);
    return target;
  }
}
