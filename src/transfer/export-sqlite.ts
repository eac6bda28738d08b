import path from "node:path";
import { mkdir } from "node:fs/promises";
import Database from "better-sqlite3";
import type { MemoryRecord, MemoryTiers, Ontology, SourceRecord } from "../types.js";
import { TIER_LEVELS } from "../tiering.js";
import { SQLITE_DATA_TABLES, SQLITE_SCHEMA_VERSION, SQLITE_TABLES_SQL } from "./sqlite-schema.js";

export interface ExportSqliteOptions {
  outFile: string;
  records: readonly MemoryRecord[];
  tiers: MemoryTiers;
  ontology: Ontology;
  sources: readonly SourceRecord[];
  builtAt: Date;
}

/**
 * Write the run's records, tiers, ontology and source registry into one
 * SQLite file. Existing rows are replaced, so re-exporting is safe.
 */
export async function exportSqlite(opts: ExportSqliteOptions): Promise<void> {
  const outAbs = path.resolve(opts.outFile);
  await mkdir(path.dirname(outAbs), { recursive: true });

  const db = new Database(outAbs);
  try {
    db.exec("PRAGMA journal_mode=WAL;");
    db.exec(SQLITE_TABLES_SQL);

    const insertMeta = db.prepare("INSERT OR REPLACE INTO meta(key,value) VALUES (?,?)");
    const insertRecord = db.prepare(
      `INSERT INTO records(provenance_id, role, excerpt, timestamp, thread_id, intent, primary_topic,
         subtopic_tags, entities, memory_candidate, priority, evolution_link)
       VALUES (?,?,?,?,?,?,?,?,?,?,?,?)`,
    );
    const insertEntry = db.prepare(
      `INSERT INTO tier_entries(tier, position, primary_topic, core_belief, excerpt, provenance, priority, role)
       VALUES (?,?,?,?,?,?,?,?)`,
    );
    const insertValue = db.prepare("INSERT INTO ontology_values(id, label, tier) VALUES (?,?,?)");
    const insertMap = db.prepare("INSERT INTO topic_map(topic, slug) VALUES (?,?)");
    const insertLink = db.prepare("INSERT OR IGNORE INTO value_links(slug, value_id) VALUES (?,?)");
    const insertSource = db.prepare(
      "INSERT INTO sources(type, id, label, count, last_seen, url) VALUES (?,?,?,?,?,?)",
    );

    const tx = db.transaction(() => {
      for (const table of SQLITE_DATA_TABLES) db.exec(`DELETE FROM ${table}`);

      insertMeta.run("schemaVersion", String(SQLITE_SCHEMA_VERSION));
      insertMeta.run("builtAt", opts.builtAt.toISOString());

      for (const r of opts.records) {
        insertRecord.run(
          r.provenanceId,
          r.role,
          r.excerpt,
          r.timestamp,
          r.threadId,
          r.intent,
          r.primaryTopic,
          r.subtopicTags.join(";"),
          r.entities.join(";"),
          r.memoryCandidate ? 1 : 0,
          r.priority,
          r.evolutionLink,
        );
      }
      for (const tier of TIER_LEVELS) {
        opts.tiers[tier].forEach((e, position) => {
          insertEntry.run(tier, position, e.primaryTopic, e.coreBelief, e.excerpt, e.provenance, e.priority, e.role);
        });
      }
      for (const v of opts.ontology.values) insertValue.run(v.id, v.label, v.tier);
      for (const [topic, slug] of Object.entries(opts.ontology.map)) insertMap.run(topic, slug);
      for (const [slug, ids] of Object.entries(opts.ontology.valueMap)) {
        for (const id of ids) insertLink.run(slug, id);
      }
      for (const s of opts.sources) {
        insertSource.run(s.type, s.id, s.label, s.count, s.lastSeen, s.url ?? null);
      }
    });

    tx();
  } finally {
    db.close();
  }
}
