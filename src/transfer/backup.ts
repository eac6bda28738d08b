import path from "node:path";
import { copyFile, mkdir, readdir, rm } from "node:fs/promises";
import { fileExists } from "./fs-utils.js";

export interface BackupOptions {
  /** File to snapshot. Nothing happens when it does not exist. */
  sourceFile: string;
  outDir: string;
  /** Backup file name is `<prefix>-<timestamp>.json`. */
  prefix: string;
  /** Backups with this prefix older than `now` minus this many days are removed. */
  retentionDays?: number;
  now?: Date;
}

export function timestampDirName(now: Date): string {
  return now.toISOString().replace(/[:.]/g, "-");
}

export async function backupStateFile(opts: BackupOptions): Promise<string | null> {
  if (!(await fileExists(opts.sourceFile))) return null;
  const outDirAbs = path.resolve(opts.outDir);
  await mkdir(outDirAbs, { recursive: true });
  const now = opts.now ?? new Date();
  const ts = timestampDirName(now);
  const backupFile = path.join(outDirAbs, `${opts.prefix}-${ts}.json`);
  await copyFile(opts.sourceFile, backupFile);

  if (opts.retentionDays && opts.retentionDays > 0) {
    await enforceRetention(outDirAbs, opts.prefix, opts.retentionDays, now);
  }

  return backupFile;
}

async function enforceRetention(
  outDirAbs: string,
  prefix: string,
  retentionDays: number,
  now: Date,
): Promise<void> {
  const entries = await readdir(outDirAbs, { withFileTypes: true });
  const cutoffMs = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;

  for (const ent of entries) {
    if (!ent.isFile() || !ent.name.startsWith(`${prefix}-`)) continue;
    const stamp = ent.name.slice(prefix.length + 1).replace(/\.json$/, "");
    // Stamps are ISO8601 with [: .] replaced by "-".
    // Example: 2026-02-11T05-06-07-123Z => 2026-02-11T05:06:07.123Z
    const m = stamp.match(/^(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2})-(\d{3})Z$/);
    const iso = m ? `${m[1]}T${m[2]}:${m[3]}:${m[4]}.${m[5]}Z` : null;
    const tsMs = iso ? Date.parse(iso) : NaN;
    if (!Number.isFinite(tsMs)) continue;
    if (tsMs < cutoffMs) {
      await rm(path.join(outDirAbs, ent.name), { force: true });
    }
  }
}
