import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readdir, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { backupStateFile, timestampDirName } from "../src/transfer/backup.js";

test("timestampDirName replaces separators that are unsafe in file names", () => {
  assert.equal(timestampDirName(new Date("2026-02-11T05:06:07.123Z")), "2026-02-11T05-06-07-123Z");
});

test("backupStateFile skips a missing source file", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "memory-tiers-backup-"));
  const result = await backupStateFile({
    sourceFile: path.join(dir, "ontology.json"),
    outDir: path.join(dir, "backups"),
    prefix: "ontology",
  });
  assert.equal(result, null);
});

test("retention removes expired backups of the same prefix only", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "memory-tiers-backup-"));
  const outDir = path.join(dir, "backups");
  const source = path.join(dir, "ontology.json");
  await writeFile(source, "{}\n", "utf-8");

  const first = await backupStateFile({ sourceFile: source, outDir, prefix: "ontology" });
  assert.ok(first);
  await writeFile(path.join(outDir, "ontology-2020-01-01T00-00-00-000Z.json"), "{}\n", "utf-8");
  await writeFile(path.join(outDir, "sources-2020-01-01T00-00-00-000Z.json"), "[]\n", "utf-8");

  const now = new Date(Date.now() + 1000);
  const second = await backupStateFile({ sourceFile: source, outDir, prefix: "ontology", retentionDays: 30, now });
  assert.equal(second, path.join(outDir, `ontology-${timestampDirName(now)}.json`));

  const entries = (await readdir(outDir)).sort();
  assert.deepEqual(entries, [path.basename(first), path.basename(second ?? ""), "sources-2020-01-01T00-00-00-000Z.json"].sort());
});
