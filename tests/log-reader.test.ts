import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseTurns, readTurns, toRawTurn } from "../src/log-reader.js";

test("a JSON array with export headers maps onto canonical keys", () => {
  const content = JSON.stringify([
    { Conversation: "c1", Time: "2024-01-01", Author: "user", Message: "hi there" },
    { conversation_id: 7, ts: "t", role: "assistant", raw_text: "yo" },
    { text: null },
  ]);
  assert.deepEqual(parseTurns(content), [
    { conversationId: "c1", timestamp: "2024-01-01", author: "user", text: "hi there" },
    { conversationId: "7", timestamp: "t", author: "assistant", text: "yo" },
  ]);
});

test("JSON lines skip malformed lines and entries without text", () => {
  const content = [
    '{"conversationId":"c","timestamp":"2024-01-01T00:00:00Z","author":"user","text":"first"}',
    "{bad",
    '{"author":"user"}',
    "",
    '{"text":"second"}',
  ].join("\n");
  assert.deepEqual(parseTurns(content), [
    { conversationId: "c", timestamp: "2024-01-01T00:00:00Z", author: "user", text: "first" },
    { conversationId: "", timestamp: "", author: "", text: "second" },
  ]);
});

test("non-object entries are rejected", () => {
  assert.equal(toRawTurn([1, 2]), null);
  assert.equal(toRawTurn("text"), null);
  assert.deepEqual(parseTurns("   "), []);
});

test("readTurns loads a log file", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "memory-tiers-log-"));
  const file = path.join(dir, "log.jsonl");
  await writeFile(file, '{"author":"user","text":"hello"}\n', "utf-8");
  assert.deepEqual(await readTurns(file), [{ conversationId: "", timestamp: "", author: "user", text: "hello" }]);
});
