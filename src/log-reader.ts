import { readFile } from "node:fs/promises";
import type { RawTurn } from "./types.js";
import { log } from "./logger.js";
import { RawTurnSchema } from "./schemas.js";

/** Export headers accepted besides the canonical camelCase keys. */
const KEY_ALIASES: Record<keyof RawTurn, readonly string[]> = {
  conversationId: ["conversationId", "Conversation", "conversation_id", "conversation"],
  timestamp: ["timestamp", "Time", "time", "ts"],
  author: ["author", "Author", "author_role_label", "role"],
  text: ["text", "Message", "message", "raw_text"],
};

function pick(obj: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const k of keys) {
    if (obj[k] !== undefined && obj[k] !== null) return obj[k];
  }
  return undefined;
}

function asText(value: unknown): unknown {
  return typeof value === "number" ? String(value) : value;
}

/** Map one parsed log entry onto a RawTurn, or null when it has no usable text. */
export function toRawTurn(entry: unknown): RawTurn | null {
  if (!entry || typeof entry !== "object" || Array.isArray(entry)) return null;
  const obj = entry as Record<string, unknown>;
  const candidate = {
    conversationId: asText(pick(obj, KEY_ALIASES.conversationId)),
    timestamp: asText(pick(obj, KEY_ALIASES.timestamp)),
    author: asText(pick(obj, KEY_ALIASES.author)),
    text: asText(pick(obj, KEY_ALIASES.text)),
  };
  const parsed = RawTurnSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}

/**
 * Parse log content: a JSON array of turns, or JSON Lines with one turn per
 * line. Entries that are not objects with a string text are skipped.
 */
export function parseTurns(content: string, sourceName = "input"): RawTurn[] {
  const trimmed = content.trim();
  if (!trimmed) return [];

  let entries: unknown[] | null = null;
  if (trimmed.startsWith("[")) {
    try {
      const parsed = JSON.parse(trimmed) as unknown;
      if (Array.isArray(parsed)) entries = parsed;
    } catch {
      log.debug(`${sourceName}: not a JSON array; reading as JSON lines`);
    }
  }

  if (!entries) {
    entries = [];
    const lines = trimmed.split("\n").filter((l) => l.trim().length > 0);
    for (const [i, line] of lines.entries()) {
      try {
        entries.push(JSON.parse(line) as unknown);
      } catch {
        log.warn(`${sourceName}: skipped malformed line ${i + 1}`);
      }
    }
  }

  const turns: RawTurn[] = [];
  let skipped = 0;
  for (const entry of entries) {
    const turn = toRawTurn(entry);
    if (turn) {
      turns.push(turn);
    } else {
      skipped += 1;
    }
  }
  if (skipped > 0) log.warn(`${sourceName}: skipped ${skipped} entr${skipped === 1 ? "y" : "ies"} without text`);
  return turns;
}

export async function readTurns(filePath: string): Promise<RawTurn[]> {
  const content = await readFile(filePath, "utf-8");
  return parseTurns(content, filePath);
}
