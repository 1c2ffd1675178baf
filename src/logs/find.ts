/**
 * Request correlation: locate the entry for a request ID and pull out its
 * response payload.
 */
import type { CorrelationResult } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";
import { readLogEntries, type EntryParserOptions } from "./parser.js";

export const RESPONSE_KEYWORD = "response:";

/**
 * Payload of an entry: the text after the first `response:` in its body,
 * continued over the following lines up to the first blank line.
 * Null when the body has no `response:` line.
 */
export function extractResponsePayload(raw: string): string | null {
  const lines = raw.split(/\r?\n/);

  // Line 0 is the marker line.
  for (let i = 1; i < lines.length; i++) {
    const start = lines[i].indexOf(RESPONSE_KEYWORD);
    if (start === -1) continue;

    const collected: string[] = [];
    const first = lines[i].slice(start + RESPONSE_KEYWORD.length).trimStart();
    if (first) collected.push(first);

    for (let j = i + 1; j < lines.length; j++) {
      if (lines[j].trim() === "") break;
      collected.push(lines[j]);
    }
    return collected.join("\n");
  }

  return null;
}

/**
 * Scan the given log files in order and return the first entry whose ID
 * equals `requestId`. IDs are only unique per file, so an earlier file and
 * an earlier position win.
 */
export async function findRequest(
  storage: StorageBackend,
  logFileKeys: string[],
  requestId: string,
  options: EntryParserOptions = {},
): Promise<CorrelationResult | null> {
  for (const key of logFileKeys) {
    for await (const entry of readLogEntries(storage, key, options)) {
      if (entry.preamble || entry.id !== requestId) continue;
      return { entry, payload: extractResponsePayload(entry.raw) };
    }
  }
  return null;
}
