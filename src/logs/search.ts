/**
 * Case-insensitive keyword search over every entry of a bundle's log files.
 */
import type { SearchHit } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";
import { readLogEntries, type EntryParserOptions } from "./parser.js";

export async function searchKeyword(
  storage: StorageBackend,
  logFileKeys: string[],
  keyword: string,
  options: EntryParserOptions = {},
): Promise<SearchHit[]> {
  const needle = keyword.toLowerCase();
  const hits: SearchHit[] = [];

  for (const key of logFileKeys) {
    for await (const entry of readLogEntries(storage, key, options)) {
      if (entry.preamble) continue;
      if (entry.raw.toLowerCase().includes(needle)) {
        hits.push({ file: entry.file, id: entry.id, endpoint: entry.endpoint });
      }
    }
  }

  return hits;
}

/** Group hits by file, keeping scan order within each group. */
export function groupHitsByFile(hits: SearchHit[]): Map<string, SearchHit[]> {
  const groups = new Map<string, SearchHit[]>();
  for (const hit of hits) {
    const group = groups.get(hit.file);
    if (group) group.push(hit);
    else groups.set(hit.file, [hit]);
  }
  return groups;
}
