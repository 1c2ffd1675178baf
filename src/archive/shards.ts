/**
 * Split-archive reassembly.
 *
 * A log archive arrives either as a single `<base>.zip` or as `<base>.zip`
 * plus continuation parts `<base>.z01`, `<base>.z02`, ... which must be
 * concatenated in ordinal order (primary first) before it can be opened.
 */
import { IncompleteShardSetError } from "../core/exceptions.js";
import type { ShardSet } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";
import { logger } from "../utils/logger.js";

export interface ReassemblyResult {
  kind: "single" | "split";
  archiveKey: string;
  shardCount: number;
  bytes: number;
}

export function shardFilename(baseName: string, ordinal: number): string {
  return ordinal === 0
    ? `${baseName}.zip`
    : `${baseName}.z${String(ordinal).padStart(2, "0")}`;
}

/** Scan a staging directory for the primary archive and its continuation parts. */
export async function discoverShards(
  storage: StorageBackend,
  stagingKey: string,
  baseName: string,
): Promise<ShardSet> {
  const primaryName = shardFilename(baseName, 0);
  const partPrefix = `${baseName}.z`;

  let primary: string | null = null;
  const parts: ShardSet["parts"] = [];

  for (const name of await storage.listDir(stagingKey)) {
    if (name === primaryName) {
      primary = name;
      continue;
    }
    if (!name.startsWith(partPrefix)) continue;
    const suffix = name.slice(partPrefix.length);
    if (!/^\d{2}$/.test(suffix)) continue;
    const ordinal = Number(suffix);
    if (ordinal > 0) parts.push({ ordinal, filename: name });
  }

  parts.sort((a, b) => a.ordinal - b.ordinal);
  return { baseName, primary, parts };
}

/** First ordinal absent from the set (0 is the primary), or null if complete. */
export function findMissingOrdinal(set: ShardSet): number | null {
  if (set.primary === null) return set.parts.length > 0 ? 0 : null;

  const present = new Set(set.parts.map((p) => p.ordinal));
  const highest = set.parts.length > 0 ? set.parts[set.parts.length - 1].ordinal : 0;
  for (let ordinal = 1; ordinal <= highest; ordinal++) {
    if (!present.has(ordinal)) return ordinal;
  }
  return null;
}

/**
 * Produce the canonical merged archive from whatever shards are staged.
 * Returns null when no primary archive and no parts are present.
 */
export async function reassembleShards(
  storage: StorageBackend,
  opts: {
    ticketId: string;
    stagingKey: string;
    archiveKey: string;
    baseName: string;
  },
): Promise<ReassemblyResult | null> {
  const set = await discoverShards(storage, opts.stagingKey, opts.baseName);

  const missing = findMissingOrdinal(set);
  if (missing !== null) {
    throw new IncompleteShardSetError(
      opts.ticketId,
      missing,
      shardFilename(opts.baseName, missing),
      storage.locate(opts.stagingKey),
    );
  }
  if (set.primary === null) return null;

  const primaryKey = `${opts.stagingKey}/${set.primary}`;

  if (set.parts.length === 0) {
    await storage.copy(primaryKey, opts.archiveKey);
    const s = await storage.stat(opts.archiveKey);
    return {
      kind: "single",
      archiveKey: opts.archiveKey,
      shardCount: 1,
      bytes: s?.size ?? 0,
    };
  }

  const sources = [
    primaryKey,
    ...set.parts.map((p) => `${opts.stagingKey}/${p.filename}`),
  ];
  logger.debug("Merging split archive", { ticketId: opts.ticketId, sources });

  let expected = 0;
  for (const key of sources) {
    expected += (await storage.stat(key))?.size ?? 0;
  }
  const written = await storage.concat(sources, opts.archiveKey);
  if (written !== expected) {
    logger.warn("Merged archive size mismatch", {
      ticketId: opts.ticketId,
      expected,
      actual: written,
    });
  }

  return {
    kind: "split",
    archiveKey: opts.archiveKey,
    shardCount: sources.length,
    bytes: written,
  };
}
