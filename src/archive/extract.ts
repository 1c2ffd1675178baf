/**
 * Zip extraction into a ticket's bundle directory.
 */
import { unzipSync } from "fflate";
import { posix } from "node:path";
import { CorruptArchiveError } from "../core/exceptions.js";
import type { StorageBackend } from "../storage/backend.js";

export const PARTIAL_SUFFIX = ".partial";

export interface ExtractionResult {
  destKey: string;
  files: string[];
}

function safeEntryPath(name: string): string | null {
  const normalised = posix.normalize(name.replace(/\\/g, "/"));
  if (
    normalised.startsWith("/") ||
    normalised === ".." ||
    normalised.startsWith("../")
  ) {
    return null;
  }
  return normalised;
}

/**
 * Extract `archiveKey` into `destKey`.
 *
 * Entries are written to `<destKey>.partial` first; the previous bundle is
 * only replaced once every entry has been written.
 */
export async function extractArchive(
  storage: StorageBackend,
  opts: { ticketId: string; archiveKey: string; destKey: string },
): Promise<ExtractionResult> {
  const archivePath = storage.locate(opts.archiveKey);
  const data = await storage.read(opts.archiveKey);

  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(data);
  } catch (err) {
    throw new CorruptArchiveError(opts.ticketId, archivePath, err);
  }

  const partialKey = `${opts.destKey}${PARTIAL_SUFFIX}`;
  await storage.deleteTree(partialKey);
  await storage.ensureDir(partialKey);

  const files: string[] = [];
  try {
    for (const [name, content] of Object.entries(entries)) {
      const relativePath = safeEntryPath(name);
      if (relativePath === null) {
        throw new CorruptArchiveError(
          opts.ticketId,
          archivePath,
          new Error(`entry path escapes the bundle: ${name}`),
        );
      }
      // Directory entries (empty data with trailing /)
      if (name.endsWith("/") && content.length === 0) {
        await storage.ensureDir(`${partialKey}/${relativePath}`);
        continue;
      }
      await storage.write(`${partialKey}/${relativePath}`, content);
      files.push(relativePath);
    }
  } catch (err) {
    await storage.deleteTree(partialKey);
    throw err;
  }

  await storage.deleteTree(opts.destKey);
  await storage.rename(partialKey, opts.destKey);

  return { destKey: opts.destKey, files: files.sort() };
}
