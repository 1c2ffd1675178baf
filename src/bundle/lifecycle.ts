/**
 * Inspection and removal of a ticket's staged and extracted logs.
 */
import type { BundleInfo, CleanResult } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";
import type { BundlePaths } from "./paths.js";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatSize(bytes: number): string {
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  return unit === 0 ? `${size} ${SIZE_UNITS[0]}` : `${size.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

export async function inspectBundle(
  storage: StorageBackend,
  paths: BundlePaths,
): Promise<BundleInfo> {
  const path = storage.locate(paths.stagingKey);
  const root = await storage.stat(paths.stagingKey);
  if (!root) return { exists: false, path, sizeBytes: 0, fileCount: 0 };

  let sizeBytes = 0;
  const files = await storage.list(paths.stagingKey);
  for (const key of files) {
    sizeBytes += (await storage.stat(key))?.size ?? 0;
  }
  return { exists: true, path, sizeBytes, fileCount: files.length };
}

/**
 * Remove everything under the ticket's staging directory, which includes
 * the merged archive and the extracted bundle. A missing directory is not
 * an error and causes no writes.
 */
export async function cleanBundle(
  storage: StorageBackend,
  paths: BundlePaths,
  opts: { dryRun?: boolean } = {},
): Promise<CleanResult> {
  const dryRun = opts.dryRun ?? false;
  const info = await inspectBundle(storage, paths);
  if (!info.exists || dryRun) return { ...info, removed: false, dryRun };

  await storage.deleteTree(paths.stagingKey);
  return { ...info, removed: true, dryRun };
}
