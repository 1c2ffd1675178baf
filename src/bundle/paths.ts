/**
 * Bundle path resolution: where a ticket's attachments are staged and where
 * its extracted log bundle lives.
 *
 * Layout under the storage root:
 *
 *   logs_<TicketId>/                  staging (raw attachments)
 *   logs_<TicketId>/merged.zip        reassembled archive
 *   logs_<TicketId>/<outputFolder>/   extracted bundle
 */
import { z } from "zod";
import { InvalidTicketIdError } from "../core/exceptions.js";
import type { StorageBackend } from "../storage/backend.js";

export const DEFAULT_OUTPUT_FOLDER = "merged";
export const MERGED_ARCHIVE_NAME = "merged.zip";
export const STAGING_PREFIX = "logs_";
export const DEFAULT_LOG_FILES = ["api.log", "flutter-api.log"] as const;

export const TicketIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/)
  .refine((id) => !id.includes(".."));

export interface BundlePathOptions {
  outputFolder?: string;
  logFiles?: readonly string[];
}

export interface BundlePaths {
  ticketId: string;
  stagingKey: string;
  archiveKey: string;
  extractKey: string;
  /** Well-known log files inside the bundle, in search order. */
  logFileKeys: string[];
}

export type BundleLocation =
  | { status: "missing"; paths: BundlePaths }
  | { status: "empty"; paths: BundlePaths }
  | { status: "ready"; paths: BundlePaths; logFileKeys: string[] };

export function validateTicketId(ticketId: string): string {
  const parsed = TicketIdSchema.safeParse(ticketId);
  if (!parsed.success) throw new InvalidTicketIdError(ticketId);
  return parsed.data;
}

export function resolveBundlePaths(
  ticketId: string,
  options: BundlePathOptions = {},
): BundlePaths {
  const id = validateTicketId(ticketId);
  const outputFolder = options.outputFolder || DEFAULT_OUTPUT_FOLDER;
  const logFiles = options.logFiles ?? DEFAULT_LOG_FILES;

  const stagingKey = `${STAGING_PREFIX}${id}`;
  const extractKey = `${stagingKey}/${outputFolder}`;
  return {
    ticketId: id,
    stagingKey,
    archiveKey: `${stagingKey}/${MERGED_ARCHIVE_NAME}`,
    extractKey,
    logFileKeys: logFiles.map((name) => `${extractKey}/${name}`),
  };
}

/**
 * Check whether a bundle has been extracted, distinguishing "never
 * downloaded" from "downloaded but without any well-known log file".
 */
export async function locateBundle(
  storage: StorageBackend,
  paths: BundlePaths,
): Promise<BundleLocation> {
  const dir = await storage.stat(paths.extractKey);
  if (!dir || dir.kind !== "directory") return { status: "missing", paths };

  const logFileKeys: string[] = [];
  for (const key of paths.logFileKeys) {
    const s = await storage.stat(key);
    if (s?.kind === "file") logFileKeys.push(key);
  }

  if (logFileKeys.length === 0) return { status: "empty", paths };
  return { status: "ready", paths, logFileKeys };
}
