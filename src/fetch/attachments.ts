/**
 * Attachment selection and download into a ticket's staging directory.
 */
import { FetchFailedError } from "../core/exceptions.js";
import type { Attachment, AttachmentPredicate, FetchMode } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";
import type { IssueTrackerClient } from "../trackers/backend.js";
import { logger } from "../utils/logger.js";

export const DEFAULT_SHARD_BASE_NAME = "log";

export const LOOSE_LOG_EXTENSIONS = [".log", ".txt"];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches `<base>.zip` and `<base>.zNN`. */
export function shardFilePattern(baseName: string): RegExp {
  return new RegExp(`^${escapeRegExp(baseName)}\\.(zip|z\\d{2})$`);
}

/**
 * Default logs-only filter: the shard set of `baseName` plus loose
 * `.log` / `.txt` attachments.
 */
export function logAttachmentPredicate(
  baseName: string = DEFAULT_SHARD_BASE_NAME,
): AttachmentPredicate {
  const pattern = shardFilePattern(baseName);
  return (attachment) =>
    pattern.test(attachment.filename) ||
    LOOSE_LOG_EXTENSIONS.some((ext) => attachment.filename.endsWith(ext));
}

function isPlainFilename(filename: string): boolean {
  return (
    filename.length > 0 &&
    !filename.includes("/") &&
    !filename.includes("\\") &&
    filename !== "." &&
    filename !== ".."
  );
}

export class AttachmentFetcher {
  private client: IssueTrackerClient;
  private storage: StorageBackend;
  private predicate: AttachmentPredicate;

  constructor(opts: {
    client: IssueTrackerClient;
    storage: StorageBackend;
    predicate?: AttachmentPredicate;
  }) {
    this.client = opts.client;
    this.storage = opts.storage;
    this.predicate = opts.predicate ?? logAttachmentPredicate();
  }

  /** List the attachments that `mode` selects, in tracker order. */
  async select(ticketId: string, mode: FetchMode): Promise<Attachment[]> {
    let attachments: Attachment[];
    try {
      attachments = await this.client.listAttachments(ticketId);
    } catch (err) {
      throw new FetchFailedError(ticketId, null, err);
    }

    logger.debug(`Found ${attachments.length} attachment(s)`, {
      ticketId,
      attachments: attachments.map((a) => a.filename),
    });

    if (mode === "all") return attachments;
    return attachments.filter(this.predicate);
  }

  /**
   * Download `attachments` into `stagingKey`, one at a time, in order.
   * The first failure aborts the whole fetch.
   */
  async download(
    ticketId: string,
    stagingKey: string,
    attachments: Attachment[],
  ): Promise<void> {
    await this.storage.ensureDir(stagingKey);

    for (const attachment of attachments) {
      if (!isPlainFilename(attachment.filename)) {
        throw new FetchFailedError(
          ticketId,
          attachment.filename,
          new Error("attachment name is not a plain file name"),
        );
      }

      try {
        const data = await this.client.download(attachment.handle);
        await this.storage.write(`${stagingKey}/${attachment.filename}`, data);
      } catch (err) {
        throw new FetchFailedError(ticketId, attachment.filename, err);
      }
      logger.info(`Downloaded: ${attachment.filename}`, {
        ticketId,
        size: attachment.size,
      });
    }
  }
}
