/**
 * Download pipeline: fetch → reassemble → extract.
 *
 * Each step runs to completion before the next one starts; a failure in
 * any step aborts the run and surfaces as a `TicketLogsError`.
 */
import { extractArchive, PARTIAL_SUFFIX } from "../archive/extract.js";
import { reassembleShards, type ReassemblyResult } from "../archive/shards.js";
import type { BundlePaths } from "../bundle/paths.js";
import {
  DEFAULT_SHARD_BASE_NAME,
  LOOSE_LOG_EXTENSIONS,
  type AttachmentFetcher,
} from "../fetch/attachments.js";
import type { StorageBackend } from "../storage/backend.js";
import { logger } from "../utils/logger.js";
import { describeCause, TicketLogsError } from "./exceptions.js";
import type { Attachment, DownloadResult, FetchMode } from "./types.js";

export class DownloadPipeline {
  private fetcher: AttachmentFetcher;
  private storage: StorageBackend;
  private shardBaseName: string;

  constructor(opts: {
    fetcher: AttachmentFetcher;
    storage: StorageBackend;
    shardBaseName?: string;
  }) {
    this.fetcher = opts.fetcher;
    this.storage = opts.storage;
    this.shardBaseName = opts.shardBaseName ?? DEFAULT_SHARD_BASE_NAME;
  }

  /** Step 1: Select attachments and download them into a fresh staging directory. */
  async fetch(paths: BundlePaths, mode: FetchMode): Promise<Attachment[]> {
    const selected = await this.fetcher.select(paths.ticketId, mode);
    if (selected.length === 0) return selected;

    // Stale shards from an earlier run must not leak into this shard set.
    await this.step("prepare staging directory", paths, paths.stagingKey, () =>
      this.storage.deleteTree(paths.stagingKey),
    );
    await this.fetcher.download(paths.ticketId, paths.stagingKey, selected);
    return selected;
  }

  /** Step 2: Merge the staged shards into the canonical archive. */
  async reassemble(paths: BundlePaths): Promise<ReassemblyResult | null> {
    return this.step("reassemble archive", paths, paths.archiveKey, () =>
      reassembleShards(this.storage, {
        ticketId: paths.ticketId,
        stagingKey: paths.stagingKey,
        archiveKey: paths.archiveKey,
        baseName: this.shardBaseName,
      }),
    );
  }

  /** Step 3: Extract the merged archive into the bundle directory. */
  async extract(paths: BundlePaths): Promise<string[]> {
    const result = await this.step("extract archive", paths, paths.extractKey, () =>
      extractArchive(this.storage, {
        ticketId: paths.ticketId,
        archiveKey: paths.archiveKey,
        destKey: paths.extractKey,
      }),
    );
    return result.files;
  }

  /**
   * Step 3 when no archive was attached: copy loose `.log` / `.txt`
   * attachments into the bundle directory instead.
   */
  async collectLooseLogs(paths: BundlePaths, attachments: Attachment[]): Promise<string[]> {
    const loose = attachments
      .map((a) => a.filename)
      .filter((name) => LOOSE_LOG_EXTENSIONS.some((ext) => name.endsWith(ext)));
    if (loose.length === 0) return [];

    return this.step("collect loose logs", paths, paths.extractKey, async () => {
      const partialKey = `${paths.extractKey}${PARTIAL_SUFFIX}`;
      await this.storage.deleteTree(partialKey);
      for (const name of loose) {
        await this.storage.copy(`${paths.stagingKey}/${name}`, `${partialKey}/${name}`);
      }
      await this.storage.deleteTree(paths.extractKey);
      await this.storage.rename(partialKey, paths.extractKey);
      return loose;
    });
  }

  /** Run the full fetch → reassemble → extract pipeline. */
  async run(paths: BundlePaths, mode: FetchMode): Promise<DownloadResult> {
    const attachments = await this.fetch(paths, mode);
    if (attachments.length === 0) {
      return { status: "nothing-to-download", ticketId: paths.ticketId };
    }

    const merged = await this.reassemble(paths);
    const files = merged
      ? await this.extract(paths)
      : await this.collectLooseLogs(paths, attachments);

    const bundleReady = merged !== null || files.length > 0;
    logger.info("Download complete", {
      ticketId: paths.ticketId,
      attachments: attachments.length,
      archive: merged?.kind ?? "none",
      files: files.length,
    });

    return {
      status: "downloaded",
      ticketId: paths.ticketId,
      stagingDir: this.storage.locate(paths.stagingKey),
      bundleDir: bundleReady ? this.storage.locate(paths.extractKey) : null,
      attachments: attachments.map((a) => a.filename),
    };
  }

  private async step<T>(
    name: string,
    paths: BundlePaths,
    key: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof TicketLogsError) throw err;
      throw new TicketLogsError(
        `Failed to ${name} for ${paths.ticketId} at ${this.storage.locate(key)}: ${describeCause(err)}. Run download again for ${paths.ticketId}.`,
        paths.ticketId,
        { cause: err },
      );
    }
  }
}
