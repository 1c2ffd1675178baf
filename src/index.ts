/**
 * ticket-logs – fetch, reassemble and query log bundles attached to
 * issue-tracker tickets.
 */
import { cleanBundle, inspectBundle } from "./bundle/lifecycle.js";
import {
  locateBundle,
  resolveBundlePaths,
  type BundleLocation,
  type BundlePaths,
} from "./bundle/paths.js";
import { buildTracker, loadConfig, parseConfig, type Config } from "./config.js";
import { BundleNotFoundError, ConfigError } from "./core/exceptions.js";
import { DownloadPipeline } from "./core/pipeline.js";
import type {
  AttachmentPredicate,
  BundleInfo,
  CleanResult,
  CorrelationResult,
  DownloadResult,
  SearchHit,
} from "./core/types.js";
import { AttachmentFetcher, logAttachmentPredicate } from "./fetch/attachments.js";
import { findRequest } from "./logs/find.js";
import { searchKeyword } from "./logs/search.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import type { IssueTrackerClient } from "./trackers/backend.js";

export * from "./core/exceptions.js";
export type * from "./core/types.js";
export type { StorageBackend } from "./storage/backend.js";
export type { IssueTrackerClient } from "./trackers/backend.js";
export { DiskStorage } from "./storage/disk.js";
export { JiraClient } from "./trackers/jira.js";
export { DirectoryTrackerClient } from "./trackers/directory.js";
export { loadConfig, parseConfig, type Config } from "./config.js";
export { resolveBundlePaths, type BundlePaths } from "./bundle/paths.js";
export { readLogEntries } from "./logs/parser.js";

export class TicketLogs {
  private storage: StorageBackend;
  private tracker: IssueTrackerClient | null;
  private config: Config;
  private predicate: AttachmentPredicate;

  constructor(opts: {
    storage: StorageBackend;
    tracker?: IssueTrackerClient;
    config?: Partial<Config>;
    predicate?: AttachmentPredicate;
  }) {
    this.storage = opts.storage;
    this.tracker = opts.tracker ?? null;
    this.config = parseConfig(opts.config ?? {});
    this.predicate = opts.predicate ?? logAttachmentPredicate(this.config.shardBaseName);
  }

  /** Construct from a validated configuration; the storage root is `config.rootDir`. */
  static fromConfig(config: Config): TicketLogs {
    return new TicketLogs({
      storage: new DiskStorage(config.rootDir),
      tracker: config.tracker ? buildTracker(config.tracker) : undefined,
      config,
    });
  }

  /** Load configuration from file and environment, then construct. */
  static async load(file?: string): Promise<TicketLogs> {
    return TicketLogs.fromConfig(await loadConfig({ file }));
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  paths(ticketId: string): BundlePaths {
    return resolveBundlePaths(ticketId, {
      outputFolder: this.config.outputFolder,
      logFiles: this.config.logFiles,
    });
  }

  async locate(ticketId: string): Promise<BundleLocation> {
    return locateBundle(this.storage, this.paths(ticketId));
  }

  async download(ticketId: string, opts: { all?: boolean } = {}): Promise<DownloadResult> {
    const paths = this.paths(ticketId);
    const pipeline = new DownloadPipeline({
      fetcher: new AttachmentFetcher({
        client: this.requireTracker(),
        storage: this.storage,
        predicate: this.predicate,
      }),
      storage: this.storage,
      shardBaseName: this.config.shardBaseName,
    });
    return pipeline.run(paths, opts.all ? "all" : "logs-only");
  }

  async find(ticketId: string, requestId: string): Promise<CorrelationResult | null> {
    const logFileKeys = await this.requireBundle(ticketId);
    return findRequest(this.storage, logFileKeys, requestId, {
      marker: this.config.entryMarker,
    });
  }

  async search(ticketId: string, keyword: string): Promise<SearchHit[]> {
    const logFileKeys = await this.requireBundle(ticketId);
    return searchKeyword(this.storage, logFileKeys, keyword, {
      marker: this.config.entryMarker,
    });
  }

  async inspect(ticketId: string): Promise<BundleInfo> {
    return inspectBundle(this.storage, this.paths(ticketId));
  }

  async clean(ticketId: string, opts: { dryRun?: boolean } = {}): Promise<CleanResult> {
    return cleanBundle(this.storage, this.paths(ticketId), opts);
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private requireTracker(): IssueTrackerClient {
    if (!this.tracker) {
      throw new ConfigError(
        "no issue tracker configured; set JIRA_BASE_URL, JIRA_EMAIL and JIRA_API_TOKEN or add a `tracker` section",
      );
    }
    return this.tracker;
  }

  /** Well-known log files of an extracted bundle; empty when the bundle has none. */
  private async requireBundle(ticketId: string): Promise<string[]> {
    const location = await this.locate(ticketId);
    switch (location.status) {
      case "missing":
        throw new BundleNotFoundError(
          location.paths.ticketId,
          this.storage.locate(location.paths.extractKey),
        );
      case "empty":
        return [];
      case "ready":
        return location.logFileKeys;
    }
  }
}
