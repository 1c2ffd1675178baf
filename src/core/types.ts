/**
 * Shared data model for bundles, attachments and log entries.
 */

/** An attachment as listed by the issue tracker. */
export interface Attachment {
  filename: string;
  size: number;
  /** Opaque handle passed back to `IssueTrackerClient.download`. */
  handle: string;
}

export type FetchMode = "all" | "logs-only";

/** Decides whether an attachment belongs to the log set in logs-only mode. */
export type AttachmentPredicate = (attachment: Attachment) => boolean;

export interface ShardPart {
  ordinal: number;
  filename: string;
}

/** One logical archive: `<base>.zip` followed by `<base>.z01`, `<base>.z02`, ... */
export interface ShardSet {
  baseName: string;
  primary: string | null;
  parts: ShardPart[];
}

/** A contiguous span of one log file, starting at a marker line. */
export interface LogEntry {
  file: string;
  /** Position among the items yielded for the file, starting at 0. */
  index: number;
  /** 1-based line number of the first line of the span. */
  line: number;
  id: string | null;
  endpoint: string | null;
  /** Exact text of the span, line terminators included. */
  raw: string;
  /** True only for text preceding the first marker line. */
  preamble: boolean;
}

export interface CorrelationResult {
  entry: LogEntry;
  payload: string | null;
}

export interface SearchHit {
  file: string;
  id: string | null;
  endpoint: string | null;
}

export type DownloadResult =
  | { status: "nothing-to-download"; ticketId: string }
  | {
      status: "downloaded";
      ticketId: string;
      stagingDir: string;
      /** Null when the staged attachments contained no log archive or loose log file. */
      bundleDir: string | null;
      attachments: string[];
    };

export interface BundleInfo {
  exists: boolean;
  path: string;
  sizeBytes: number;
  fileCount: number;
}

export interface CleanResult extends BundleInfo {
  removed: boolean;
  dryRun: boolean;
}
