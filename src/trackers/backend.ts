/**
 * Issue-tracker client interface consumed by the attachment fetcher.
 */
import type { Attachment } from "../core/types.js";

export interface IssueTrackerClient {
  /** List every attachment of a ticket, in the tracker's order. */
  listAttachments(ticketId: string): Promise<Attachment[]>;

  /** Fetch the bytes behind an attachment handle. */
  download(handle: string): Promise<Uint8Array>;
}
