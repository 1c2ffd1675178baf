/**
 * Tracker client backed by a local directory: the attachments of ticket
 * `X` are the files in `<root>/X/`.
 */
import { readdir, readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Attachment } from "../core/types.js";
import type { IssueTrackerClient } from "./backend.js";

export class DirectoryTrackerClient implements IssueTrackerClient {
  private root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async listAttachments(ticketId: string): Promise<Attachment[]> {
    const dir = join(this.root, ticketId);
    const entries = await readdir(dir, { withFileTypes: true });

    const attachments: Attachment[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const handle = join(dir, entry.name);
      const s = await stat(handle);
      attachments.push({ filename: entry.name, size: s.size, handle });
    }
    return attachments.sort((a, b) =>
      a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0,
    );
  }

  async download(handle: string): Promise<Uint8Array> {
    const buf = await readFile(handle);
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  }
}
