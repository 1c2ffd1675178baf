/**
 * Shared test fixtures: sample logs, zip builder, shard splitter, an
 * in-memory tracker and a pre-configured TicketLogs.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { zipSync, strToU8 } from "fflate";

import type { Attachment } from "../src/core/types.js";
import { TicketLogs } from "../src/index.js";
import { DiskStorage } from "../src/storage/disk.js";
import type { IssueTrackerClient } from "../src/trackers/backend.js";

// ---------------------------------------------------------------------------
// Sample logs
// ---------------------------------------------------------------------------

export const API_LOG = [
  "session start 2024-05-01",
  "💡 #41 GET https://api.example.com/v1/users/7",
  "request: {}",
  'response: {"name": "Ada"}',
  "",
  "💡 #42 POST https://api.example.com/v1/orders",
  'request: {"sku": "A-1"}',
  'response: {"status": "created",',
  '  "id": 9001}',
  "",
  "💡 #42 GET https://api.example.com/v1/orders/9001",
  'response: {"status": "shipped"}',
  "",
  "💡 #43 GET https://api.example.com/v1/health",
  "request: ping",
  "",
  "💡 malformed marker without id",
  "ERROR connection reset",
  "",
].join("\n");

export const FLUTTER_LOG = [
  "💡 #7 PUT https://api.example.com/v1/profile",
  'response: {"error": "Timeout"}',
  "",
  "💡 #41 GET https://cdn.example.com/assets/logo.png",
  "response: binary",
  "",
  "💡 #8 DELETE https://api.example.com/v1/session",
  'level=error message="session expired"',
  "",
].join("\n");

/** Timestamped request log without the entry marker. */
export const REQUEST_LOG = [
  "2024-05-01 10:00:00 #99 GET https://api.example.com/v1/ping",
  "response: OK",
  "",
  "2024-05-01 10:00:02 #100 POST https://api.example.com/v1/login",
  'request: {"user": "ada"}',
  "response: denied",
  "",
].join("\n");

export const DEMO_API_LOG = [
  "💡 #99 GET https://api.example.com/v1/ping",
  "response: OK",
  "",
].join("\n");

// ---------------------------------------------------------------------------
// Zip builder + shard splitter
// ---------------------------------------------------------------------------

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const zipFiles: Record<string, Uint8Array> = {};
  for (const [name, data] of Object.entries(files)) {
    zipFiles[name] =
      typeof data === "string" ? strToU8(data) : data;
  }
  return zipSync(zipFiles);
}

/** Cut `data` into `count` consecutive pieces of near-equal size. */
export function splitBytes(data: Uint8Array, count: number): Uint8Array[] {
  const size = Math.ceil(data.length / count);
  const pieces: Uint8Array[] = [];
  for (let i = 0; i < count; i++) {
    pieces.push(data.slice(i * size, Math.min((i + 1) * size, data.length)));
  }
  return pieces;
}

/** `log.zip`, `log.z01`, ... holding `archive` split into `count` parts. */
export function shardFiles(
  archive: Uint8Array,
  count: number,
  baseName = "log",
): Record<string, Uint8Array> {
  const files: Record<string, Uint8Array> = {};
  splitBytes(archive, count).forEach((piece, i) => {
    const name = i === 0 ? `${baseName}.zip` : `${baseName}.z${String(i).padStart(2, "0")}`;
    files[name] = piece;
  });
  return files;
}

// ---------------------------------------------------------------------------
// In-memory tracker
// ---------------------------------------------------------------------------

export class FakeTracker implements IssueTrackerClient {
  private tickets = new Map<string, string[]>();
  private blobs = new Map<string, Uint8Array>();
  failing = new Set<string>();
  listError: Error | null = null;
  downloaded: string[] = [];

  setAttachments(ticketId: string, files: Record<string, string | Uint8Array>): void {
    const names: string[] = [];
    for (const [name, data] of Object.entries(files)) {
      names.push(name);
      this.blobs.set(`${ticketId}/${name}`, typeof data === "string" ? strToU8(data) : data);
    }
    this.tickets.set(ticketId, names);
  }

  async listAttachments(ticketId: string): Promise<Attachment[]> {
    if (this.listError) throw this.listError;
    return (this.tickets.get(ticketId) ?? []).map((filename) => {
      const handle = `${ticketId}/${filename}`;
      return { filename, size: this.blobs.get(handle)?.length ?? 0, handle };
    });
  }

  async download(handle: string): Promise<Uint8Array> {
    if (this.failing.has(handle)) throw new Error("connection reset by peer");
    const data = this.blobs.get(handle);
    if (!data) throw new Error(`no such attachment: ${handle}`);
    this.downloaded.push(handle);
    return data;
  }
}

// ---------------------------------------------------------------------------
// Temp dir + pre-configured TicketLogs
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "ticket-logs-test-"));
}

export function makeCtx(dir: string, tracker: IssueTrackerClient = new FakeTracker()): TicketLogs {
  return new TicketLogs({
    storage: new DiskStorage(dir),
    tracker,
    config: { rootDir: dir },
  });
}
