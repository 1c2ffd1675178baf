/**
 * Jira REST client for listing and downloading ticket attachments.
 */
import { z } from "zod";
import type { Attachment } from "../core/types.js";
import type { IssueTrackerClient } from "./backend.js";

export const JiraAttachmentSchema = z.object({
  filename: z.string(),
  size: z.number().default(0),
  content: z.string(),
});

export const JiraIssueSchema = z.object({
  key: z.string().optional(),
  fields: z.object({
    attachment: z.array(JiraAttachmentSchema).nullable().optional(),
  }),
});

export interface JiraClientConfig {
  baseUrl: string;
  email: string;
  apiToken: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 60_000;
const ERROR_PREVIEW_CHARS = 200;

export class JiraClient implements IssueTrackerClient {
  private baseUrl: string;
  private authorization: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(config: JiraClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${config.email}:${config.apiToken}`).toString("base64")}`;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async listAttachments(ticketId: string): Promise<Attachment[]> {
    const url = `${this.baseUrl}/rest/api/2/issue/${encodeURIComponent(ticketId)}?fields=attachment`;
    const response = await this.get(url, "application/json");
    const issue = JiraIssueSchema.parse(await response.json());

    return (issue.fields.attachment ?? []).map((a) => ({
      filename: a.filename,
      size: a.size,
      handle: a.content,
    }));
  }

  async download(handle: string): Promise<Uint8Array> {
    const response = await this.get(handle, "*/*");
    return new Uint8Array(await response.arrayBuffer());
  }

  private async get(url: string, accept: string): Promise<Response> {
    const response = await this.fetchImpl(url, {
      headers: { Authorization: this.authorization, Accept: accept },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(await formatHttpError(response));
    }
    return response;
  }
}

async function formatHttpError(response: Response): Promise<string> {
  const text = await response.text();
  const status = `${response.status} ${response.statusText}`.trim();
  if (!text) return `Request failed with status: ${status}`;
  const preview =
    text.length > ERROR_PREVIEW_CHARS
      ? `${text.slice(0, ERROR_PREVIEW_CHARS)}...`
      : text;
  return `Request failed with status: ${status} - ${preview}`;
}
