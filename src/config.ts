/**
 * Configuration validation and tracker factory.
 */
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_LOG_FILES, DEFAULT_OUTPUT_FOLDER } from "./bundle/paths.js";
import { ConfigError } from "./core/exceptions.js";
import { DEFAULT_SHARD_BASE_NAME } from "./fetch/attachments.js";
import { DEFAULT_ENTRY_MARKER } from "./logs/parser.js";
import type { IssueTrackerClient } from "./trackers/backend.js";
import { DirectoryTrackerClient } from "./trackers/directory.js";
import { JiraClient } from "./trackers/jira.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const PathSegmentSchema = z
  .string()
  .min(1)
  .refine((s) => !s.includes("/") && !s.includes("\\") && s !== "." && s !== "..", {
    message: "must be a single path segment",
  });

const JiraTrackerSchema = z.object({
  provider: z.literal("jira"),
  config: z.object({
    baseUrl: z.string().url(),
    email: z.string().min(1),
    apiToken: z.string().min(1),
    timeoutMs: z.number().int().positive().default(60_000),
  }),
});

const DirectoryTrackerSchema = z.object({
  provider: z.literal("directory"),
  config: z.object({
    path: z.string().min(1),
  }),
});

export const TrackerConfigSchema = z.discriminatedUnion("provider", [
  JiraTrackerSchema,
  DirectoryTrackerSchema,
]);

export const ConfigSchema = z.object({
  rootDir: z.string().min(1).default("~/Downloads"),
  outputFolder: PathSegmentSchema.default(DEFAULT_OUTPUT_FOLDER),
  shardBaseName: PathSegmentSchema.default(DEFAULT_SHARD_BASE_NAME),
  entryMarker: z.string().min(1).default(DEFAULT_ENTRY_MARKER),
  logFiles: z.array(PathSegmentSchema).min(1).default([...DEFAULT_LOG_FILES]),
  tracker: TrackerConfigSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expandHome(rawPath: string): string {
  if (rawPath === "~") return homedir();
  if (rawPath.startsWith("~/")) return join(homedir(), rawPath.slice(2));
  return rawPath;
}

export function parseConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(issues);
  }
  return { ...parsed.data, rootDir: expandHome(parsed.data.rootDir) };
}

/**
 * Overlay environment variables onto a raw config object. Jira credentials
 * from the environment only apply when no tracker is configured, or when
 * the configured tracker is Jira.
 */
export function applyEnv(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  if (env.TICKET_LOGS_ROOT) merged.rootDir = env.TICKET_LOGS_ROOT;
  if (env.TICKET_LOGS_OUTPUT_FOLDER) merged.outputFolder = env.TICKET_LOGS_OUTPUT_FOLDER;

  const { JIRA_BASE_URL, JIRA_EMAIL, JIRA_API_TOKEN } = env;
  if (!JIRA_BASE_URL && !JIRA_EMAIL && !JIRA_API_TOKEN) return merged;

  const tracker = merged.tracker;
  if (tracker === undefined || (isRecord(tracker) && tracker.provider === "jira")) {
    const fileConfig = isRecord(tracker) && isRecord(tracker.config) ? tracker.config : {};
    merged.tracker = {
      provider: "jira",
      config: {
        ...fileConfig,
        ...(JIRA_BASE_URL ? { baseUrl: JIRA_BASE_URL } : {}),
        ...(JIRA_EMAIL ? { email: JIRA_EMAIL } : {}),
        ...(JIRA_API_TOKEN ? { apiToken: JIRA_API_TOKEN } : {}),
      },
    };
  }
  return merged;
}

/** Read an optional JSON config file, overlay the environment, validate. */
export async function loadConfig(opts: {
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<Record<keyof Config, unknown>>;
} = {}): Promise<Config> {
  let raw: Record<string, unknown> = {};
  if (opts.file) {
    let text: string;
    try {
      text = await readFile(expandHome(opts.file), "utf-8");
    } catch (err) {
      throw new ConfigError(`cannot read ${opts.file}`, { cause: err });
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(`${opts.file} is not valid JSON`, { cause: err });
    }
    if (!isRecord(json)) {
      throw new ConfigError(`${opts.file} must contain a JSON object`);
    }
    raw = { ...json };
  }

  raw = applyEnv(raw, opts.env ?? process.env);
  for (const [key, value] of Object.entries(opts.overrides ?? {})) {
    if (value !== undefined) raw[key] = value;
  }
  return parseConfig(raw);
}

// ---------------------------------------------------------------------------
// Tracker factory
// ---------------------------------------------------------------------------

export function buildTracker(tracker: TrackerConfig | undefined): IssueTrackerClient {
  if (!tracker) {
    throw new ConfigError(
      "no issue tracker configured; set JIRA_BASE_URL, JIRA_EMAIL and JIRA_API_TOKEN or add a `tracker` section",
    );
  }
  switch (tracker.provider) {
    case "jira":
      return new JiraClient(tracker.config);
    case "directory":
      return new DirectoryTrackerClient(expandHome(tracker.config.path));
  }
}
