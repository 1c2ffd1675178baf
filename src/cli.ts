#!/usr/bin/env node
/**
 * CLI entrypoint for ticket-logs.
 *
 * Usage:
 *   ticket-logs download PROJ-123
 *   ticket-logs find PROJ-123 4711
 */
import { realpathSync } from "node:fs";
import { basename } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { formatSize } from "./bundle/lifecycle.js";
import { loadConfig } from "./config.js";
import { TicketLogsError } from "./core/exceptions.js";
import { TicketLogs } from "./index.js";
import { groupHitsByFile } from "./logs/search.js";
import { logger } from "./utils/logger.js";

const USAGE = `
ticket-logs: fetch and query log bundles attached to tickets

Usage:
  ticket-logs download <ticket> [--all]
  ticket-logs find <ticket> <request-id>
  ticket-logs search <ticket> <keyword>
  ticket-logs clean <ticket> [--dry-run]

Options:
  --all                    Download every attachment, not only log files
  --dry-run                Show what clean would delete
  --config <file>          JSON config file
  --root <dir>             Download root directory   (default: ~/Downloads)
  --output-folder <name>   Extraction folder name    (default: merged)
  --help                   Show this help

Environment:
  JIRA_BASE_URL, JIRA_EMAIL, JIRA_API_TOKEN, TICKET_LOGS_ROOT,
  TICKET_LOGS_OUTPUT_FOLDER, TICKET_LOGS_DEBUG
`.trim();

export interface CliOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      all: { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
      config: { type: "string" },
      root: { type: "string" },
      "output-folder": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

/** Run one command; resolves to the process exit code. */
export async function runCli(
  argv: string[],
  io: CliOutput = consoleOutput,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    io.err(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.out(USAGE);
    return 0;
  }

  const [command, ticketId, arg] = positionals;
  if (!command || !ticketId) {
    io.err(USAGE);
    return 1;
  }

  try {
    const config = await loadConfig({
      file: values.config,
      env,
      overrides: { rootDir: values.root, outputFolder: values["output-folder"] },
    });
    const ctx = TicketLogs.fromConfig(config);

    switch (command) {
      case "download":
        return await download(ctx, io, ticketId, values.all);
      case "find":
        if (!arg) break;
        return await find(ctx, io, ticketId, arg);
      case "search":
        if (arg === undefined) break;
        return await search(ctx, io, ticketId, arg);
      case "clean":
        return await clean(ctx, io, ticketId, values["dry-run"]);
    }
  } catch (err) {
    if (err instanceof TicketLogsError) {
      io.err(err.message);
    } else {
      logger.error(`Unexpected failure running ${command}`, err);
      io.err(`Error: ${String(err)}`);
    }
    return 1;
  }

  io.err(USAGE);
  return 1;
}

async function download(
  ctx: TicketLogs,
  io: CliOutput,
  ticketId: string,
  all: boolean,
): Promise<number> {
  const result = await ctx.download(ticketId, { all });
  if (result.status === "nothing-to-download") {
    io.out(`Nothing to download for ${ticketId}.`);
    return 0;
  }

  io.out(`Downloaded ${result.attachments.length} attachment(s) to ${result.stagingDir}`);
  if (result.bundleDir) {
    io.out(`Logs extracted to ${result.bundleDir}`);
  } else {
    io.out("No log archive among the attachments; nothing was extracted.");
  }
  return 0;
}

async function find(
  ctx: TicketLogs,
  io: CliOutput,
  ticketId: string,
  requestId: string,
): Promise<number> {
  const result = await ctx.find(ticketId, requestId);
  if (!result) {
    io.out(`No entry with request ID ${requestId} in the logs of ${ticketId}.`);
    return 0;
  }

  const { entry, payload } = result;
  io.out(`#${requestId} ${entry.endpoint ?? "(no endpoint)"}  [${basename(entry.file)}:${entry.line}]`);
  io.out(payload ?? "(no response payload)");
  return 0;
}

async function search(
  ctx: TicketLogs,
  io: CliOutput,
  ticketId: string,
  keyword: string,
): Promise<number> {
  const hits = await ctx.search(ticketId, keyword);
  if (hits.length === 0) {
    io.out(`No matches for "${keyword}" in the logs of ${ticketId}.`);
    return 0;
  }

  for (const [file, group] of groupHitsByFile(hits)) {
    io.out(`${basename(file)}:`);
    for (const hit of group) {
      io.out(`  #${hit.id ?? "?"} ${hit.endpoint ?? "(no endpoint)"}`);
    }
  }
  return 0;
}

async function clean(
  ctx: TicketLogs,
  io: CliOutput,
  ticketId: string,
  dryRun: boolean,
): Promise<number> {
  const result = await ctx.clean(ticketId, { dryRun });
  if (!result.exists) {
    io.out(`Nothing to clean for ${ticketId} (${result.path} does not exist).`);
    return 0;
  }

  const summary = `${result.fileCount} file(s), ${formatSize(result.sizeBytes)}`;
  io.out(
    result.dryRun
      ? `[DRY RUN] Would delete ${result.path} (${summary})`
      : `Deleted ${result.path} (${summary})`,
  );
  return 0;
}

function isEntrypoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  process.exitCode = await runCli(process.argv.slice(2));
}
