/**
 * Error taxonomy for the download pipeline and bundle queries.
 *
 * Every message names the ticket, the path or attachment involved and the
 * next step the user can take.
 */

export class TicketLogsError extends Error {
  ticketId: string | null;

  constructor(message: string, ticketId: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TicketLogsError";
    this.ticketId = ticketId;
  }
}

export class InvalidTicketIdError extends TicketLogsError {
  constructor(ticketId: string) {
    super(
      `Invalid ticket ID: ${JSON.stringify(ticketId)}. Check the ticket ID (expected something like PROJ-123).`,
      ticketId,
    );
    this.name = "InvalidTicketIdError";
  }
}

export class ConfigError extends TicketLogsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Invalid configuration: ${message}`, null, options);
    this.name = "ConfigError";
  }
}

export class FetchFailedError extends TicketLogsError {
  attachment: string | null;

  constructor(ticketId: string, attachment: string | null, cause: unknown) {
    const target = attachment
      ? `attachment ${attachment}`
      : "the attachment list";
    super(
      `Failed to fetch ${target} for ${ticketId}: ${describeCause(cause)}. Check your network and tracker credentials, then run download again.`,
      ticketId,
      { cause },
    );
    this.name = "FetchFailedError";
    this.attachment = attachment;
  }
}

export class IncompleteShardSetError extends TicketLogsError {
  missingOrdinal: number;
  missingFile: string;

  constructor(ticketId: string, missingOrdinal: number, missingFile: string, stagingDir: string) {
    super(
      `Incomplete archive for ${ticketId}: missing shard ${missingOrdinal} (${missingFile}) in ${stagingDir}. Re-download the logs for ${ticketId}.`,
      ticketId,
    );
    this.name = "IncompleteShardSetError";
    this.missingOrdinal = missingOrdinal;
    this.missingFile = missingFile;
  }
}

export class CorruptArchiveError extends TicketLogsError {
  archivePath: string;

  constructor(ticketId: string, archivePath: string, cause: unknown) {
    super(
      `Corrupt or unreadable archive for ${ticketId} at ${archivePath}: ${describeCause(cause)}. Run download again for ${ticketId}.`,
      ticketId,
      { cause },
    );
    this.name = "CorruptArchiveError";
    this.archivePath = archivePath;
  }
}

export class BundleNotFoundError extends TicketLogsError {
  bundlePath: string;

  constructor(ticketId: string, bundlePath: string) {
    super(
      `Logs for ${ticketId} are not downloaded yet (expected at ${bundlePath}). Run \`ticket-logs download ${ticketId}\` first.`,
      ticketId,
    );
    this.name = "BundleNotFoundError";
    this.bundlePath = bundlePath;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
