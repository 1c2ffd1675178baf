/**
 * Structured logger: one JSON object per line on stderr, so stdout stays
 * reserved for command output.
 */

type Level = "debug" | "info" | "warn" | "error";

function emit(level: Level, msg: string, meta?: object): void {
  process.stderr.write(
    `${JSON.stringify({
      level,
      message: msg,
      ...meta,
      timestamp: Date.now(),
    })}\n`,
  );
}

export const logger = {
  debug: (msg: string, meta?: object) => {
    if (process.env.TICKET_LOGS_DEBUG) emit("debug", msg, meta);
  },
  info: (msg: string, meta?: object) => {
    emit("info", msg, meta);
  },
  warn: (msg: string, meta?: object) => {
    emit("warn", msg, meta);
  },
  error: (msg: string, error?: unknown) => {
    emit("error", msg, { error: String(error) });
  },
};
