/**
 * Streaming log entry parser.
 *
 * A log file is a sequence of entries, each starting at a line that begins
 * with the entry marker:
 *
 *   💡 #42 POST https://api.example.com/v1/orders
 *   request: {...}
 *   response: {...}
 *
 * Lines of the form `... #42 POST https://...` start an entry too, so
 * timestamped request logs without the marker are read the same way.
 *
 * The request ID is the first `#<digits>` on the entry line and the
 * endpoint is the URL on it. Text before the first entry is yielded as a
 * preamble so the spans of a file always add up to the whole file.
 */
import type { LogEntry } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";

export const DEFAULT_ENTRY_MARKER = "💡";

/** Decides whether a line (terminator and leading BOM removed) starts an entry. */
export type EntryStartPredicate = (line: string) => boolean;

export interface EntryParserOptions {
  marker?: string;
  /** Replaces the default marker-or-request-line test. */
  isEntryStart?: EntryStartPredicate;
}

const BOM = "\uFEFF";
const REQUEST_LINE_PATTERN = /#\d+\s+(GET|POST|PUT|DELETE|PATCH|HEAD|OPTIONS)\b/;

const REQUEST_ID_PATTERN = /#(\d+)/;
const METHOD_URL_PATTERN =
  /(GET|POST|PUT|DELETE|PATCH|HEAD|OPTIONS)\s+(https?:\/\/[^\s",]+)/;
const NUMBER_URL_PATTERN = /\d+\s+(https?:\/\/[^\s",]+)/;
const URL_PATTERN = /https?:\/\/[^\s",]+/;

function cleanUrl(url: string): string {
  return url.replace(/["' ,}]+$/, "");
}

/** A line starting with `marker`, or a `#<digits> <METHOD>` request line. */
export function defaultEntryStart(marker: string = DEFAULT_ENTRY_MARKER): EntryStartPredicate {
  return (line) => line.startsWith(marker) || REQUEST_LINE_PATTERN.test(line);
}

export function stripTerminator(line: string): string {
  return line.replace(/\r?\n$/, "");
}

export function extractRequestId(line: string): string | null {
  return REQUEST_ID_PATTERN.exec(line)?.[1] ?? null;
}

/** URL after an HTTP method, else after a number, else the first URL on the line. */
export function extractEndpoint(line: string): string | null {
  const afterMethod = METHOD_URL_PATTERN.exec(line);
  if (afterMethod) return cleanUrl(afterMethod[2]);

  const afterNumber = NUMBER_URL_PATTERN.exec(line);
  if (afterNumber) return cleanUrl(afterNumber[1]);

  const any = URL_PATTERN.exec(line);
  return any ? cleanUrl(any[0]) : null;
}

/** Yield the lines of a stored file with their terminators kept. */
export async function* readLines(
  storage: StorageBackend,
  key: string,
): AsyncGenerator<string> {
  const decoder = new TextDecoder("utf-8", { ignoreBOM: true });
  let pending = "";

  for await (const chunk of storage.readStream(key)) {
    pending += decoder.decode(chunk, { stream: true });
    let newline = pending.indexOf("\n");
    while (newline !== -1) {
      yield pending.slice(0, newline + 1);
      pending = pending.slice(newline + 1);
      newline = pending.indexOf("\n");
    }
  }

  pending += decoder.decode();
  if (pending.length > 0) yield pending;
}

interface OpenEntry {
  line: number;
  id: string | null;
  endpoint: string | null;
  preamble: boolean;
  parts: string[];
}

/**
 * Restartable sequence of the entries of one log file. Each iteration
 * re-reads the file from the start; only the current entry is held in
 * memory.
 */
export class LogEntryReader implements AsyncIterable<LogEntry> {
  private storage: StorageBackend;
  private key: string;
  private isEntryStart: EntryStartPredicate;

  constructor(storage: StorageBackend, key: string, options: EntryParserOptions = {}) {
    this.storage = storage;
    this.key = key;
    this.isEntryStart =
      options.isEntryStart ?? defaultEntryStart(options.marker || DEFAULT_ENTRY_MARKER);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<LogEntry> {
    let current: OpenEntry | null = null;
    let index = 0;
    let lineNo = 0;

    for await (const line of readLines(this.storage, this.key)) {
      lineNo++;
      let text = stripTerminator(line);
      if (lineNo === 1 && text.startsWith(BOM)) text = text.slice(BOM.length);

      if (this.isEntryStart(text)) {
        if (current) yield this.close(current, index++);
        current = {
          line: lineNo,
          id: extractRequestId(text),
          endpoint: extractEndpoint(text),
          preamble: false,
          parts: [line],
        };
      } else if (current) {
        current.parts.push(line);
      } else {
        current = { line: lineNo, id: null, endpoint: null, preamble: true, parts: [line] };
      }
    }

    if (current) yield this.close(current, index);
  }

  private close(entry: OpenEntry, index: number): LogEntry {
    return {
      file: this.key,
      index,
      line: entry.line,
      id: entry.id,
      endpoint: entry.endpoint,
      raw: entry.parts.join(""),
      preamble: entry.preamble,
    };
  }
}

export function readLogEntries(
  storage: StorageBackend,
  key: string,
  options: EntryParserOptions = {},
): LogEntryReader {
  return new LogEntryReader(storage, key, options);
}
