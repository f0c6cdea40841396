/**
 * File Log Sink
 *
 * Appends one line per record to `<dir>/<prefix>-YYYYMMDD.log`.
 * The file name follows the UTC date of each record, so a long-running
 * process rolls over to a new file at midnight.
 *
 * Writes are synchronous.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

import type { LogRecord, LogSink } from "./logger";

export type FileLogSinkOptions = {
  dir: string;
  prefix: string;
};

function formatDate(tsMs: number): string {
  return new Date(tsMs).toISOString().slice(0, 10).replaceAll("-", "");
}

/**
 * Render a record as a single log line: `<iso> [LEVEL] message key=value ...`
 */
export function formatLogLine(record: LogRecord): string {
  const base = `${new Date(record.tsMs).toISOString()} [${record.level}] ${record.message}`;
  if (!record.fields) return base;

  const fields = Object.entries(record.fields)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");
  return `${base} ${fields}`;
}

export class FileLogSink implements LogSink {
  private readonly dir: string;
  private readonly prefix: string;
  private dirReady = false;

  constructor(options: FileLogSinkOptions) {
    this.dir = options.dir;
    this.prefix = options.prefix;
  }

  /**
   * Path of the file a record at `tsMs` is written to.
   */
  pathFor(tsMs: number = Date.now()): string {
    return join(this.dir, `${this.prefix}-${formatDate(tsMs)}.log`);
  }

  write(record: LogRecord): void {
    if (!this.dirReady) {
      mkdirSync(this.dir, { recursive: true });
      this.dirReady = true;
    }
    appendFileSync(this.pathFor(record.tsMs), `${formatLogLine(record)}\n`, "utf8");
  }
}
