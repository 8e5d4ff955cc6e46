import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

// One line of a run's events.jsonl.
export type LogRecord = {
  ts: string;
  type: string;
  run_id: string;
  span_id?: string;
  payload?: JsonObject;
};

export type LogEntry = {
  type: string;
  spanId?: string;
  payload?: JsonObject;
  ts?: string;
};

export type JsonlLoggerOptions = {
  runId: string;
  // Defaults to the --debug flag on the command line.
  debug?: boolean;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  readonly runId: string;
  private readonly fileDescriptor: number;
  private readonly debug: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    options: JsonlLoggerOptions,
  ) {
    this.runId = options.runId;
    this.debug = options.debug ?? hasDebugFlag(process.argv);
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(entry: LogEntry): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(toLogRecord(this.runId, entry))}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      this.warn(`write log event to ${this.filePath}`, err);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      this.warn(`close log file ${this.filePath}`, err);
    }
  }

  private warn(action: string, error: unknown): void {
    const message = `Warning: failed to ${action}: ${formatErrorMessage(error)}`;
    const stack = this.debug
      ? formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack")
      : undefined;
    console.warn(stack ? `${message}\n${stack.text}` : message);
  }
}

// =============================================================================
// RECORDS
// =============================================================================

export function toLogRecord(runId: string, entry: LogEntry): LogRecord {
  const record: LogRecord = { ts: entry.ts ?? isoNow(), type: entry.type, run_id: runId };
  if (entry.spanId) record.span_id = entry.spanId;
  if (entry.payload && Object.keys(entry.payload).length > 0) record.payload = entry.payload;
  return record;
}

function hasDebugFlag(argv: readonly string[]): boolean {
  const end = argv.indexOf("--");
  const flags = end === -1 ? argv : argv.slice(0, end);
  return flags.lastIndexOf("--debug") > flags.lastIndexOf("--no-debug");
}
