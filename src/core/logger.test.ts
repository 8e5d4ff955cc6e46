import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, toLogRecord } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("JsonlLogger", () => {
  it("writes events with run and span metadata", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "deploy-1" });

    logger.log({ type: "task.start", spanId: "root.commit", payload: { task: "git_commit" } });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);

    const event: Record<string, unknown> = JSON.parse(lines[0]);
    expect(event.type).toBe("task.start");
    expect(event.run_id).toBe("deploy-1");
    expect(event.span_id).toBe("root.commit");
    expect(event.payload).toEqual({ task: "git_commit" });
    expect(new Date(String(event.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "deploy-2" });

    logger.log({ type: "first", payload: { order: 1 } });
    logger.log({ type: "second", payload: { order: 2 } });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    const events = lines.map((line): Record<string, unknown> => JSON.parse(line));

    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("ignores writes after close", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "deploy-3" });

    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(lines.map((line): unknown => JSON.parse(line).type)).toEqual(["kept"]);
  });

  it("warns on write failures with formatted messages", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "deploy-4", debug: false });

    const writeError = new Error("disk full");
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw writeError;
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "task.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });

  it("includes stack details when debug is enabled", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "deploy-5", debug: true });

    const writeError = new Error("disk full");
    writeError.stack = "Error: disk full\n    at fake:1:1";
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw writeError;
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "task.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      [
        `Warning: failed to write log event to ${logPath}: disk full`,
        "Error: disk full",
        "    at fake:1:1",
      ].join("\n"),
    );
  });
});

describe("toLogRecord", () => {
  it("attributes the entry to the run and its span", () => {
    const record = toLogRecord("deploy-x", {
      type: "sample",
      spanId: "root.repo_prep",
      payload: { key: "value" },
    });

    expect(record.run_id).toBe("deploy-x");
    expect(record.span_id).toBe("root.repo_prep");
    expect(record.type).toBe("sample");
    expect(record.payload).toEqual({ key: "value" });
    expect(new Date(record.ts).toString()).not.toBe("Invalid Date");
  });

  it("keeps a supplied timestamp and drops an empty payload", () => {
    expect(
      toLogRecord("deploy-y", { type: "scope.enter", ts: "2026-01-02T03:04:05.000Z", payload: {} }),
    ).toEqual({
      ts: "2026-01-02T03:04:05.000Z",
      type: "scope.enter",
      run_id: "deploy-y",
    });
  });
});
