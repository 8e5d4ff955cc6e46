import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { ProjectConfigSchema } from "../../../core/config.js";
import { createRootContext } from "../../../core/context.js";
import { EventBus } from "../../../core/event-bus.js";
import type { TaskRuntime } from "../../../core/task-scope.js";
import { Orchestrator } from "../orchestrator.js";
import { createDeploymentRun, resolveRemoteUrl, type DeploymentRun } from "../run-context.js";

import { createFakePorts, type FakePorts } from "./fakes.js";

// =============================================================================
// HELPERS
// =============================================================================

const TRACE_ID = "deploy-20260301-120000";
const REMOTE_URL = "https://git.example.test/acme/app.git";

const tempDirs: string[] = [];
const openRuns: DeploymentRun[] = [];

afterEach(async () => {
  for (const run of openRuns.splice(0)) {
    run.logger.close();
  }
  for (const dir of tempDirs.splice(0)) {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

async function makeTempDir(prefix: string): Promise<string> {
  const directoryPath = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(directoryPath);
  return directoryPath;
}

type SetupInput = {
  config?: Record<string, unknown>;
  repo?: Parameters<typeof createFakePorts>[1];
  signal?: AbortSignal;
};

async function setupRun(
  input: SetupInput = {},
): Promise<{ run: DeploymentRun; ports: FakePorts; logsRoot: string }> {
  const logsRoot = await makeTempDir("deploy-orchestrator-");
  const ports = createFakePorts(logsRoot, input.repo);
  const config = ProjectConfigSchema.parse({
    repo_path: "/work/app",
    remote_url: REMOTE_URL,
    commit_message: "Deploy {trace_id} ({mode})",
    ...input.config,
  });

  const run = createDeploymentRun({
    config,
    ports,
    traceId: TRACE_ID,
    remoteUrl: resolveRemoteUrl(config),
    signal: input.signal,
  });
  openRuns.push(run);
  return { run, ports, logsRoot };
}

function eventTypes(run: DeploymentRun): string[] {
  return run.bus.events().map((event) => event.type);
}

function findPayload(run: DeploymentRun, type: string): unknown {
  return run.bus.events().find((event) => event.type === type)?.payload;
}

// =============================================================================
// TESTS
// =============================================================================

describe("deployment run", () => {
  it("initializes, commits and pushes a fresh repository", async () => {
    const { run, ports } = await setupRun();

    const summary = await run.orchestrator.run();

    expect(summary).toEqual({
      traceId: TRACE_ID,
      outcome: { status: "completed" },
      totalEvents: 29,
      phases: [
        { name: "meta_analysis", status: "completed" },
        { name: "repo_prep", status: "completed" },
        { name: "commit", status: "completed" },
        { name: "remote_deploy", status: "completed" },
      ],
    });
    expect(ports.commandRunner.actions).toEqual([
      "git init",
      "git add .",
      `git commit -m Deploy ${TRACE_ID} (architect)`,
      `git remote add origin ${REMOTE_URL}`,
      "git branch -M main",
      "git push -u origin main",
    ]);
    expect(ports.commandRunner.calls[0]?.options.cwd).toBe("/work/app");
    expect(ports.commandRunner.calls[0]?.options.timeoutMs).toBe(300_000);
    expect(eventTypes(run)[0]).toBe("run.start");
    expect(eventTypes(run).at(-1)).toBe("run.complete");
  });

  it("skips init and remote setup when the repository already has them", async () => {
    const { run, ports } = await setupRun({
      repo: { gitRepo: true, remotes: { origin: REMOTE_URL } },
    });

    const summary = await run.orchestrator.run();

    expect(summary.outcome).toEqual({ status: "completed" });
    expect(ports.commandRunner.actions).toEqual([
      "git add .",
      `git commit -m Deploy ${TRACE_ID} (architect)`,
      "git branch -M main",
      "git push -u origin main",
    ]);
  });

  it("uses the configured remote name and branch", async () => {
    const { run, ports } = await setupRun({
      config: { remote_name: "deploy", main_branch: "release" },
      repo: { gitRepo: true },
    });

    await run.orchestrator.run();

    expect(ports.commandRunner.actions.slice(-3)).toEqual([
      `git remote add deploy ${REMOTE_URL}`,
      "git branch -M release",
      "git push -u deploy release",
    ]);
  });

  it("records every event in the run's JSONL log", async () => {
    const { run, logsRoot } = await setupRun();

    await run.orchestrator.run();
    run.logger.close();

    const raw = await fs.readFile(path.join(logsRoot, TRACE_ID, "events.jsonl"), "utf8");
    const lines = raw.trim().split("\n");
    expect(lines).toHaveLength(29);
    expect(JSON.parse(lines[0] ?? "{}")).toEqual({
      ts: "2026-03-01T12:00:00.000Z",
      type: "run.start",
      run_id: TRACE_ID,
      span_id: "root",
      payload: {
        mode: "architect",
        phases: ["meta_analysis", "repo_prep", "commit", "remote_deploy"],
      },
    });
    expect(JSON.parse(lines[2] ?? "{}")).toMatchObject({
      type: "analysis.report",
      span_id: "root.meta_analysis",
    });
  });

  it("stops sequencing after a self-preservation veto and reports a cancelled run", async () => {
    const { run, ports } = await setupRun({
      config: { gateway: { self_preservation: ["git commit"] } },
      repo: { gitRepo: true, remotes: { origin: REMOTE_URL } },
    });

    const summary = await run.orchestrator.run();

    const reason = `Self-preservation veto: "git commit -m Deploy ${TRACE_ID} (architect)" matches protected pattern "git commit"`;
    expect(summary.outcome).toEqual({
      status: "cancelled",
      reason: { kind: "self_preservation", message: reason },
    });
    expect(summary.phases).toEqual([
      { name: "meta_analysis", status: "completed" },
      { name: "repo_prep", status: "completed" },
      { name: "commit", status: "cancelled" },
    ]);
    expect(ports.commandRunner.actions).toEqual(["git add ."]);
    expect(findPayload(run, "gateway.rejected")).toEqual({
      action: `git commit -m Deploy ${TRACE_ID} (architect)`,
      category: "self_preservation",
      reason,
    });
    expect(eventTypes(run).at(-1)).toBe("run.cancelled");
    expect(findPayload(run, "run.cancelled")).toEqual({ kind: "self_preservation", reason });
  });

  it("reports a failed run when a command exits non-zero", async () => {
    const { run, ports } = await setupRun({ repo: { gitRepo: true } });
    ports.commandRunner.script("git add", { exitCode: 128, stderr: "fatal: pathspec\n" });

    const summary = await run.orchestrator.run();

    const reason =
      'Task git_add failed [span: root.repo_prep.git_add]: Command "git add ." exited with 128: fatal: pathspec';
    expect(summary.outcome).toMatchObject({ status: "failed", reason });
    expect(summary.phases).toEqual([
      { name: "meta_analysis", status: "completed" },
      { name: "repo_prep", status: "failed" },
    ]);
    expect(ports.commandRunner.actions).toEqual(["git add ."]);
    expect(findPayload(run, "task.error")).toEqual({
      task: "git_add",
      error: 'Command "git add ." exited with 128: fatal: pathspec',
    });
    expect(findPayload(run, "run.failed")).toEqual({ reason });
  });

  it("treats a command timeout as a cancellation", async () => {
    const { run, ports } = await setupRun({
      config: { command_timeout_seconds: 5 },
      repo: { gitRepo: true, remotes: { origin: REMOTE_URL } },
    });
    ports.commandRunner.script("git push", { exitCode: -1, timedOut: true });

    const summary = await run.orchestrator.run();

    expect(summary.outcome).toEqual({
      status: "cancelled",
      reason: {
        kind: "timeout",
        message: 'Command "git push -u origin main" exceeded 5000ms; cancelling operation',
      },
    });
    expect(summary.phases.at(-1)).toEqual({ name: "remote_deploy", status: "cancelled" });
  });

  it("cancels the running command when the external signal aborts", async () => {
    const controller = new AbortController();
    const { run, ports } = await setupRun({
      repo: { gitRepo: true },
      signal: controller.signal,
    });
    ports.commandRunner.script("git add", { hang: true });
    ports.commandRunner.onCall = (action) => {
      if (action === "git add .") controller.abort("SIGINT");
    };

    const summary = await run.orchestrator.run();

    expect(summary.outcome).toEqual({
      status: "cancelled",
      reason: { kind: "external", message: "Cancelled (SIGINT)" },
    });
    expect(summary.phases).toEqual([
      { name: "meta_analysis", status: "completed" },
      { name: "repo_prep", status: "cancelled" },
    ]);
    expect(ports.commandRunner.actions).toEqual(["git add ."]);
    expect(findPayload(run, "task.cancelled")).toEqual({
      task: "git_add",
      kind: "external",
      reason: "Cancelled (SIGINT)",
    });
  });

  it("runs no phase when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort("SIGTERM");
    const { run, ports } = await setupRun({ signal: controller.signal });

    const summary = await run.orchestrator.run();

    expect(summary).toEqual({
      traceId: TRACE_ID,
      outcome: { status: "cancelled", reason: { kind: "external", message: "Cancelled (SIGTERM)" } },
      totalEvents: 2,
      phases: [],
    });
    expect(eventTypes(run)).toEqual(["run.start", "run.cancelled"]);
    expect(ports.commandRunner.calls).toEqual([]);
  });

  it("keeps the analysis report unchanged when a subscriber tampers with it", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const first = await setupRun();
    first.run.bus.subscribe("analysis.report", (event) => {
      const concerns = event.payload.concerns;
      if (Array.isArray(concerns)) concerns.push("injected");
    });
    await first.run.orchestrator.run();

    const second = await setupRun();
    await second.run.orchestrator.run();
    warn.mockRestore();

    expect(first.run.bus.subscriberFailures()).toHaveLength(1);

    for (const { run } of [first, second]) {
      expect(findPayload(run, "analysis.report")).toEqual({
        concerns: [
          "context preservation across deployments",
          "cancellation semantics for interrupted pushes",
          "resource cleanup for abandoned steps",
          "observability of deployment causality",
          "validation of destructive operations",
        ],
        phases: ["meta_analysis", "repo_prep", "commit", "remote_deploy"],
      });
    }
  });

  it("emits advisory warnings without blocking the step", async () => {
    const { run } = await setupRun({
      config: { gateway: { advisory: ["git add"] } },
      repo: { gitRepo: true },
    });

    const summary = await run.orchestrator.run();

    expect(summary.outcome).toEqual({ status: "completed" });
    expect(
      run.bus
        .events()
        .filter((event) => event.type === "gateway.warning")
        .map((event) => event.payload),
    ).toEqual([
      {
        action: "git add .",
        kind: "manipulation",
        message: 'Elevated torsion in action: matches "git add"',
      },
      {
        action: "git add .",
        kind: "manipulation",
        message: 'Elevated torsion in intent: matches "git add"',
      },
    ]);
  });
});

describe("Orchestrator", () => {
  const rootContext = createRootContext({ traceId: "trace-1", mode: "surgeon" });

  it("cancels a phase that exceeds its time budget", async () => {
    const bus = new EventBus();
    const orchestrator = new Orchestrator({
      bus,
      rootContext,
      phaseTimeoutMs: 10,
      phases: [
        {
          name: "stall",
          run: async (scope) => {
            scope.spawn("wait", ({ signal }: TaskRuntime) => waitForAbort(signal));
          },
        },
      ],
    });

    const summary = await orchestrator.run();

    expect(summary.outcome).toEqual({
      status: "cancelled",
      reason: { kind: "timeout", message: "Scope stall exceeded its 10ms time budget" },
    });
    expect(summary.traceId).toBe("trace-1");
  });

  it("reports a phase body failure as a failed run", async () => {
    const orchestrator = new Orchestrator({
      bus: new EventBus(),
      rootContext,
      phases: [
        {
          name: "broken",
          run: async () => {
            throw new Error("no phases configured");
          },
        },
      ],
    });

    const summary = await orchestrator.run();

    expect(summary.outcome).toMatchObject({ status: "failed", reason: "no phases configured" });
    expect(summary.phases).toEqual([{ name: "broken", status: "failed" }]);
  });
});

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}
