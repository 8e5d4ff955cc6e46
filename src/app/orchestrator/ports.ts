/**
 * Orchestrator ports define the boundary between the deployment pipeline and adapters.
 * Purpose: make process, repository and logging dependencies explicit and replaceable for testing.
 * Assumptions: ports stay small and map to stable runtime capabilities.
 * Usage: provide implementations in `run-context.ts` and inject into the orchestrator.
 */

import type { JsonlLogger } from "../../core/logger.js";

// =============================================================================
// COMMANDS
// =============================================================================

export type CommandSpec = {
  file: string;
  args: string[];
};

export type CommandRunOptions = {
  cwd: string;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  canceled: boolean;
};

// =============================================================================
// PORTS
// =============================================================================

export interface CommandRunner {
  run(command: CommandSpec, options: CommandRunOptions): Promise<CommandResult>;
}

export interface RepoInspector {
  isGitRepo(repoPath: string): Promise<boolean>;
  getRemoteUrl(repoPath: string, remote: string): Promise<string | null>;
}

export interface LogSink {
  createRunLogger(traceId: string): JsonlLogger;
}

export interface Clock {
  now(): Date;
}

export type OrchestratorPorts = {
  commandRunner: CommandRunner;
  repo: RepoInspector;
  logSink: LogSink;
  clock: Clock;
};

export function describeCommand(command: CommandSpec): string {
  return [command.file, ...command.args].join(" ");
}
