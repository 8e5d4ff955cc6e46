/**
 * execa-backed CommandRunner.
 * Purpose: run deployment commands as child processes with a timeout and an abort signal.
 * Assumptions: non-zero exits are reported in the result, never thrown.
 * Usage: createExecaCommandRunner().run({ file: "git", args: ["add", "."] }, { cwd }).
 */

import { execa } from "execa";

import type { CommandResult, CommandRunner, CommandRunOptions, CommandSpec } from "../ports.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function createExecaCommandRunner(): CommandRunner {
  return {
    run: runWithExeca,
  };
}

async function runWithExeca(
  command: CommandSpec,
  options: CommandRunOptions,
): Promise<CommandResult> {
  const res = await execa(command.file, command.args, {
    cwd: options.cwd,
    stdio: "pipe",
    env: process.env,
    reject: false,
    timeout: options.timeoutMs,
    signal: options.signal,
  });

  return {
    exitCode: res.exitCode ?? -1,
    stdout: String(res.stdout ?? ""),
    stderr: String(res.stderr ?? ""),
    timedOut: res.timedOut,
    canceled: res.isCanceled,
  };
}
