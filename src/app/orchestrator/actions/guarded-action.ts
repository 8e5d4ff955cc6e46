/**
 * GuardedActionExecutor runs one external command behind the validation gateway.
 * Purpose: every externally-visible deployment step is validated, run, and classified the same way.
 * Assumptions: called from inside a task body; the task's signal is the command's abort signal.
 * Usage: await actions.run(task, { file: "git", args: ["add", "."] }).
 */

import {
  CancellationError,
  cancellationReasonFromAbort,
  type CancellationReason,
} from "../../../core/cancellation.js";
import { ActionFailedError } from "../../../core/errors.js";
import type { EventBus } from "../../../core/event-bus.js";
import type { TaskRuntime } from "../../../core/task-scope.js";
import { enforceDecision, type ValidationGateway } from "../../../gateway/gateway.js";
import {
  describeCommand,
  type CommandResult,
  type CommandRunner,
  type CommandSpec,
} from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type GuardedActionExecutorOptions = {
  gateway: ValidationGateway;
  bus: EventBus;
  commandRunner: CommandRunner;
  cwd: string;
  timeoutMs?: number;
};

// =============================================================================
// EXECUTOR
// =============================================================================

export class GuardedActionExecutor {
  constructor(private readonly options: GuardedActionExecutorOptions) {}

  async run(task: TaskRuntime, command: CommandSpec, intent?: string): Promise<CommandResult> {
    const { gateway, bus, commandRunner, cwd, timeoutMs } = this.options;
    const action = describeCommand(command);

    const decision = gateway.validate(action, intent ?? `Deploy step: ${action}`, task.context);
    if (decision.kind === "allowed") {
      for (const warning of decision.warnings) {
        await bus.emit(
          "gateway.warning",
          { action, kind: warning.kind, message: warning.message },
          task.context,
        );
      }
    } else {
      await bus.emit(
        "gateway.rejected",
        { action, category: decision.category, reason: decision.reason },
        task.context,
      );
    }
    enforceDecision(decision);

    if (task.signal.aborted) {
      throw new CancellationError(cancellationReasonFromAbort(task.signal));
    }

    const result = await commandRunner.run(command, { cwd, timeoutMs, signal: task.signal });

    if (result.timedOut) {
      throw new CancellationError(timeoutReason(action, timeoutMs));
    }
    if (result.canceled) {
      throw new CancellationError(cancellationReasonFromAbort(task.signal));
    }
    if (result.exitCode !== 0) {
      throw new ActionFailedError({ action, exitCode: result.exitCode, stderr: result.stderr });
    }

    await bus.emit("action.complete", { action, exit_code: result.exitCode }, task.context);
    return result;
  }
}

function timeoutReason(action: string, timeoutMs: number | undefined): CancellationReason {
  const budget = timeoutMs === undefined ? "its time budget" : `${timeoutMs}ms`;
  return {
    kind: "timeout",
    message: `Command "${action}" exceeded ${budget}; cancelling operation`,
  };
}
