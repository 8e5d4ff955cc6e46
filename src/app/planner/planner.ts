/**
 * Planner decomposes a goal into mode-tagged subtasks and runs them inside one scope.
 * Purpose: apply the same gateway + scope discipline to agent work as to deployment steps.
 * Assumptions: subtasks run one after another; the first non-completed subtask stops the plan.
 * Usage: const result = await new Planner({ bus, gateway, rootContext, executor }).planAndExecute(goal).
 */

import { setTimeout as delay } from "node:timers/promises";

import type { CancellationReason } from "../../core/cancellation.js";
import type { ExecutionContext } from "../../core/context.js";
import { formatErrorMessage } from "../../core/error-format.js";
import type { EventBus } from "../../core/event-bus.js";
import type { JsonObject } from "../../core/logger.js";
import { runTaskScope, type TaskOutcome, type TaskRuntime } from "../../core/task-scope.js";
import { enforceDecision, type ValidationGateway } from "../../gateway/gateway.js";

import { decomposeGoal, type PlannedSubtask } from "./decompose.js";

// =============================================================================
// TYPES
// =============================================================================

export interface SubtaskExecutor {
  execute(subtask: PlannedSubtask, task: TaskRuntime): Promise<string>;
}

export type SubtaskResult = {
  task: string;
  mode: PlannedSubtask["mode"];
  status: TaskOutcome<string>["status"];
  output?: string;
  reason?: string;
};

export type PlanOutcome =
  | { status: "completed" }
  | { status: "cancelled"; reason: CancellationReason }
  | { status: "failed"; reason: string };

export type PlanResult = {
  goal: string;
  results: SubtaskResult[];
  outcome: PlanOutcome;
};

export type PlannerOptions = {
  bus: EventBus;
  gateway: ValidationGateway;
  rootContext: ExecutionContext;
  executor: SubtaskExecutor;
  signal?: AbortSignal;
};

// =============================================================================
// EXECUTORS
// =============================================================================

// Stand-in executor: waits, then reports completion. Honors the task's abort signal.
export function createSimulatedExecutor(delayMs = 0): SubtaskExecutor {
  return {
    execute: async (subtask, task) => {
      await delay(delayMs, undefined, { signal: task.signal });
      return `Completed ${subtask.task}`;
    },
  };
}

// =============================================================================
// PLANNER
// =============================================================================

export class Planner {
  constructor(private readonly options: PlannerOptions) {}

  async planAndExecute(goal: string): Promise<PlanResult> {
    const { bus, rootContext, signal } = this.options;

    await bus.emit("agent.plan", { goal }, rootContext);
    const subtasks = decomposeGoal(goal);

    const results: SubtaskResult[] = [];
    let outcome: PlanOutcome;
    try {
      outcome = await runTaskScope(
        { name: "plan", parentContext: rootContext, bus, signal },
        async (scope) => {
          for (const subtask of subtasks) {
            const handle = scope.spawn(
              subtask.span,
              (task) => this.executeSubtask(subtask, task),
              { mode: subtask.mode },
            );
            const taskOutcome = await handle.outcome;
            results.push(toSubtaskResult(subtask, taskOutcome));
            if (taskOutcome.status !== "completed") return;
          }
        },
      );
    } catch (error) {
      outcome = { status: "failed", reason: formatErrorMessage(error) };
    }

    await bus.emit(
      "plan.done",
      {
        goal,
        status: outcome.status,
        total_tasks: subtasks.length,
        results: results.map(resultPayload),
      },
      rootContext,
    );

    return { goal, results, outcome };
  }

  private async executeSubtask(subtask: PlannedSubtask, task: TaskRuntime): Promise<string> {
    const { bus, gateway, executor } = this.options;
    const { context } = task;

    const decision = gateway.validate(
      subtask.task,
      `Execute ${subtask.task} as ${subtask.mode}`,
      context,
    );
    if (decision.kind === "allowed") {
      await bus.emit(
        "agent.validated",
        { task: subtask.task, warnings: decision.warnings.map((warning) => warning.message) },
        context,
      );
    } else {
      await bus.emit("agent.rejected", { task: subtask.task, reason: decision.reason }, context);
    }
    enforceDecision(decision);

    await bus.emit(
      "agent.execute",
      { task: subtask.task, mode: subtask.mode, complexity: subtask.complexity },
      context,
    );
    const output = await executor.execute(subtask, task);
    await bus.emit("agent.complete", { task: subtask.task, output }, context);

    return output;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function toSubtaskResult(subtask: PlannedSubtask, outcome: TaskOutcome<string>): SubtaskResult {
  const base = { task: subtask.task, mode: subtask.mode };
  switch (outcome.status) {
    case "completed":
      return { ...base, status: "completed", output: outcome.value };
    case "cancelled":
      return { ...base, status: "cancelled", reason: outcome.reason.message };
    case "failed":
      return { ...base, status: "failed", reason: outcome.error.message };
  }
}

function resultPayload(result: SubtaskResult): JsonObject {
  const payload: JsonObject = { task: result.task, mode: result.mode, status: result.status };
  if (result.output !== undefined) payload.output = result.output;
  if (result.reason !== undefined) payload.reason = result.reason;
  return payload;
}
