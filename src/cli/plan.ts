import type { AppContext } from "../app/context.js";
import type { LogSink } from "../app/orchestrator/ports.js";
import { attachJsonlSink, createDefaultPorts } from "../app/orchestrator/run-context.js";
import {
  createSimulatedExecutor,
  Planner,
  type PlanResult,
  type SubtaskExecutor,
  type SubtaskResult,
} from "../app/planner/planner.js";
import { createRootContext, type ExecutionMode } from "../core/context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { ALL_EVENTS, EventBus } from "../core/event-bus.js";
import { defaultRunId } from "../core/utils.js";
import { ValidationGateway } from "../gateway/gateway.js";

import { renderCancellationNotice } from "./error-format.js";
import { createProgressPrinter } from "./progress.js";
import { createRunStopSignalHandler, type RunStopSignalHandler } from "./signal-handlers.js";

export type PlanCommandOptions = {
  mode?: ExecutionMode;
  runId?: string;
  delayMs?: number;
  quiet?: boolean;
};

export type PlanCommandDeps = {
  executor?: SubtaskExecutor;
  logSink?: LogSink;
  stopHandler?: RunStopSignalHandler;
  write?: (line: string) => void;
};

export async function planCommand(
  appContext: AppContext,
  goal: string,
  opts: PlanCommandOptions = {},
  deps: PlanCommandDeps = {},
): Promise<PlanResult> {
  const { config } = appContext;
  const write = deps.write ?? console.log;
  const traceId = opts.runId ?? `plan-${defaultRunId()}`;
  const logSink = deps.logSink ?? createDefaultPorts(appContext.paths).logSink;
  const stopHandler = deps.stopHandler ?? createRunStopSignalHandler();

  const bus = new EventBus();
  const logger = logSink.createRunLogger(traceId);
  attachJsonlSink(bus, logger);
  if (!opts.quiet) {
    bus.subscribe(ALL_EVENTS, createProgressPrinter(write));
  }

  const planner = new Planner({
    bus,
    gateway: new ValidationGateway(config.gateway),
    rootContext: createRootContext({ traceId, mode: opts.mode ?? config.mode }),
    executor: deps.executor ?? createSimulatedExecutor(opts.delayMs),
    signal: stopHandler.signal,
  });

  write(`Trace ID: ${traceId}`);
  write(`Goal: ${goal}`);

  let result: PlanResult;
  try {
    result = await planner.planAndExecute(goal);
  } finally {
    stopHandler.cleanup();
    logger.close();
  }

  for (const subtask of result.results) {
    write(formatSubtaskLine(subtask));
  }

  const traceLine = `(trace ${traceId})`;
  const { outcome } = result;
  switch (outcome.status) {
    case "completed":
      write(`Goal complete: ${goal} ${traceLine}`);
      return result;
    case "cancelled":
      write(renderCancellationNotice(outcome.reason));
      write(`Plan cancelled: ${goal} ${traceLine}`);
      return result;
    case "failed":
      write(`Plan failed: ${goal} ${traceLine}`);
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.task,
        title: "Plan failed.",
        message: outcome.reason,
        next: `Inspect the run with: deploy-scope events --run-id ${traceId}`,
      });
  }
}

export function formatSubtaskLine(subtask: SubtaskResult): string {
  const detail = subtask.output ?? subtask.reason;
  return `${subtask.task} [${subtask.mode}] ${subtask.status}${detail ? `: ${detail}` : ""}`;
}
