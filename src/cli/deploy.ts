import type { AppContext } from "../app/context.js";
import type { RunSummary } from "../app/orchestrator/orchestrator.js";
import type { OrchestratorPorts } from "../app/orchestrator/ports.js";
import {
  createDefaultPorts,
  createDeploymentRun,
  resolveRemoteUrl,
} from "../app/orchestrator/run-context.js";
import type { ExecutionMode } from "../core/context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { runEventsPath } from "../core/paths.js";
import { defaultTraceId } from "../core/utils.js";

import { renderCancellationNotice } from "./error-format.js";
import { createProgressPrinter } from "./progress.js";
import { createRunStopSignalHandler, type RunStopSignalHandler } from "./signal-handlers.js";

export type DeployCommandOptions = {
  remote?: string;
  mode?: ExecutionMode;
  runId?: string;
  quiet?: boolean;
};

export type DeployCommandDeps = {
  ports?: OrchestratorPorts;
  stopHandler?: RunStopSignalHandler;
  write?: (line: string) => void;
};

export async function deployCommand(
  appContext: AppContext,
  opts: DeployCommandOptions,
  deps: DeployCommandDeps = {},
): Promise<RunSummary> {
  const { config, paths } = appContext;
  const write = deps.write ?? console.log;
  const remoteUrl = resolveRemoteUrl(config, opts.remote);
  const traceId = opts.runId ?? defaultTraceId();
  const ports = deps.ports ?? createDefaultPorts(paths);

  const stopHandler =
    deps.stopHandler ??
    createRunStopSignalHandler({
      onSignal: (signal) => {
        write(`Received ${signal}. Cancelling run ${traceId}.`);
      },
    });

  write(`Trace ID: ${traceId}`);
  write(`Mode: ${opts.mode ?? config.mode}`);
  write(`Repository: ${config.repo_path}`);
  write(`Target: ${remoteUrl}`);

  let summary: RunSummary;
  const run = createDeploymentRun({
    config,
    ports,
    traceId,
    remoteUrl,
    mode: opts.mode,
    signal: stopHandler.signal,
    onEvent: opts.quiet ? undefined : createProgressPrinter(write),
  });
  try {
    summary = await run.orchestrator.run();
  } finally {
    stopHandler.cleanup();
    run.logger.close();
  }

  const eventsLine = `${summary.totalEvents} events emitted (trace ${summary.traceId})`;
  const { outcome } = summary;
  switch (outcome.status) {
    case "completed":
      write(`Deployment complete: ${eventsLine}`);
      write(`Event log: ${runEventsPath(traceId, paths)}`);
      return summary;
    case "cancelled":
      write(renderCancellationNotice(outcome.reason));
      write(`Deployment cancelled: ${eventsLine}`);
      return summary;
    case "failed":
      write(`Deployment failed: ${eventsLine}`);
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.task,
        title: "Deployment failed.",
        message: outcome.reason,
        next: `Inspect the run with: deploy-scope events --run-id ${traceId}`,
        cause: outcome.error,
      });
  }
}
