/**
 * Deployment run wiring: ports, bus, gateway, log sink and phases for one trace.
 * Purpose: keep adapter construction out of the orchestrator and the CLI.
 * Assumptions: one run per trace id; the JSONL logger is closed by the caller.
 * Usage: const run = createDeploymentRun({ config, ports, traceId, remoteUrl }).
 */

import type { ProjectConfig } from "../../core/config.js";
import {
  createRootContext,
  type ExecutionContext,
  type ExecutionMode,
} from "../../core/context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../../core/errors.js";
import { ALL_EVENTS, EventBus, type EventHandler } from "../../core/event-bus.js";
import { JsonlLogger } from "../../core/logger.js";
import { runEventsPath, type PathsContext } from "../../core/paths.js";
import { ValidationGateway } from "../../gateway/gateway.js";
import { getRemoteUrl, isGitRepo } from "../../git/git.js";

import { createExecaCommandRunner } from "./actions/execa-command-runner.js";
import { GuardedActionExecutor } from "./actions/guarded-action.js";
import { Orchestrator } from "./orchestrator.js";
import { createDeploymentPhases, renderCommitMessage } from "./phases/deployment-phases.js";
import type { OrchestratorPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type DeploymentRun = {
  traceId: string;
  rootContext: ExecutionContext;
  bus: EventBus;
  gateway: ValidationGateway;
  orchestrator: Orchestrator;
  logger: JsonlLogger;
};

export type CreateDeploymentRunInput = {
  config: ProjectConfig;
  ports: OrchestratorPorts;
  traceId: string;
  remoteUrl: string;
  mode?: ExecutionMode;
  signal?: AbortSignal;
  onEvent?: EventHandler;
};

// =============================================================================
// PORTS
// =============================================================================

export function createDefaultPorts(paths: PathsContext): OrchestratorPorts {
  return {
    commandRunner: createExecaCommandRunner(),
    repo: {
      isGitRepo,
      getRemoteUrl,
    },
    logSink: {
      createRunLogger: (traceId) =>
        new JsonlLogger(runEventsPath(traceId, paths), { runId: traceId }),
    },
    clock: {
      now: () => new Date(),
    },
  };
}

// =============================================================================
// RUN WIRING
// =============================================================================

export function createDeploymentRun(input: CreateDeploymentRunInput): DeploymentRun {
  const { config, ports, traceId } = input;
  const mode = input.mode ?? config.mode;

  const rootContext = createRootContext({
    traceId,
    mode,
    metadata: { repo: config.repo_path },
  });
  const bus = new EventBus({ now: () => ports.clock.now() });
  const gateway = new ValidationGateway(config.gateway);

  const logger = ports.logSink.createRunLogger(traceId);
  attachJsonlSink(bus, logger);
  if (input.onEvent) {
    bus.subscribe(ALL_EVENTS, input.onEvent);
  }

  const actions = new GuardedActionExecutor({
    gateway,
    bus,
    commandRunner: ports.commandRunner,
    cwd: config.repo_path,
    timeoutMs: config.command_timeout_seconds * 1000,
  });

  const phases = createDeploymentPhases({
    actions,
    repo: ports.repo,
    settings: {
      repoPath: config.repo_path,
      remoteUrl: input.remoteUrl,
      remoteName: config.remote_name,
      mainBranch: config.main_branch,
      commitMessage: renderCommitMessage(config.commit_message, {
        traceId,
        mode,
        repo: config.repo_path,
      }),
    },
  });

  const orchestrator = new Orchestrator({
    bus,
    rootContext,
    phases,
    signal: input.signal,
    phaseTimeoutMs:
      config.phase_timeout_seconds === undefined ? undefined : config.phase_timeout_seconds * 1000,
  });

  return { traceId, rootContext, bus, gateway, orchestrator, logger };
}

// Every bus event lands in the run's JSONL file, attributed to its span.
export function attachJsonlSink(bus: EventBus, logger: JsonlLogger): void {
  bus.subscribe(ALL_EVENTS, (event) => {
    logger.log({
      type: event.type,
      ts: event.timestamp,
      spanId: event.spanId,
      payload: { ...event.payload },
    });
  });
}

export function resolveRemoteUrl(config: ProjectConfig, override?: string): string {
  const remoteUrl = override ?? config.remote_url;
  if (remoteUrl) return remoteUrl;

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Remote URL missing.",
    message: "No remote URL is configured for this deployment.",
    hint: "Pass --remote <url> or set remote_url in .deploy-scope/config.yaml.",
  });
}
