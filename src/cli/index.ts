import { Command, InvalidArgumentError } from "commander";

import { EXECUTION_MODES, isExecutionMode, type ExecutionMode } from "../core/context.js";

import { loadConfigForCli } from "./config.js";
import { deployCommand } from "./deploy.js";
import { eventsCommand } from "./events.js";
import { planCommand } from "./plan.js";
import { validateCommand } from "./validate.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

type DeployCliOptions = {
  remote?: string;
  repo?: string;
  mode?: ExecutionMode;
  runId?: string;
  quiet: boolean;
};

type PlanCliOptions = {
  mode?: ExecutionMode;
  runId?: string;
  delay: number;
  quiet: boolean;
};

type ValidateCliOptions = {
  intent?: string;
};

type EventsCliOptions = {
  runId?: string;
  type?: string;
  span?: string;
};

export function buildCli(): Command {
  const program = new Command();

  const resolveConfig = (repoOverride?: string) => {
    const globals = program.opts<GlobalOptions>();
    return loadConfigForCli({ explicitConfigPath: globals.config, repoOverride });
  };

  program
    .name("deploy-scope")
    .description("Scoped deployment orchestrator (structured tasks + validation gateway)")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override project config path (defaults to .deploy-scope/config.yaml in the working directory)",
    )
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("deploy")
    .description("Run the deployment phases against the configured remote")
    .option("--remote <url>", "Remote URL (overrides remote_url in config)")
    .option("--repo <path>", "Repository path (overrides repo_path in config)")
    .option("--mode <mode>", `Execution mode (${EXECUTION_MODES.join(", ")})`, parseMode)
    .option("--run-id <id>", "Trace id for this run (default: deploy-<timestamp>)")
    .option("--quiet", "Do not print one line per event", false)
    .action(async (opts: DeployCliOptions) => {
      const { appContext } = resolveConfig(opts.repo);
      await deployCommand(appContext, {
        remote: opts.remote,
        mode: opts.mode,
        runId: opts.runId,
        quiet: opts.quiet,
      });
    });

  program
    .command("plan")
    .description("Decompose a goal into subtasks and run them through the gateway")
    .argument("<goal>", "Goal to plan")
    .option("--mode <mode>", `Root execution mode (${EXECUTION_MODES.join(", ")})`, parseMode)
    .option("--run-id <id>", "Trace id for this run (default: plan-<timestamp>)")
    .option("--delay <ms>", "Simulated work per subtask in milliseconds", parseDelay, 0)
    .option("--quiet", "Do not print one line per event", false)
    .action(async (goal: string, opts: PlanCliOptions) => {
      const { appContext } = resolveConfig();
      await planCommand(appContext, goal, {
        mode: opts.mode,
        runId: opts.runId,
        delayMs: opts.delay,
        quiet: opts.quiet,
      });
    });

  program
    .command("validate")
    .description("Ask the validation gateway about one action without running it")
    .argument("<action>", "Action text, e.g. a shell command")
    .option("--intent <text>", "Stated intent for the action")
    .action((action: string, opts: ValidateCliOptions) => {
      const { config } = resolveConfig();
      validateCommand(config, action, { intent: opts.intent });
    });

  program
    .command("events")
    .description("Print the persisted JSONL events of a run")
    .option("--run-id <id>", "Run trace id (default: latest)")
    .option("--type <glob>", "Filter by event type (supports *)")
    .option("--span <id>", "Filter to a span and its descendants")
    .action(async (opts: EventsCliOptions) => {
      const { appContext } = resolveConfig();
      await eventsCommand(appContext, { runId: opts.runId, type: opts.type, span: opts.span });
    });

  return program;
}

function parseMode(value: string): ExecutionMode {
  if (!isExecutionMode(value)) {
    throw new InvalidArgumentError(`Expected one of ${EXECUTION_MODES.join(", ")}.`);
  }
  return value;
}

function parseDelay(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}
