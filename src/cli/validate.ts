import type { ProjectConfig } from "../core/config.js";
import { createRootContext } from "../core/context.js";
import { defaultRunId } from "../core/utils.js";
import { ValidationGateway } from "../gateway/gateway.js";
import type { Decision } from "../gateway/types.js";

export type ValidateCommandOptions = {
  intent?: string;
};

// Dry-run of the gateway for one action; a rejection sets exit code 1.
export function validateCommand(
  config: ProjectConfig,
  action: string,
  opts: ValidateCommandOptions = {},
  write: (line: string) => void = console.log,
): Decision {
  const gateway = new ValidationGateway(config.gateway);
  const context = createRootContext({ traceId: `validate-${defaultRunId()}`, mode: config.mode });
  const decision = gateway.validate(action, opts.intent ?? `Validate: ${action}`, context);

  for (const line of formatDecisionLines(action, decision)) {
    write(line);
  }
  if (decision.kind === "rejected") {
    process.exitCode = 1;
  }

  return decision;
}

export function formatDecisionLines(action: string, decision: Decision): string[] {
  if (decision.kind === "rejected") {
    return [`Rejected (${decision.category}): ${decision.reason}`];
  }

  return [
    `Allowed: ${action}`,
    ...decision.warnings.map((warning) => `Warning (${warning.kind}): ${warning.message}`),
  ];
}
