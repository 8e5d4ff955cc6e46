/**
 * Orchestrator runs a fixed list of phases, one TaskScope per phase, and classifies the run.
 * Purpose: own the root context and sequence phases until one is cancelled or fails.
 * Assumptions: phases never retry; a cancelled phase ends the run cleanly.
 * Usage: const summary = await new Orchestrator({ bus, rootContext, phases }).run().
 */

import { cancellationReasonFromAbort, type CancellationReason } from "../../core/cancellation.js";
import type { ExecutionContext } from "../../core/context.js";
import { formatErrorMessage } from "../../core/error-format.js";
import type { EventBus } from "../../core/event-bus.js";
import type { JsonObject } from "../../core/logger.js";
import { runTaskScope } from "../../core/task-scope.js";

import type { PhaseDefinition } from "./phases/deployment-phases.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunStatus =
  | { status: "completed" }
  | { status: "cancelled"; reason: CancellationReason }
  | { status: "failed"; reason: string; error: unknown };

export type PhaseStatus = "completed" | "cancelled" | "failed";

export type PhaseSummary = {
  name: string;
  status: PhaseStatus;
};

export type RunSummary = {
  traceId: string;
  outcome: RunStatus;
  totalEvents: number;
  phases: PhaseSummary[];
};

export type OrchestratorOptions = {
  bus: EventBus;
  rootContext: ExecutionContext;
  phases: PhaseDefinition[];
  signal?: AbortSignal;
  phaseTimeoutMs?: number;
};

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class Orchestrator {
  constructor(private readonly options: OrchestratorOptions) {}

  async run(): Promise<RunSummary> {
    const { bus, rootContext, signal } = this.options;

    await bus.emit(
      "run.start",
      { mode: rootContext.mode, phases: this.options.phases.map((phase) => phase.name) },
      rootContext,
    );

    const phases: PhaseSummary[] = [];
    let outcome: RunStatus = { status: "completed" };

    for (const phase of this.options.phases) {
      if (signal?.aborted) {
        outcome = { status: "cancelled", reason: cancellationReasonFromAbort(signal) };
        break;
      }

      outcome = await this.runPhase(phase);
      phases.push({ name: phase.name, status: outcome.status });
      if (outcome.status !== "completed") break;
    }

    await bus.emit(runEndEventType(outcome), runEndPayload(outcome), rootContext);

    return {
      traceId: rootContext.traceId,
      outcome,
      totalEvents: bus.eventCount,
      phases,
    };
  }

  private async runPhase(phase: PhaseDefinition): Promise<RunStatus> {
    const { bus, rootContext, signal, phaseTimeoutMs } = this.options;

    try {
      const scopeOutcome = await runTaskScope(
        { name: phase.name, parentContext: rootContext, bus, signal, timeoutMs: phaseTimeoutMs },
        (scope) => phase.run(scope),
      );
      return scopeOutcome;
    } catch (error) {
      return { status: "failed", reason: formatErrorMessage(error), error };
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function runEndEventType(outcome: RunStatus): string {
  switch (outcome.status) {
    case "completed":
      return "run.complete";
    case "cancelled":
      return "run.cancelled";
    case "failed":
      return "run.failed";
  }
}

function runEndPayload(outcome: RunStatus): JsonObject {
  switch (outcome.status) {
    case "completed":
      return {};
    case "cancelled":
      return { kind: outcome.reason.kind, reason: outcome.reason.message };
    case "failed":
      return { reason: outcome.reason };
  }
}
