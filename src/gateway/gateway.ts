/**
 * ValidationGateway decides whether an externally-visible action may run.
 * Purpose: a single pre-execution checkpoint shared by the orchestrator and the planner.
 * Assumptions: only the self-preservation denylist vetoes; every other check is advisory.
 * Usage: const decision = gateway.validate("git push", "Deploy step: git push", context).
 */

import { CancellationError } from "../core/cancellation.js";
import type { ExecutionContext } from "../core/context.js";
import { TaskError } from "../core/errors.js";

import { DEFAULT_GATEWAY_POLICY, findMatchingPattern } from "./policy.js";
import type { AdvisoryWarning, Decision, GatewayPolicy } from "./types.js";

// =============================================================================
// GATEWAY
// =============================================================================

export class ValidationGateway {
  private readonly policy: GatewayPolicy;

  constructor(policy: GatewayPolicy = DEFAULT_GATEWAY_POLICY) {
    this.policy = {
      self_preservation: [...policy.self_preservation],
      advisory: [...policy.advisory],
      complexity_limit: policy.complexity_limit,
      complexity_exempt: [...policy.complexity_exempt],
    };
  }

  // The context identifies the caller for the caller's own logging; decisions never depend on it.
  validate(action: string, intent: string, _context: ExecutionContext): Decision {
    const denied = findMatchingPattern(action, this.policy.self_preservation);
    if (denied) {
      return {
        kind: "rejected",
        category: "self_preservation",
        reason: `Self-preservation veto: "${action}" matches protected pattern "${denied.pattern}"`,
        pattern: denied.pattern,
      };
    }

    return { kind: "allowed", warnings: this.collectWarnings(action, intent) };
  }

  private collectWarnings(action: string, intent: string): AdvisoryWarning[] {
    const warnings: AdvisoryWarning[] = [];

    for (const [label, text] of [
      ["action", action],
      ["intent", intent],
    ] as const) {
      const advisory = findMatchingPattern(text, this.policy.advisory);
      if (advisory) {
        warnings.push({
          kind: "manipulation",
          message: `Elevated torsion in ${label}: matches "${advisory.pattern}"`,
          pattern: advisory.pattern,
        });
      }
    }

    const exempt = this.policy.complexity_exempt.some((marker) => action.includes(marker));
    if (action.length > this.policy.complexity_limit && !exempt) {
      warnings.push({
        kind: "complexity",
        message: `Complex action (${action.length} chars > ${this.policy.complexity_limit})`,
      });
    }

    return warnings;
  }
}

// =============================================================================
// DECISION ENFORCEMENT
// =============================================================================

// Vetoes become a cancellation signal; any other rejection is an ordinary task error.
export function enforceDecision(decision: Decision): void {
  if (decision.kind === "allowed") return;

  switch (decision.category) {
    case "self_preservation":
      throw new CancellationError({ kind: "self_preservation", message: decision.reason });
    case "policy_other":
      throw new TaskError(`Action rejected by policy: ${decision.reason}`, decision);
  }
}
