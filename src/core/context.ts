/**
 * ExecutionContext identifies a point in a run's causal tree.
 * Purpose: carry trace + span lineage explicitly through every task boundary.
 * Assumptions: sibling operation names are unique within a scope; that is the caller's job.
 * Usage: const child = deriveChildContext(parent, "git_init").
 */

import type { JsonObject, JsonValue } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export const EXECUTION_MODES = ["firefighter", "surgeon", "architect", "student", "manager"] as const;

export type ExecutionMode = (typeof EXECUTION_MODES)[number];

export type ContextMetadata = Readonly<Record<string, JsonValue>>;

export type ExecutionContext = Readonly<{
  traceId: string;
  spanId: string;
  mode: ExecutionMode;
  metadata: ContextMetadata;
}>;

export type RootContextInput = {
  traceId: string;
  mode: ExecutionMode;
  spanId?: string;
  metadata?: JsonObject;
};

export const ROOT_SPAN_ID = "root";

export const PARENT_SPAN_KEY = "parent_span";

// =============================================================================
// PUBLIC API
// =============================================================================

export function createRootContext(input: RootContextInput): ExecutionContext {
  return freezeContext({
    traceId: input.traceId,
    spanId: input.spanId ?? ROOT_SPAN_ID,
    mode: input.mode,
    metadata: { ...(input.metadata ?? {}) },
  });
}

export function deriveChildContext(
  parent: ExecutionContext,
  operationName: string,
  overrides: { mode?: ExecutionMode } = {},
): ExecutionContext {
  return freezeContext({
    traceId: parent.traceId,
    spanId: `${parent.spanId}.${operationName}`,
    mode: overrides.mode ?? parent.mode,
    metadata: { ...parent.metadata, [PARENT_SPAN_KEY]: parent.spanId },
  });
}

export function isDescendantSpan(spanId: string, ancestorSpanId: string): boolean {
  return spanId.startsWith(`${ancestorSpanId}.`);
}

export function isExecutionMode(value: string): value is ExecutionMode {
  return EXECUTION_MODES.some((mode) => mode === value);
}

// =============================================================================
// INTERNALS
// =============================================================================

function freezeContext(context: {
  traceId: string;
  spanId: string;
  mode: ExecutionMode;
  metadata: Record<string, JsonValue>;
}): ExecutionContext {
  return Object.freeze({ ...context, metadata: Object.freeze(context.metadata) });
}
