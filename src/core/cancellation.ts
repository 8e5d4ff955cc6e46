/*
Purpose: the cooperative stop signal shared by task bodies, scopes and the orchestrator.
Assumptions: cancellation is normal termination; it is never reported as a failure.
Usage: throw new CancellationError({ kind: "timeout", message }) from a task body.
*/

// =============================================================================
// TYPES
// =============================================================================

export type CancellationKind = "self_preservation" | "timeout" | "external" | "requested";

export type CancellationReason = {
  kind: CancellationKind;
  message: string;
};

// =============================================================================
// SIGNAL
// =============================================================================

export class CancellationError extends Error {
  readonly reason: CancellationReason;

  constructor(reason: CancellationReason) {
    super(reason.message);
    this.name = "CancellationError";
    this.reason = reason;
  }
}

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

export function cancellationReasonFromAbort(signal: AbortSignal): CancellationReason {
  const reason: unknown = signal.reason;
  if (reason instanceof CancellationError) return reason.reason;
  if (typeof reason === "string" && reason.length > 0) {
    return { kind: "external", message: `Cancelled (${reason})` };
  }
  if (reason instanceof Error && reason.name === "TimeoutError") {
    return { kind: "timeout", message: reason.message };
  }
  return { kind: "external", message: "Cancelled" };
}

// A body that throws after its signal was aborted is treated as having stopped on request.
export function resolveCancellation(
  error: unknown,
  signal: AbortSignal,
): CancellationReason | null {
  if (error instanceof CancellationError) return error.reason;
  if (!signal.aborted) return null;
  if (error === signal.reason) return cancellationReasonFromAbort(signal);
  if (error instanceof Error && error.name === "AbortError") {
    return cancellationReasonFromAbort(signal);
  }
  return null;
}
