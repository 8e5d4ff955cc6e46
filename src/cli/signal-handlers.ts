/*
Purpose: turn SIGINT/SIGTERM into an abort of the current run.
Assumptions: one handler per command invocation; cleanup() always runs in a finally block.
Usage: const stop = createRunStopSignalHandler({ onSignal }); pass stop.signal to the run.
*/

// =============================================================================
// TYPES
// =============================================================================

export type SignalTarget = {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
};

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

export type RunStopSignalHandlerOptions = {
  onSignal?: (signal: NodeJS.Signals) => void;
  signals?: NodeJS.Signals[];
  target?: SignalTarget;
};

const DEFAULT_STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// =============================================================================
// PUBLIC API
// =============================================================================

export function createRunStopSignalHandler(
  options: RunStopSignalHandlerOptions = {},
): RunStopSignalHandler {
  const controller = new AbortController();
  const target: SignalTarget = options.target ?? process;
  const signals = options.signals ?? DEFAULT_STOP_SIGNALS;

  const handler = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    options.onSignal?.(signal);
    // The string reason surfaces as "Cancelled (SIGINT)".
    controller.abort(signal);
  };

  for (const signal of signals) {
    target.on(signal, handler);
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const signal of signals) {
        target.off(signal, handler);
      }
    },
    isStopped: () => controller.signal.aborted,
  };
}
