/**
 * TaskScope is the structured-concurrency boundary for a group of tasks.
 * Purpose: guarantee no spawned task outlives the scope that spawned it.
 * Assumptions: cancellation is cooperative; tasks observe their AbortSignal at suspension points.
 * Usage: const outcome = await runTaskScope({ name, parentContext, bus }, async (scope) => {
 *          scope.spawn("git_add", ({ context, signal }) => run(context, signal));
 *        });
 */

import {
  CancellationError,
  cancellationReasonFromAbort,
  isCancellationError,
  resolveCancellation,
  type CancellationReason,
} from "./cancellation.js";
import { deriveChildContext, type ExecutionContext, type ExecutionMode } from "./context.js";
import { TaskError, TaskFailureError } from "./errors.js";
import type { EventBus } from "./event-bus.js";
import type { JsonObject } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScopeState = "open" | "draining" | "closed";

export type TaskState = "running" | "completed" | "cancelled" | "failed";

export type TaskRuntime = {
  context: ExecutionContext;
  signal: AbortSignal;
};

export type TaskWork<T> = (task: TaskRuntime) => Promise<T>;

export type TaskOutcome<T> =
  | { status: "completed"; value: T }
  | { status: "cancelled"; reason: CancellationReason }
  | { status: "failed"; error: TaskFailureError };

export interface TaskHandle<T> {
  readonly name: string;
  readonly context: ExecutionContext;
  readonly state: TaskState;
  // Resolves once the task is terminal; never rejects.
  readonly outcome: Promise<TaskOutcome<T>>;
}

export type ExitSignal =
  | { kind: "none" }
  | { kind: "cancellation"; reason: CancellationReason }
  | { kind: "failure"; error: unknown };

export type ScopeSignalCategory = "cancellation" | "failure";

export type ScopeOutcome =
  | { status: "completed" }
  | { status: "cancelled"; reason: CancellationReason };

export type SpawnOptions = {
  // Overrides the mode inherited from the scope's context.
  mode?: ExecutionMode;
};

export type TaskScopeOptions = {
  name: string;
  parentContext: ExecutionContext;
  bus: EventBus;
  signal?: AbortSignal;
  timeoutMs?: number;
};

type TaskSlot = {
  name: string;
  context: ExecutionContext;
  state: TaskState;
  controller: AbortController;
};

type TaskRecord<T> = TaskSlot & {
  outcome: Promise<TaskOutcome<T>>;
};

// =============================================================================
// TASK SCOPE
// =============================================================================

export class TaskScope {
  readonly name: string;
  readonly context: ExecutionContext;

  private readonly bus: EventBus;
  private readonly externalSignal?: AbortSignal;
  private readonly timeoutMs?: number;
  private readonly records: TaskRecord<unknown>[] = [];
  private scopeState: ScopeState = "open";
  private entered = false;
  private cancellation: CancellationReason | null = null;
  private failure: TaskFailureError | null = null;
  private timeoutHandle: NodeJS.Timeout | null = null;

  constructor(options: TaskScopeOptions) {
    this.name = options.name;
    this.context = deriveChildContext(options.parentContext, options.name);
    this.bus = options.bus;
    this.externalSignal = options.signal;
    this.timeoutMs = options.timeoutMs;
  }

  get state(): ScopeState {
    return this.scopeState;
  }

  get cancelled(): boolean {
    return this.cancellation !== null;
  }

  get runningCount(): number {
    return this.records.filter((record) => record.state === "running").length;
  }

  async enter(): Promise<void> {
    if (this.entered) {
      throw new TaskError(`Scope ${this.name} was already entered`);
    }
    this.entered = true;

    await this.bus.emit("scope.enter", { scope: this.name }, this.context);

    if (this.externalSignal) {
      if (this.externalSignal.aborted) {
        this.onExternalAbort();
      } else {
        this.externalSignal.addEventListener("abort", this.onExternalAbort, { once: true });
      }
    }

    if (this.timeoutMs !== undefined) {
      const timeoutMs = this.timeoutMs;
      this.timeoutHandle = setTimeout(() => {
        this.cancel({
          kind: "timeout",
          message: `Scope ${this.name} exceeded its ${timeoutMs}ms time budget`,
        });
      }, timeoutMs);
    }
  }

  spawn<T>(name: string, work: TaskWork<T>, options: SpawnOptions = {}): TaskHandle<T> {
    if (!this.entered || this.scopeState !== "open") {
      throw new TaskError(
        `Cannot spawn ${name}: scope ${this.name} is ${this.entered ? this.scopeState : "not entered"}`,
      );
    }

    const controller = new AbortController();
    const stopReason = this.cancellation ?? this.failFastReason();
    if (stopReason) {
      controller.abort(new CancellationError(stopReason));
    }

    const slot: TaskSlot = {
      name,
      context: deriveChildContext(this.context, name, { mode: options.mode }),
      state: "running",
      controller,
    };
    const record: TaskRecord<T> = Object.assign(slot, { outcome: this.runTask(slot, work) });
    this.records.push(record);

    return record;
  }

  // Requests cooperative cancellation of every running task. No-op once closed.
  cancel(reason: CancellationReason): void {
    if (this.scopeState === "closed") return;
    if (!this.cancellation) {
      this.cancellation = reason;
    }
    this.abortRunning(reason);
  }

  async emit(type: string, payload: JsonObject = {}): Promise<void> {
    await this.bus.emit(type, payload, this.context);
  }

  async exit(exitSignal: ExitSignal = { kind: "none" }): Promise<ScopeOutcome> {
    if (!this.entered || this.scopeState !== "open") {
      throw new TaskError(
        `Cannot exit scope ${this.name}: it is ${this.entered ? this.scopeState : "not entered"}`,
      );
    }
    this.scopeState = "draining";

    if (exitSignal.kind === "cancellation") {
      this.cancel(exitSignal.reason);
    } else if (exitSignal.kind === "failure") {
      this.abortRunning({ kind: "requested", message: `Scope ${this.name} body failed` });
    }

    await Promise.all(this.records.map((record) => record.outcome));
    this.detach();
    this.scopeState = "closed";

    const category = resolveSignalCategory(exitSignal, this.failure, this.cancellation);
    const payload: JsonObject = {
      scope: this.name,
      cancelled: this.cancellation !== null,
      signal: category,
    };
    if (this.cancellation) {
      payload.reason = this.cancellation.message;
    }
    await this.bus.emit("scope.exit", payload, this.context);

    if (exitSignal.kind === "failure") throw exitSignal.error;
    if (this.failure) throw this.failure;
    if (this.cancellation) return { status: "cancelled", reason: this.cancellation };
    return { status: "completed" };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async runTask<T>(record: TaskSlot, work: TaskWork<T>): Promise<TaskOutcome<T>> {
    const { context, controller } = record;
    const signal = controller.signal;

    let outcome: TaskOutcome<T>;
    try {
      // Yield once so the record is registered before the body starts.
      await Promise.resolve();
      throwIfAborted(signal);
      await this.bus.emit("task.start", { task: record.name }, context);
      // The emit is a suspension point; the scope may have been cancelled meanwhile.
      throwIfAborted(signal);
      const value = await work({ context, signal });
      outcome = { status: "completed", value };
    } catch (error) {
      const stoppedOnRequest = signal.aborted;
      const cancellation = resolveCancellation(error, signal);
      if (cancellation) {
        outcome = { status: "cancelled", reason: cancellation };
        if (!stoppedOnRequest) {
          this.cancel(cancellation);
        }
      } else {
        outcome = { status: "failed", error: this.wrapFailure(record, error) };
        this.recordFailure(outcome.error);
      }
    }

    try {
      await this.bus.emit(outcomeEventType(outcome), outcomePayload(record.name, outcome), context);
    } catch (error) {
      outcome = { status: "failed", error: this.wrapFailure(record, error) };
      this.recordFailure(outcome.error);
    }

    record.state = outcome.status;
    return outcome;
  }

  private wrapFailure(record: TaskSlot, error: unknown): TaskFailureError {
    return new TaskFailureError(
      {
        taskName: record.name,
        traceId: record.context.traceId,
        spanId: record.context.spanId,
      },
      error,
    );
  }

  // Fail fast: the first failure asks every sibling still running to stop.
  private recordFailure(error: TaskFailureError): void {
    if (!this.failure) {
      this.failure = error;
    }
    const reason = this.failFastReason();
    if (reason) {
      this.abortRunning(reason);
    }
  }

  private failFastReason(): CancellationReason | null {
    if (!this.failure) return null;
    return {
      kind: "requested",
      message: `Sibling task ${this.failure.taskName} failed`,
    };
  }

  private abortRunning(reason: CancellationReason): void {
    for (const record of this.records) {
      if (record.state === "running" && !record.controller.signal.aborted) {
        record.controller.abort(new CancellationError(reason));
      }
    }
  }

  private readonly onExternalAbort = (): void => {
    if (!this.externalSignal) return;
    this.cancel(cancellationReasonFromAbort(this.externalSignal));
  };

  private detach(): void {
    this.externalSignal?.removeEventListener("abort", this.onExternalAbort);
    if (this.timeoutHandle) {
      clearTimeout(this.timeoutHandle);
      this.timeoutHandle = null;
    }
  }
}

// =============================================================================
// SCOPED EXECUTION
// =============================================================================

export async function runTaskScope(
  options: TaskScopeOptions,
  body: (scope: TaskScope) => Promise<void>,
): Promise<ScopeOutcome> {
  const scope = new TaskScope(options);
  await scope.enter();

  let exitSignal: ExitSignal = { kind: "none" };
  try {
    await body(scope);
  } catch (error) {
    // exit() re-raises failures once every child is terminal.
    exitSignal = isCancellationError(error)
      ? { kind: "cancellation", reason: error.reason }
      : { kind: "failure", error };
  }

  return scope.exit(exitSignal);
}

// =============================================================================
// HELPERS
// =============================================================================

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CancellationError(cancellationReasonFromAbort(signal));
  }
}

function resolveSignalCategory(
  exitSignal: ExitSignal,
  failure: TaskFailureError | null,
  cancellation: CancellationReason | null,
): ScopeSignalCategory | null {
  if (exitSignal.kind === "failure" || failure) return "failure";
  if (exitSignal.kind === "cancellation" || cancellation) return "cancellation";
  return null;
}

function outcomeEventType(outcome: TaskOutcome<unknown>): string {
  switch (outcome.status) {
    case "completed":
      return "task.complete";
    case "cancelled":
      return "task.cancelled";
    case "failed":
      return "task.error";
  }
}

function outcomePayload(taskName: string, outcome: TaskOutcome<unknown>): JsonObject {
  switch (outcome.status) {
    case "completed":
      return { task: taskName };
    case "cancelled":
      return { task: taskName, kind: outcome.reason.kind, reason: outcome.reason.message };
    case "failed":
      return { task: taskName, error: formatCause(outcome.error) };
  }
}

function formatCause(error: TaskFailureError): string {
  const cause = error.cause;
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? error.message : String(cause);
}
