export class OrchestratorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class TaskError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskError";
  }
}

export class GitError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

// =============================================================================
// ACTION + TASK FAILURES
// =============================================================================

export type ActionFailureDetails = {
  action: string;
  exitCode: number;
  stderr: string;
};

export class ActionFailedError extends TaskError {
  readonly action: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(details: ActionFailureDetails) {
    const stderr = details.stderr.trim();
    const suffix = stderr.length > 0 ? `: ${stderr}` : "";
    super(`Command "${details.action}" exited with ${details.exitCode}${suffix}`, details);
    this.name = "ActionFailedError";
    this.action = details.action;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

export type TaskFailureLocation = {
  taskName: string;
  traceId: string;
  spanId: string;
};

export class TaskFailureError extends TaskError {
  readonly taskName: string;
  readonly traceId: string;
  readonly spanId: string;

  constructor(location: TaskFailureLocation, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Task ${location.taskName} failed [span: ${location.spanId}]: ${detail}`, cause);
    this.name = "TaskFailureError";
    this.taskName = location.taskName;
    this.traceId = location.traceId;
    this.spanId = location.spanId;
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  task: "TASK_ERROR",
  git: "GIT_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
