export type TaskStatus = "pending" | "running" | "completed" | "failed";

export const TASK_STATUSES = ["pending", "running", "completed", "failed"] as const satisfies readonly TaskStatus[];

export type TerminalTaskStatus = Extract<TaskStatus, "completed" | "failed">;

export type TaskError = {
  /** Failure category: the error's name or, for non-Error values, its runtime type. */
  errorType: string;
  errorMessage: string;
  /** Stack trace plus any chained causes. */
  traceback: string;
};

export type TaskRecord = {
  taskId: string;
  status: TaskStatus;
  /** Label for observability only; never used for dispatch. */
  operationName: string;
  result: unknown;
  error: TaskError | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  durationMs: number | null;
};

export const TASK_OUTCOME: unique symbol = Symbol("finsight.taskOutcome");

/**
 * Explicit success-or-failure result an operation may return instead of
 * throwing. Build with `ok()` / `fail()`; any other return value counts as a
 * plain success.
 */
export type TaskOutcome<T> =
  | { readonly [TASK_OUTCOME]: true; ok: true; value: T }
  | { readonly [TASK_OUTCOME]: true; ok: false; error: unknown };

export type TaskOperation<T = unknown> = () => Promise<TaskOutcome<T> | T> | TaskOutcome<T> | T;

export type TaskEvent = {
  ts: number;
  taskId: string;
  event: "created" | "started" | "completed" | "failed";
  data?: Record<string, unknown>;
};

export type TaskStats = {
  total: number;
  pending: number;
  running: number;
  completed: number;
  failed: number;
};

export type TaskListParams = {
  status?: TaskStatus | TaskStatus[];
};

export class TaskNotFoundError extends Error {
  readonly code = "TASK_NOT_FOUND";

  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found in queue`);
    this.name = "TaskNotFoundError";
  }
}

export class DuplicateTaskError extends Error {
  readonly code = "TASK_DUPLICATE";

  constructor(readonly taskId: string) {
    super(`Task ${taskId} already exists`);
    this.name = "DuplicateTaskError";
  }
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return value === "pending" || value === "running" || value === "completed" || value === "failed";
}

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return status === "completed" || status === "failed";
}

export function ok<T>(value: T): TaskOutcome<T> {
  return { [TASK_OUTCOME]: true, ok: true, value };
}

export function fail<T = never>(error: unknown): TaskOutcome<T> {
  return { [TASK_OUTCOME]: true, ok: false, error };
}

export function isTaskOutcome(value: unknown): value is TaskOutcome<unknown> {
  return typeof value === "object" && value !== null && TASK_OUTCOME in value;
}
