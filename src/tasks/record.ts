import type { TaskError, TaskRecord, TaskStatus } from "./types.js";

export type WireTaskError = {
  error_type: string;
  error_message: string;
  traceback: string;
};

export type WireTask = {
  task_id: string;
  status: TaskStatus;
  operation_name: string;
  result: unknown;
  error: WireTaskError | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  duration_ms: number | null;
};

export const TASK_STATUS_PATH_PREFIX = "/api/v1/tasks/";

export function createTaskRecord(params: {
  taskId: string;
  operationName: string;
  nowMs: number;
}): TaskRecord {
  return {
    taskId: params.taskId,
    status: "pending",
    operationName: params.operationName,
    result: null,
    error: null,
    createdAt: new Date(params.nowMs).toISOString(),
    startedAt: null,
    completedAt: null,
    durationMs: null,
  };
}

export function cloneTaskRecord(record: TaskRecord): TaskRecord {
  return structuredClone(record);
}

function toWireError(error: TaskError | null): WireTaskError | null {
  if (!error) {
    return null;
  }
  return {
    error_type: error.errorType,
    error_message: error.errorMessage,
    traceback: error.traceback,
  };
}

/** JSON shape served to HTTP and gateway clients. */
export function toWireTask(record: TaskRecord): WireTask {
  return {
    task_id: record.taskId,
    status: record.status,
    operation_name: record.operationName,
    result: record.result ?? null,
    error: toWireError(record.error),
    created_at: record.createdAt,
    started_at: record.startedAt,
    completed_at: record.completedAt,
    duration_ms: record.durationMs,
  };
}

export function resolveTaskStatusUrl(taskId: string): string {
  return `${TASK_STATUS_PATH_PREFIX}${taskId}`;
}
