import type { TaskStore } from "./store.js";
import type { TaskError, TaskEvent, TaskOperation, TaskRecord } from "./types.js";
import { logVerbose } from "../globals.js";
import { formatErrorMessage, formatErrorTrace, resolveErrorType } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { isTaskOutcome } from "./types.js";

const log = createSubsystemLogger("tasks/runner");

export type TaskRunnerDeps = {
  store: TaskStore;
  nowMs: () => number;
  emit: (event: TaskEvent) => void;
};

export function describeTaskError(err: unknown): TaskError {
  return {
    errorType: resolveErrorType(err),
    errorMessage: formatErrorMessage(err),
    traceback: formatErrorTrace(err),
  };
}

type Settled = { ok: true; value: unknown } | { ok: false; error: unknown };

async function invoke(operation: TaskOperation): Promise<Settled> {
  try {
    const returned = await operation();
    if (isTaskOutcome(returned)) {
      return returned.ok ? { ok: true, value: returned.value } : { ok: false, error: returned.error };
    }
    return { ok: true, value: returned };
  } catch (err) {
    return { ok: false, error: err };
  }
}

/**
 * Drives one task through running and into completed or failed. Each task id
 * is executed at most once; the runner never rethrows what the operation
 * raised.
 */
export class TaskRunner {
  private readonly deps: TaskRunnerDeps;

  constructor(deps: TaskRunnerDeps) {
    this.deps = deps;
  }

  async execute(taskId: string, operation: TaskOperation): Promise<void> {
    const startedMs = this.deps.nowMs();
    const claim = this.deps.store.update(taskId, (record) => {
      if (record.status !== "pending") {
        return "skipped" as const;
      }
      record.status = "running";
      record.startedAt = new Date(startedMs).toISOString();
      return "claimed" as const;
    });
    if (claim === undefined) {
      logVerbose(`tasks: task ${taskId} vanished before it started`);
      return;
    }
    if (claim === "skipped") {
      log.warn(`task ${taskId} was scheduled twice; ignoring the second run`);
      return;
    }
    this.emit({ ts: startedMs, taskId, event: "started" });
    logVerbose(`tasks: task ${taskId} started`);

    const settled = await invoke(operation);
    if (settled.ok) {
      this.complete(taskId, startedMs, settled.value);
    } else {
      this.fail(taskId, startedMs, settled.error);
    }
  }

  /** Marks a task that could not be started as running then failed at the same instant. */
  failToStart(taskId: string, err: unknown): void {
    const nowMs = this.deps.nowMs();
    const claimed = this.deps.store.update(taskId, (record) => {
      if (record.status !== "pending") {
        return false;
      }
      record.status = "running";
      record.startedAt = new Date(nowMs).toISOString();
      return true;
    });
    if (claimed) {
      this.fail(taskId, nowMs, err, nowMs);
    }
  }

  private complete(taskId: string, startedMs: number, value: unknown): void {
    let stored: unknown;
    try {
      stored = structuredClone(value);
    } catch (err) {
      this.fail(taskId, startedMs, err);
      return;
    }
    const completedMs = this.deps.nowMs();
    const applied = this.finish(taskId, completedMs, startedMs, (record) => {
      record.status = "completed";
      record.result = stored ?? null;
    });
    if (!applied) {
      return;
    }
    this.emit({
      ts: completedMs,
      taskId,
      event: "completed",
      data: { durationMs: completedMs - startedMs },
    });
    log.info(`task ${taskId} completed in ${completedMs - startedMs}ms`);
  }

  private fail(
    taskId: string,
    startedMs: number,
    err: unknown,
    completedMs: number = this.deps.nowMs(),
  ): void {
    const error = describeTaskError(err);
    const applied = this.finish(taskId, completedMs, startedMs, (record) => {
      record.status = "failed";
      record.error = error;
    });
    if (!applied) {
      return;
    }
    this.emit({
      ts: completedMs,
      taskId,
      event: "failed",
      data: { errorType: error.errorType, durationMs: completedMs - startedMs },
    });
    log.error(`task ${taskId} failed: ${error.errorType}: ${error.errorMessage}`);
  }

  private finish(
    taskId: string,
    completedMs: number,
    startedMs: number,
    apply: (record: TaskRecord) => void,
  ): boolean {
    const applied = this.deps.store.update(taskId, (record) => {
      if (record.status !== "running") {
        return false;
      }
      apply(record);
      record.completedAt = new Date(completedMs).toISOString();
      record.durationMs = Math.max(0, completedMs - startedMs);
      return true;
    });
    if (!applied) {
      logVerbose(`tasks: task ${taskId} was removed before it settled`);
      return false;
    }
    return true;
  }

  private emit(event: TaskEvent): void {
    try {
      this.deps.emit(event);
    } catch (err) {
      log.warn(`task event listener failed: ${formatErrorMessage(err)}`);
    }
  }
}
