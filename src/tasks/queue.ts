import crypto from "node:crypto";
import type { TaskExecutor } from "./executor.js";
import type {
  TaskEvent,
  TaskListParams,
  TaskOperation,
  TaskRecord,
  TaskStats,
  TaskStatus,
} from "./types.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { createTaskExecutor } from "./executor.js";
import { createTaskRecord } from "./record.js";
import { TaskRunner } from "./runner.js";
import { TaskStore } from "./store.js";
import { isTerminalStatus, TaskNotFoundError } from "./types.js";

const log = createSubsystemLogger("tasks/queue");

export const DEFAULT_CLEAN_MAX_AGE_SECONDS = 3600;

export type TaskQueueOptions = {
  /** Cap on concurrently executing tasks. Unset or 0 means unbounded. */
  maxConcurrent?: number;
  /** Replaces the default executor; `maxConcurrent` is ignored when set. */
  executor?: TaskExecutor;
  /** Lifecycle listener. Errors it throws are logged and dropped. */
  onEvent?: (event: TaskEvent) => void;
  /** Injectable clock for testing. Defaults to Date.now. */
  nowMs?: () => number;
  /** Injectable id source for testing. Defaults to crypto.randomUUID. */
  generateId?: () => string;
};

function resolveOperationName(operation: TaskOperation, label?: string): string {
  const trimmed = label?.trim();
  if (trimmed) {
    return trimmed;
  }
  return operation.name || "anonymous";
}

/**
 * Background task queue for long-running question answering.
 *
 * `submit` records the task and hands it to the executor without waiting;
 * callers poll `getStatus` until the task is completed or failed.
 *
 * @example
 * const queue = new TaskQueue({ maxConcurrent: 4 });
 * const taskId = queue.submit(() => answerQuestion(question), "answer_financial_question");
 * const task = queue.getStatus(taskId);
 */
export class TaskQueue {
  private readonly store = new TaskStore();
  private readonly runner: TaskRunner;
  private readonly executor: TaskExecutor;
  private readonly nowMs: () => number;
  private readonly generateId: () => string;
  private readonly onEvent?: (event: TaskEvent) => void;

  constructor(opts: TaskQueueOptions = {}) {
    this.nowMs = opts.nowMs ?? Date.now;
    this.generateId = opts.generateId ?? (() => crypto.randomUUID());
    this.onEvent = opts.onEvent;
    this.executor =
      opts.executor ??
      createTaskExecutor({
        maxConcurrent: opts.maxConcurrent,
        onJobError: (err) => log.error(`executor job rejected: ${formatErrorMessage(err)}`),
      });
    this.runner = new TaskRunner({
      store: this.store,
      nowMs: this.nowMs,
      emit: (event) => this.onEvent?.(event),
    });
  }

  submit<T>(operation: TaskOperation<T>, label?: string): string {
    const taskId = this.generateId();
    const nowMs = this.nowMs();
    const operationName = resolveOperationName(operation, label);
    this.store.insert(createTaskRecord({ taskId, operationName, nowMs }));
    this.emitCreated({ ts: nowMs, taskId, event: "created", data: { operationName } });

    try {
      this.executor.schedule(() => this.runner.execute(taskId, operation));
    } catch (err) {
      this.runner.failToStart(taskId, err);
      return taskId;
    }

    log.info(`task ${taskId} added to queue: ${operationName}`);
    return taskId;
  }

  getStatus(taskId: string): TaskRecord {
    const record = this.store.get(taskId);
    if (!record) {
      throw new TaskNotFoundError(taskId);
    }
    return record;
  }

  list(params: TaskListParams = {}): TaskRecord[] {
    const { status } = params;
    if (status === undefined) {
      return this.store.list();
    }
    const wanted = new Set<TaskStatus>(Array.isArray(status) ? status : [status]);
    return this.store.list((record) => wanted.has(record.status));
  }

  /**
   * Removes completed and failed tasks that finished more than
   * `maxAgeSeconds` ago. Pending and running tasks are never removed.
   */
  clean(maxAgeSeconds: number = DEFAULT_CLEAN_MAX_AGE_SECONDS): number {
    const nowMs = this.nowMs();
    const maxAgeMs = Math.max(0, maxAgeSeconds) * 1000;
    const removed = this.store.deleteWhere((record) => {
      if (!isTerminalStatus(record.status) || !record.completedAt) {
        return false;
      }
      return nowMs - Date.parse(record.completedAt) > maxAgeMs;
    });
    if (removed > 0) {
      log.info(`cleared ${removed} old task${removed === 1 ? "" : "s"} from queue`);
    }
    return removed;
  }

  stats(): TaskStats {
    const stats: TaskStats = { total: 0, pending: 0, running: 0, completed: 0, failed: 0 };
    for (const status of this.store.statuses()) {
      stats.total++;
      stats[status]++;
    }
    return stats;
  }

  /** Resolves once every submitted task has settled. */
  idle(): Promise<void> {
    return this.executor.idle();
  }

  private emitCreated(event: TaskEvent): void {
    try {
      this.onEvent?.(event);
    } catch (err) {
      log.warn(`task event listener failed: ${formatErrorMessage(err)}`);
    }
  }
}
