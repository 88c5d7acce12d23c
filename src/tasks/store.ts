import type { TaskRecord, TaskStatus } from "./types.js";
import { cloneTaskRecord } from "./record.js";
import { DuplicateTaskError } from "./types.js";

export type TaskPredicate = (record: Readonly<TaskRecord>) => boolean;

/**
 * In-memory map of task id to record.
 *
 * Every method runs to completion without yielding, so on the event loop each
 * call is atomic with respect to every other store call. Records never leave
 * the store by reference: reads return clones and writes go through `update`.
 */
export class TaskStore {
  private readonly records = new Map<string, TaskRecord>();

  insert(record: TaskRecord): void {
    if (this.records.has(record.taskId)) {
      throw new DuplicateTaskError(record.taskId);
    }
    this.records.set(record.taskId, cloneTaskRecord(record));
  }

  get(taskId: string): TaskRecord | null {
    const record = this.records.get(taskId);
    return record ? cloneTaskRecord(record) : null;
  }

  /**
   * Applies `mutator` to the stored record and returns what it returned.
   * Returns undefined without calling it when the task is gone (cleaned while
   * still executing).
   */
  update<R>(taskId: string, mutator: (record: TaskRecord) => R): R | undefined {
    const record = this.records.get(taskId);
    if (!record) {
      return undefined;
    }
    return mutator(record);
  }

  list(predicate?: TaskPredicate): TaskRecord[] {
    const out: TaskRecord[] = [];
    for (const record of this.records.values()) {
      if (!predicate || predicate(record)) {
        out.push(cloneTaskRecord(record));
      }
    }
    return out;
  }

  deleteWhere(predicate: TaskPredicate): number {
    let removed = 0;
    for (const [taskId, record] of this.records) {
      if (predicate(record)) {
        this.records.delete(taskId);
        removed++;
      }
    }
    return removed;
  }

  /** Status of every record, without copying results. */
  statuses(): TaskStatus[] {
    return Array.from(this.records.values(), (record) => record.status);
  }

  size(): number {
    return this.records.size;
  }
}
