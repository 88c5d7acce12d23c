import type { TaskQueue } from "./queue.js";
import { logVerbose } from "../globals.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { DEFAULT_CLEAN_MAX_AGE_SECONDS } from "./queue.js";

const log = createSubsystemLogger("tasks/sweeper");

export const DEFAULT_SWEEP_INTERVAL_MS = 600_000; // 10m

export type TaskSweeperOptions = {
  intervalMs?: number;
  maxAgeSeconds?: number;
};

export type TaskSweeper = {
  /** Runs one cleanup pass immediately. */
  sweepNow: () => number;
  stop: () => void;
};

/**
 * Periodically removes settled tasks older than `maxAgeSeconds`, so a
 * long-running gateway does not accumulate finished tasks without bound.
 */
export function startTaskSweeper(queue: TaskQueue, opts: TaskSweeperOptions = {}): TaskSweeper {
  const intervalMs = opts.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
  const maxAgeSeconds = opts.maxAgeSeconds ?? DEFAULT_CLEAN_MAX_AGE_SECONDS;

  const sweepNow = () => {
    const removed = queue.clean(maxAgeSeconds);
    logVerbose(`tasks: sweep removed ${removed} task(s) older than ${maxAgeSeconds}s`);
    return removed;
  };

  let timer: ReturnType<typeof setInterval> | null = setInterval(() => {
    try {
      sweepNow();
    } catch (err) {
      log.error(`sweep failed: ${formatErrorMessage(err)}`);
    }
  }, intervalMs);
  timer.unref?.();

  return {
    sweepNow,
    stop: () => {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },
  };
}
