export type ExecutorJob = () => Promise<void>;

export type TaskExecutor = {
  /** Queues `job` to run out of band; never runs it inside the caller's turn. */
  schedule: (job: ExecutorJob) => void;
  /** Jobs currently in flight. */
  active: () => number;
  /** Jobs waiting for a free slot. */
  pending: () => number;
  /** Resolves once nothing is queued or in flight. */
  idle: () => Promise<void>;
};

export type TaskExecutorOptions = {
  /** Upper bound on in-flight jobs. Unset or 0 means unbounded. */
  maxConcurrent?: number;
  /** Called when a job rejects. Jobs passed in by the runner never do. */
  onJobError?: (err: unknown) => void;
};

export function resolveMaxConcurrent(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return Math.max(1, Math.floor(value));
}

export function createTaskExecutor(opts: TaskExecutorOptions = {}): TaskExecutor {
  const maxConcurrent = resolveMaxConcurrent(opts.maxConcurrent);
  const queue: ExecutorJob[] = [];
  let active = 0;
  let idleWaiters: Array<() => void> = [];

  const notifyIdle = () => {
    if (active > 0 || queue.length > 0) {
      return;
    }
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  };

  const run = (job: ExecutorJob) => {
    active++;
    void Promise.resolve()
      .then(job)
      .catch((err: unknown) => {
        opts.onJobError?.(err);
      })
      .finally(() => {
        active--;
        pump();
        notifyIdle();
      });
  };

  const pump = () => {
    while (active < maxConcurrent && queue.length > 0) {
      const next = queue.shift();
      if (!next) {
        return;
      }
      run(next);
    }
  };

  return {
    schedule: (job) => {
      queue.push(job);
      queueMicrotask(pump);
    },
    active: () => active,
    pending: () => queue.length,
    idle: () => {
      if (active === 0 && queue.length === 0) {
        return Promise.resolve();
      }
      return new Promise<void>((resolve) => {
        idleWaiters.push(resolve);
      });
    },
  };
}
