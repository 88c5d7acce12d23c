import type { FinsightConfig } from "../config/config.js";
import type { TaskSweeper } from "../tasks/sweeper.js";
import type { TaskEvent } from "../tasks/types.js";
import type { AnswerQuestionFn, GatewayRequestContext } from "./server-methods/types.js";
import { resolveTasksConfig } from "../config/config.js";
import { logVerbose } from "../globals.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { TaskQueue } from "../tasks/queue.js";
import { startTaskSweeper } from "../tasks/sweeper.js";

export type GatewayTasksState = {
  context: GatewayRequestContext;
  sweeper: TaskSweeper | null;
  /** Stops the sweeper and waits for in-flight tasks to settle. */
  close: () => Promise<void>;
};

/**
 * Builds the one task queue a gateway process uses and the request context
 * that carries it to the handlers.
 */
export function buildGatewayTasksState(params: {
  cfg: FinsightConfig;
  answerQuestion: AnswerQuestionFn;
  env?: NodeJS.ProcessEnv;
  onEvent?: (event: TaskEvent) => void;
}): GatewayTasksState {
  const tasksLogger = createSubsystemLogger("tasks");
  const resolved = resolveTasksConfig(params.cfg, params.env);

  const tasks = new TaskQueue({
    maxConcurrent: resolved.maxConcurrent,
    onEvent: params.onEvent,
  });

  let sweeper: TaskSweeper | null = null;
  if (resolved.sweeper.enabled) {
    sweeper = startTaskSweeper(tasks, {
      intervalMs: resolved.sweeper.intervalMs,
      maxAgeSeconds: resolved.sweeper.maxAgeSeconds,
    });
    tasksLogger.info(
      `sweeper started (every ${resolved.sweeper.intervalMs / 60_000} min, max age ${resolved.sweeper.maxAgeSeconds}s)`,
    );
  } else {
    logVerbose("tasks: sweeper disabled");
  }

  return {
    context: { tasks, answerQuestion: params.answerQuestion },
    sweeper,
    close: async () => {
      sweeper?.stop();
      await tasks.idle();
    },
  };
}
