export { loadConfig, resolveTasksConfig, type FinsightConfig } from "./config/config.js";
export { handleGatewayRequest, coreGatewayHandlers } from "./gateway/dispatch.js";
export { buildGatewayTasksState, type GatewayTasksState } from "./gateway/server-tasks.js";
export type { AnswerQuestionFn, GatewayRequestContext } from "./gateway/server-methods/types.js";
export { createTaskExecutor, type TaskExecutor } from "./tasks/executor.js";
export { toWireTask, type WireTask } from "./tasks/record.js";
export { TaskQueue, type TaskQueueOptions } from "./tasks/queue.js";
export { startTaskSweeper, type TaskSweeper } from "./tasks/sweeper.js";
export {
  DuplicateTaskError,
  fail,
  ok,
  TaskNotFoundError,
  type TaskEvent,
  type TaskOperation,
  type TaskOutcome,
  type TaskRecord,
  type TaskStats,
  type TaskStatus,
} from "./tasks/types.js";
