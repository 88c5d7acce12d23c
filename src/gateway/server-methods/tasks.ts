import type { GatewayRequestHandlers } from "./types.js";
import { formatErrorMessage } from "../../infra/errors.js";
import { resolveTaskStatusUrl, toWireTask } from "../../tasks/record.js";
import { TaskNotFoundError } from "../../tasks/types.js";
import {
  ChatAsyncParamsSchema,
  ErrorCodes,
  errorShape,
  TasksCleanParamsSchema,
  TasksGetParamsSchema,
  TasksListParamsSchema,
  validateParams,
} from "../protocol/index.js";

export const ANSWER_OPERATION_NAME = "answer_financial_question";

export const tasksHandlers: GatewayRequestHandlers = {
  "chat.async": ({ params, respond, context }) => {
    const parsed = validateParams(ChatAsyncParamsSchema, params);
    if (!parsed.ok) {
      respond(false, undefined, parsed.error);
      return;
    }
    const question = parsed.value.question.trim();
    if (!question) {
      respond(false, undefined, errorShape(ErrorCodes.INVALID_REQUEST, "question is required"));
      return;
    }
    const taskId = context.tasks.submit(
      () => context.answerQuestion(question),
      ANSWER_OPERATION_NAME,
    );
    respond(
      true,
      { task_id: taskId, status: "pending", status_url: resolveTaskStatusUrl(taskId) },
      undefined,
    );
  },

  "tasks.get": ({ params, respond, context }) => {
    const parsed = validateParams(TasksGetParamsSchema, params);
    if (!parsed.ok) {
      respond(false, undefined, parsed.error);
      return;
    }
    const taskId = parsed.value.taskId.trim();
    try {
      const task = context.tasks.getStatus(taskId);
      respond(true, { task: toWireTask(task) }, undefined);
    } catch (err) {
      if (err instanceof TaskNotFoundError) {
        respond(false, undefined, errorShape(ErrorCodes.NOT_FOUND, `task not found: ${taskId}`));
        return;
      }
      respond(false, undefined, errorShape(ErrorCodes.UNAVAILABLE, formatErrorMessage(err)));
    }
  },

  "tasks.list": ({ params, respond, context }) => {
    const parsed = validateParams(TasksListParamsSchema, params);
    if (!parsed.ok) {
      respond(false, undefined, parsed.error);
      return;
    }
    const { status, limit } = parsed.value;
    const tasks = context.tasks
      .list({ status })
      .toSorted((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt))
      .slice(0, limit ?? 100)
      .map(toWireTask);
    respond(true, { tasks }, undefined);
  },

  "tasks.stats": ({ respond, context }) => {
    respond(true, context.tasks.stats(), undefined);
  },

  "tasks.clean": ({ params, respond, context }) => {
    const parsed = validateParams(TasksCleanParamsSchema, params);
    if (!parsed.ok) {
      respond(false, undefined, parsed.error);
      return;
    }
    const removed = context.tasks.clean(parsed.value.maxAgeSeconds);
    respond(true, { removed }, undefined);
  },
};
