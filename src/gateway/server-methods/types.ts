import type { TaskQueue } from "../../tasks/queue.js";
import type { ErrorShape } from "../protocol/index.js";

/** Question answering pipeline (routing, retrieval, SQL, LLM) behind the async chat endpoint. */
export type AnswerQuestionFn = (question: string) => Promise<unknown>;

export type GatewayRequestContext = {
  tasks: TaskQueue;
  answerQuestion: AnswerQuestionFn;
};

export type RespondFn = (ok: boolean, payload?: unknown, error?: ErrorShape) => void;

export type GatewayRequestHandlerOptions = {
  params?: Record<string, unknown>;
  respond: RespondFn;
  context: GatewayRequestContext;
};

export type GatewayRequestHandler = (opts: GatewayRequestHandlerOptions) => void;

export type GatewayRequestHandlers = Record<string, GatewayRequestHandler>;
