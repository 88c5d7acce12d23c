import { describe, expect, it, vi } from "vitest";

vi.mock("../../logging/subsystem.js", () => ({
  createSubsystemLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import type { GatewayRequestContext } from "./types.js";
import { TaskQueue } from "../../tasks/queue.js";
import { handleGatewayRequest } from "../dispatch.js";
import { ANSWER_OPERATION_NAME } from "./tasks.js";

function makeContext(overrides: Partial<GatewayRequestContext> = {}): GatewayRequestContext {
  return {
    tasks: new TaskQueue(),
    answerQuestion: vi.fn(async (question: string) => ({
      answer: `Answer to: ${question}`,
      query_type: "SQL",
    })),
    ...overrides,
  };
}

describe("tasks gateway handlers", () => {
  it("submits a question and returns the status url", async () => {
    const context = makeContext();
    const res = handleGatewayRequest(
      { id: "1", method: "chat.async", params: { question: "  What was AAPL revenue in 2023?  " } },
      context,
    );

    const [task] = context.tasks.list();
    expect(res).toEqual({
      id: "1",
      ok: true,
      payload: {
        task_id: task.taskId,
        status: "pending",
        status_url: `/api/v1/tasks/${task.taskId}`,
      },
      error: undefined,
    });
    expect(task.operationName).toBe(ANSWER_OPERATION_NAME);

    await context.tasks.idle();
    expect(context.answerQuestion).toHaveBeenCalledWith("What was AAPL revenue in 2023?");
  });

  it("rejects a blank question", () => {
    const context = makeContext();
    const res = handleGatewayRequest({ method: "chat.async", params: { question: "   " } }, context);

    expect(res.ok).toBe(false);
    expect(res.error).toEqual({ code: "INVALID_REQUEST", message: "question is required" });
    expect(context.tasks.stats().total).toBe(0);
  });

  it("rejects a missing question", () => {
    const res = handleGatewayRequest({ method: "chat.async", params: {} }, makeContext());

    expect(res.ok).toBe(false);
    expect(res.error?.code).toBe("INVALID_REQUEST");
    expect(res.error?.message).toMatch(/^invalid params: question: /);
  });

  it("returns the wire form of a completed task", async () => {
    const context = makeContext();
    handleGatewayRequest({ method: "chat.async", params: { question: "Top margins?" } }, context);
    await context.tasks.idle();
    const [task] = context.tasks.list();

    const res = handleGatewayRequest(
      { method: "tasks.get", params: { taskId: task.taskId } },
      context,
    );
    expect(res.ok).toBe(true);
    expect(res.payload).toEqual({
      task: {
        task_id: task.taskId,
        status: "completed",
        operation_name: ANSWER_OPERATION_NAME,
        result: { answer: "Answer to: Top margins?", query_type: "SQL" },
        error: null,
        created_at: task.createdAt,
        started_at: task.startedAt,
        completed_at: task.completedAt,
        duration_ms: task.durationMs,
      },
    });
  });

  it("returns the structured error of a failed task", async () => {
    const context = makeContext({
      answerQuestion: async () => {
        throw new Error("LLM backend unavailable");
      },
    });
    handleGatewayRequest({ method: "chat.async", params: { question: "Forecast?" } }, context);
    await context.tasks.idle();
    const [task] = context.tasks.list();

    const res = handleGatewayRequest(
      { method: "tasks.get", params: { taskId: task.taskId } },
      context,
    );
    expect(res.payload).toMatchObject({
      task: {
        status: "failed",
        result: null,
        error: { error_type: "Error", error_message: "LLM backend unavailable" },
      },
    });
  });

  it("reports unknown tasks as not found", () => {
    const res = handleGatewayRequest(
      { method: "tasks.get", params: { taskId: "nonexistent-uuid" } },
      makeContext(),
    );
    expect(res).toEqual({
      id: undefined,
      ok: false,
      payload: undefined,
      error: { code: "NOT_FOUND", message: "task not found: nonexistent-uuid" },
    });
  });

  it("lists tasks newest first with a status filter and limit", async () => {
    let now = Date.UTC(2026, 5, 1);
    const context = makeContext({ tasks: new TaskQueue({ nowMs: () => now++ }) });
    context.tasks.submit(() => "a", "first");
    context.tasks.submit(() => "b", "second");
    context.tasks.submit(() => {
      throw new Error("c");
    }, "third");
    await context.tasks.idle();

    const all = handleGatewayRequest({ method: "tasks.list", params: { limit: 2 } }, context);
    expect(all.payload).toMatchObject({
      tasks: [{ operation_name: "third" }, { operation_name: "second" }],
    });

    const completed = handleGatewayRequest(
      { method: "tasks.list", params: { status: "completed" } },
      context,
    );
    expect(completed.payload).toMatchObject({
      tasks: [{ operation_name: "second" }, { operation_name: "first" }],
    });

    const bad = handleGatewayRequest(
      { method: "tasks.list", params: { status: "archived" } },
      context,
    );
    expect(bad.error?.code).toBe("INVALID_REQUEST");
  });

  it("returns stats and cleans old tasks", async () => {
    let now = Date.UTC(2026, 5, 1);
    const context = makeContext({ tasks: new TaskQueue({ nowMs: () => now }) });
    context.tasks.submit(() => "done");
    await context.tasks.idle();

    expect(handleGatewayRequest({ method: "tasks.stats" }, context).payload).toEqual({
      total: 1,
      pending: 0,
      running: 0,
      completed: 1,
      failed: 0,
    });

    now += 30_000;
    expect(
      handleGatewayRequest({ method: "tasks.clean", params: { maxAgeSeconds: 60 } }, context)
        .payload,
    ).toEqual({ removed: 0 });
    expect(
      handleGatewayRequest({ method: "tasks.clean", params: { maxAgeSeconds: 10 } }, context)
        .payload,
    ).toEqual({ removed: 1 });
  });

  it("rejects unknown methods", () => {
    const res = handleGatewayRequest({ method: "tasks.cancel" }, makeContext());
    expect(res.error).toEqual({ code: "INVALID_REQUEST", message: "unknown method: tasks.cancel" });
  });
});
