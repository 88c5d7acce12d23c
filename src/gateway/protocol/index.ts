import type { Static, TSchema } from "@sinclair/typebox";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const ErrorCodes = {
  INVALID_REQUEST: "INVALID_REQUEST",
  NOT_FOUND: "NOT_FOUND",
  UNAVAILABLE: "UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorShape = {
  code: ErrorCode;
  message: string;
  details?: unknown;
};

export function errorShape(code: ErrorCode, message: string, details?: unknown): ErrorShape {
  return details === undefined ? { code, message } : { code, message, details };
}

const TaskStatusSchema = Type.Union([
  Type.Literal("pending"),
  Type.Literal("running"),
  Type.Literal("completed"),
  Type.Literal("failed"),
]);

export const ChatAsyncParamsSchema = Type.Object({
  question: Type.String({ minLength: 1 }),
});

export const TasksGetParamsSchema = Type.Object({
  taskId: Type.String({ minLength: 1 }),
});

export const TasksListParamsSchema = Type.Object({
  status: Type.Optional(Type.Union([TaskStatusSchema, Type.Array(TaskStatusSchema)])),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500 })),
});

export const TasksCleanParamsSchema = Type.Object({
  maxAgeSeconds: Type.Optional(Type.Number({ minimum: 0 })),
});

export type ChatAsyncParams = Static<typeof ChatAsyncParamsSchema>;
export type TasksGetParams = Static<typeof TasksGetParamsSchema>;
export type TasksListParams = Static<typeof TasksListParamsSchema>;
export type TasksCleanParams = Static<typeof TasksCleanParamsSchema>;

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: ErrorShape };

/** Checks request params against `schema`; absent params validate as `{}`. */
export function validateParams<S extends TSchema>(
  schema: S,
  params: unknown,
): ValidationResult<Static<S>> {
  const value = params ?? {};
  if (Value.Check(schema, value)) {
    return { ok: true, value };
  }
  const first = Value.Errors(schema, value).First();
  const where = first?.path ? `${first.path.replace(/^\//, "")}: ` : "";
  return {
    ok: false,
    error: errorShape(ErrorCodes.INVALID_REQUEST, `invalid params: ${where}${first?.message ?? "invalid"}`),
  };
}
