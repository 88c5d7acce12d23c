import { Type, type Static } from "@sinclair/typebox";

export const TaskSweeperConfigSchema = Type.Object(
  {
    /** Run periodic cleanup of settled tasks. Default: true. */
    enabled: Type.Optional(Type.Boolean()),
    /** Minutes between cleanup passes. Default: 10. */
    intervalMinutes: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
    /** Settled tasks older than this many seconds are removed. Default: 3600. */
    maxAgeSeconds: Type.Optional(Type.Number({ minimum: 0 })),
  },
  { additionalProperties: false },
);

export const TasksConfigSchema = Type.Object(
  {
    /** Cap on concurrently running tasks; 0 means unbounded. Default: 0. */
    maxConcurrent: Type.Optional(Type.Integer({ minimum: 0 })),
    sweeper: Type.Optional(TaskSweeperConfigSchema),
  },
  { additionalProperties: false },
);

export type TaskSweeperConfig = Static<typeof TaskSweeperConfigSchema>;
export type TasksConfig = Static<typeof TasksConfigSchema>;

export const TASKS_DEFAULTS = {
  maxConcurrent: 0,
  sweeper: {
    enabled: true,
    intervalMinutes: 10,
    maxAgeSeconds: 3600,
  },
} as const satisfies {
  maxConcurrent: number;
  sweeper: Required<TaskSweeperConfig>;
};
