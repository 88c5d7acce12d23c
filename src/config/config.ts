import fs from "node:fs";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { extractErrorCode, formatErrorMessage } from "../infra/errors.js";
import { TASKS_DEFAULTS, TasksConfigSchema } from "./types.tasks.js";

export const FinsightConfigSchema = Type.Object(
  {
    tasks: Type.Optional(TasksConfigSchema),
  },
  { additionalProperties: false },
);

export type FinsightConfig = Static<typeof FinsightConfigSchema>;

export type ResolvedTasksConfig = {
  maxConcurrent: number;
  sweeper: {
    enabled: boolean;
    intervalMs: number;
    maxAgeSeconds: number;
  };
};

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.FINSIGHT_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.resolve("finsight.json");
}

export function parseConfig(raw: unknown, configPath: string): FinsightConfig {
  if (Value.Check(FinsightConfigSchema, raw)) {
    return raw;
  }
  const first = Value.Errors(FinsightConfigSchema, raw).First();
  const where = first?.path || "/";
  throw new ConfigError(
    `invalid config at ${configPath}: ${where} ${first?.message ?? "is invalid"}`,
    configPath,
  );
}

/** Reads and validates the config file. A missing file yields an empty config. */
export function loadConfig(configPath: string = resolveConfigPath()): FinsightConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    if (extractErrorCode(err) === "ENOENT") {
      return {};
    }
    throw err;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `invalid JSON in ${configPath}: ${formatErrorMessage(err)}`,
      configPath,
    );
  }
  return parseConfig(raw, configPath);
}

export function resolveTasksConfig(
  cfg: FinsightConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedTasksConfig {
  const tasks = cfg.tasks ?? {};
  const sweeper = tasks.sweeper ?? {};
  const sweeperEnabled =
    env.FINSIGHT_SKIP_TASK_SWEEPER !== "1" &&
    (sweeper.enabled ?? TASKS_DEFAULTS.sweeper.enabled);
  return {
    maxConcurrent: tasks.maxConcurrent ?? TASKS_DEFAULTS.maxConcurrent,
    sweeper: {
      enabled: sweeperEnabled,
      intervalMs: (sweeper.intervalMinutes ?? TASKS_DEFAULTS.sweeper.intervalMinutes) * 60_000,
      maxAgeSeconds: sweeper.maxAgeSeconds ?? TASKS_DEFAULTS.sweeper.maxAgeSeconds,
    },
  };
}
