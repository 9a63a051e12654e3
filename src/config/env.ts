/**
 * Environment configuration
 *
 * Parsed and defaulted once through a zod schema. Invalid values fail
 * startup with the full list of issues.
 */

import { join } from "path";
import { z } from "zod";
import type { SchedulerConfig, WorkerPoolConfig } from "@/types";
import { ConfigurationError } from "@/errors";
import { formatZodIssues } from "@/utils";

function emptyAsUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const positiveInt = (fallback: number) =>
  z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(fallback),
  );

const optionalString = z.preprocess(
  emptyAsUndefined,
  z.string().trim().optional(),
);

const logLevel = z.preprocess(
  (value) =>
    typeof value === "string" ? value.trim().toLowerCase() || undefined : value,
  z.enum(["debug", "info", "warn", "error"]).default("info"),
);

const runMode = z.preprocess(
  (value) =>
    typeof value === "string" ? value.trim().toLowerCase() || undefined : value,
  z.enum(["once", "forever", "task"]).default("forever"),
);

export const envSchema = z
  .object({
    DB_PATH: z.preprocess(
      emptyAsUndefined,
      z.string().default(join(process.cwd(), "data", "app.db")),
    ),
    LOG_LEVEL: logLevel,
    RUN_MODE: runMode,
    TASK_NAME: optionalString,

    WORKER_CONCURRENCY: positiveInt(2),
    WORKER_POLL_INTERVAL_MS: positiveInt(5000),
    TASK_MAX_ATTEMPTS: positiveInt(3),
    TASK_BACKOFF_BASE_MS: positiveInt(30_000),
    TASK_BACKOFF_MAX_MS: positiveInt(600_000),
    TASK_LOCK_TTL_SECONDS: positiveInt(3600),

    SCHEDULER_TICK_INTERVAL_MS: positiveInt(30_000),
    SCHEDULER_CATCH_UP_OCCURRENCES: positiveInt(1),
    JOB_RETENTION_DAYS: positiveInt(30),

    SERPAPI_KEY: optionalString,
    CAREERJET_AFFID: optionalString,

    SCHEDULES_FILE: z.preprocess(
      emptyAsUndefined,
      z.string().default(join("config", "schedules.json")),
    ),
    TARGETS_FILE: z.preprocess(
      emptyAsUndefined,
      z.string().default(join("config", "ingestion-targets.json")),
    ),
  })
  .superRefine((env, ctx) => {
    if (env.RUN_MODE === "task" && !env.TASK_NAME) {
      ctx.addIssue({
        code: "custom",
        path: ["TASK_NAME"],
        message: "Required when RUN_MODE=task",
      });
    }
    if (env.TASK_BACKOFF_MAX_MS < env.TASK_BACKOFF_BASE_MS) {
      ctx.addIssue({
        code: "custom",
        path: ["TASK_BACKOFF_MAX_MS"],
        message: "Must be >= TASK_BACKOFF_BASE_MS",
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid environment configuration",
      formatZodIssues(result.error),
    );
  }
  return result.data;
}

export function toWorkerPoolConfig(env: Env): WorkerPoolConfig {
  return {
    concurrency: env.WORKER_CONCURRENCY,
    maxAttempts: env.TASK_MAX_ATTEMPTS,
    backoff: {
      baseDelayMs: env.TASK_BACKOFF_BASE_MS,
      maxDelayMs: env.TASK_BACKOFF_MAX_MS,
    },
    lockTtlSeconds: env.TASK_LOCK_TTL_SECONDS,
    pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
  };
}

export function toSchedulerConfig(env: Env): SchedulerConfig {
  return {
    catchUpOccurrences: env.SCHEDULER_CATCH_UP_OCCURRENCES,
    tickIntervalMs: env.SCHEDULER_TICK_INTERVAL_MS,
  };
}
