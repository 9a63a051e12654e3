/**
 * Task type definitions
 *
 * A task is a named operation the worker pool can execute. Schedules point
 * at tasks by taskKey; executions are keyed by the same name.
 */

import type { Logger } from "./logger";
import type { TaskParams } from "./queue";
import type { SourceRegistry } from "@/sources";

/**
 * Ingestion targets: named sets of search queries crossed with locations
 */
export type TargetSet = {
  queries: string[];
  locations: string[];
};

export type IngestionTargets = Record<string, TargetSet>;

/**
 * Long-lived services a task may use. Built once at startup and shared by
 * every execution; tasks keep no state of their own between runs.
 */
export type TaskServices = {
  sources: SourceRegistry;
  targets: IngestionTargets;
  retentionDays: number;
  /** Pause between provider searches */
  sleep(ms: number): Promise<void>;
};

/**
 * Context passed to a single task attempt
 */
export type TaskContext = {
  executionId: number;
  taskName: string;
  /** 1-based attempt number */
  attempt: number;
  logger: Logger;
  /** Clock shared with the worker pool */
  now(): Date;
  services: TaskServices;
};

/**
 * Counters reported by a task run, persisted on the execution record
 */
export type TaskCounters = Record<string, number>;

export type Task = {
  /**
   * Stable unique identifier, also used as the execution's task name
   * (e.g., "fetch-global-jobs", "deactivate-stale-jobs")
   */
  taskKey: string;

  /** Human-readable name for logging */
  name: string;

  /**
   * Execute the task once
   *
   * @throws Any error; the worker classifies it to decide on retry
   */
  run(ctx: TaskContext, params: TaskParams): Promise<TaskCounters>;
};
