/**
 * Runner core: wires storage, sources, tasks, queue and scheduler
 *
 * Run modes:
 * - once: one scheduler tick, then drain the queue
 * - task: enqueue one task now, then drain the queue
 * - forever: scheduler timer plus long-running workers until SIGINT/SIGTERM
 */

import type {
  ExecutionOutcome,
  HttpRequestFn,
  RunSummary,
  Task,
  TaskParams,
} from "@/types";
import type { Env } from "@/config";
import {
  loadIngestionTargets,
  loadScheduleConfig,
  toSchedulerConfig,
  toWorkerPoolConfig,
} from "@/config";
import { applyPendingMigrations, closeDb, openDb } from "@/db";
import { createDefaultSourceRegistry } from "@/sources";
import { TaskRegistry } from "@/tasks";
import { TaskQueue, WorkerPool } from "@/queue";
import { ScheduleRegistry, Scheduler } from "@/scheduler";
import { sleep as defaultSleep } from "@/utils";
import * as logger from "@/logger";

export type App = {
  env: Env;
  tasks: TaskRegistry;
  schedules: ScheduleRegistry;
  queue: TaskQueue;
  pool: WorkerPool;
  scheduler: Scheduler;
};

export type BootstrapOptions = {
  httpRequest?: HttpRequestFn;
  now?: () => Date;
  /** Replaces the built-in task list */
  tasks?: Task[];
  /** Worker backoff and task pacing sleep */
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Open and migrate the database, load static configuration and build the
 * scheduler and worker pool
 *
 * @throws {ConfigurationError} Unreadable or invalid configuration files
 * @throws {InvalidScheduleError} A schedule that cannot be registered
 */
export function bootstrap(env: Env, options: BootstrapOptions = {}): App {
  logger.setLogLevel(env.LOG_LEVEL);

  const db = openDb(env.DB_PATH);
  applyPendingMigrations(db);

  const targets = loadIngestionTargets(env.TARGETS_FILE);
  const scheduleEntries = loadScheduleConfig(env.SCHEDULES_FILE);

  const now = options.now ?? (() => new Date());
  const sources = createDefaultSourceRegistry({
    serpApiKey: env.SERPAPI_KEY,
    careerjetAffid: env.CAREERJET_AFFID,
    httpRequest: options.httpRequest,
    now,
  });

  const sleep = options.sleep ?? defaultSleep;
  const tasks = new TaskRegistry(options.tasks);
  const schedules = new ScheduleRegistry(tasks);
  schedules.registerAll(scheduleEntries);

  const queue = new TaskQueue(tasks, now);
  const pool = new WorkerPool({
    tasks,
    services: { sources, targets, retentionDays: env.JOB_RETENTION_DAYS, sleep },
    config: toWorkerPoolConfig(env),
    now,
    sleep,
  });
  const scheduler = new Scheduler({
    registry: schedules,
    queue,
    config: toSchedulerConfig(env),
    now,
    onEnqueued: () => pool.wake(),
  });

  logger.info("Runner bootstrapped", {
    dbPath: env.DB_PATH,
    schedules: schedules.list().map((s) => `${s.name} (${s.cron})`),
    tasks: tasks.keys(),
    sources: sources.list(),
  });

  return { env, tasks, schedules, queue, pool, scheduler };
}

function summarize(enqueued: number, outcomes: ExecutionOutcome[]): RunSummary {
  return {
    enqueued,
    succeeded: outcomes.filter((o) => o.status === "succeeded").length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    cancelled: outcomes.filter((o) => o.status === "cancelled").length,
  };
}

/**
 * One scheduler tick at `currentTime`, then run everything queued
 */
export async function runOnce(app: App, currentTime: Date = new Date()): Promise<RunSummary> {
  const tick = app.scheduler.tick(currentTime);
  const enqueued = tick.fired.filter((f) => f.accepted).length;

  const outcomes = await app.pool.drain();
  const summary = summarize(enqueued, outcomes);

  logger.info("Single pass finished", { ...summary, skipped: tick.skipped.length });
  return summary;
}

/**
 * Enqueue one task immediately and run the queue
 *
 * Without explicit params, uses the params of the first schedule that
 * targets the task.
 */
export async function runTaskNow(
  app: App,
  taskName: string,
  params?: TaskParams,
): Promise<RunSummary> {
  const scheduled = app.schedules.list().find((s) => s.target.taskKey === taskName);
  const handle = app.queue.enqueue(taskName, params ?? { ...scheduled?.target.params });

  if (!handle.accepted) {
    logger.warn("Task already in flight, running the existing execution", {
      taskName,
      executionId: handle.executionId,
    });
  }

  const outcomes = await app.pool.drain();
  const summary = summarize(handle.accepted ? 1 : 0, outcomes);

  logger.info("Task run finished", { taskName, ...summary });
  return summary;
}

/**
 * Run scheduler and workers until SIGINT/SIGTERM
 *
 * The first signal stops the scheduler and waits for running executions;
 * a second one exits immediately.
 */
export async function runForever(app: App): Promise<void> {
  let shutdownRequested = false;

  const shutdown = new Promise<string>((resolve) => {
    const handleShutdown = (signal: string) => {
      if (shutdownRequested) {
        logger.warn("Forced shutdown - exiting immediately");
        process.exit(1);
      }
      shutdownRequested = true;
      logger.info("Shutdown signal received, waiting for running executions", {
        signal,
      });
      resolve(signal);
    };

    process.on("SIGINT", () => handleShutdown("SIGINT"));
    process.on("SIGTERM", () => handleShutdown("SIGTERM"));
  });

  app.pool.start();
  app.scheduler.start();

  await shutdown;

  app.scheduler.stop();
  await app.pool.stop();
}

/**
 * Bootstrap, run the mode named by RUN_MODE and close the database, also
 * when bootstrapping fails
 *
 * @returns Process exit code: 1 when an execution of a single pass failed
 */
export async function runMode(env: Env, options: BootstrapOptions = {}): Promise<number> {
  try {
    const app = bootstrap(env, options);

    if (env.RUN_MODE === "forever") {
      logger.info("Starting runner (continuous mode)");
      await runForever(app);
      return 0;
    }

    let summary: RunSummary;
    if (env.RUN_MODE === "task") {
      const taskName = env.TASK_NAME ?? "";
      logger.info("Starting runner (single task mode)", { taskName });
      summary = await runTaskNow(app, taskName);
    } else {
      logger.info("Starting runner (single pass mode)");
      summary = await runOnce(app);
    }

    if (summary.failed > 0) {
      logger.warn("Some executions failed - exiting with code 1", { ...summary });
      return 1;
    }
    return 0;
  } finally {
    closeDb();
  }
}
