/**
 * Worker pool: executes queued tasks
 *
 * Each worker claims the oldest pending execution, takes the task lock for
 * its task name and runs the task, retrying retryable failures with
 * exponential backoff inside the same claim. Workers keep no state between
 * executions.
 */

import { randomUUID } from "crypto";
import { hostname } from "os";
import type {
  ExecutionOutcome,
  TaskContext,
  TaskCounters,
  TaskExecutionRow,
  TaskParams,
  TaskServices,
  WorkerPoolConfig,
} from "@/types";
import type { TaskRegistry } from "@/tasks";
import {
  acquireTaskLock,
  claimNextPendingExecution,
  finishExecution,
  isCancellationRequested,
  recordAttempt,
  recoverAbandonedExecutions,
  refreshTaskLock,
  releaseClaim,
  releaseTaskLock,
  requestExecutionCancellation,
} from "@/db";
import {
  ConfigurationError,
  classifyError,
  getErrorCode,
  getErrorMessage,
} from "@/errors";
import {
  EXECUTION_ERROR_MESSAGE_MAX_LENGTH,
  LOCK_CONTENTION_RETRY_MS,
  TASK_LOCK_REFRESH_FRACTION,
} from "@/constants/queue";
import { computeBackoffDelay, isPlainObject, sleep as defaultSleep } from "@/utils";
import * as logger from "@/logger";

export type WorkerPoolDeps = {
  tasks: TaskRegistry;
  services: TaskServices;
  config: WorkerPoolConfig;
  now?: () => Date;
  /** Wait between retry attempts */
  sleep?: (ms: number) => Promise<void>;
  /** Jitter source for backoff */
  random?: () => number;
};

type RunNextResult =
  | { kind: "executed"; outcome: ExecutionOutcome }
  | { kind: "empty" }
  | { kind: "contended"; executionId: number; taskName: string };

function parseParams(row: TaskExecutionRow): TaskParams {
  const parsed: unknown = JSON.parse(row.params_json);
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Execution ${row.id} has non-object params`);
  }
  return parsed;
}

export class WorkerPool {
  private readonly tasks: TaskRegistry;
  private readonly services: TaskServices;
  private readonly config: WorkerPoolConfig;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly instanceId = `${hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;

  private running = false;
  private loops: Promise<void>[] = [];
  private readonly wakers = new Set<() => void>();

  constructor(deps: WorkerPoolDeps) {
    this.tasks = deps.tasks;
    this.services = deps.services;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Return executions left running by a dead worker to the queue
   */
  recover(): number[] {
    const recovered = recoverAbandonedExecutions(this.nowIso());
    if (recovered.length > 0) {
      logger.warn("Recovered abandoned executions", { executionIds: recovered });
    }
    return recovered;
  }

  /**
   * Start long-running workers; they poll the queue until stop()
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.recover();
    this.running = true;

    for (let i = 0; i < this.config.concurrency; i++) {
      this.loops.push(this.pollLoop(this.workerId(i)));
    }
    logger.info("Worker pool started", {
      concurrency: this.config.concurrency,
      instanceId: this.instanceId,
    });
  }

  /**
   * Stop claiming new executions and wait for running ones to finish
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.wake();
    await Promise.all(this.loops);
    this.loops = [];
    logger.info("Worker pool stopped");
  }

  /**
   * Wake idle workers (call after enqueueing in the same process)
   */
  wake(): void {
    for (const waker of [...this.wakers]) {
      waker();
    }
  }

  /**
   * Execute queued work until no pending execution remains and every
   * worker is idle
   *
   * Executions whose task lock is held by another process stay pending.
   *
   * @returns Outcomes of the executions run by this call
   */
  async drain(): Promise<ExecutionOutcome[]> {
    if (this.running) {
      throw new Error("drain() cannot run while the pool is started");
    }
    this.recover();

    const outcomes: ExecutionOutcome[] = [];
    const workers: Promise<void>[] = [];
    for (let i = 0; i < this.config.concurrency; i++) {
      workers.push(this.drainLoop(this.workerId(i), outcomes));
    }
    await Promise.all(workers);
    return outcomes;
  }

  /**
   * Cancel a pending execution, or flag a running one for cancellation at
   * its next checkpoint
   */
  requestCancellation(executionId: number): TaskExecutionRow | null {
    return requestExecutionCancellation(executionId, this.nowIso());
  }

  private workerId(index: number): string {
    return `${this.instanceId}-w${index + 1}`;
  }

  private nowIso(): string {
    return this.now().toISOString();
  }

  private async drainLoop(workerId: string, outcomes: ExecutionOutcome[]): Promise<void> {
    for (;;) {
      const result = await this.runNext(workerId);
      if (result.kind !== "executed") {
        return;
      }
      outcomes.push(result.outcome);
    }
  }

  private async pollLoop(workerId: string): Promise<void> {
    while (this.running) {
      let idleMs = this.config.pollIntervalMs;
      try {
        const result = await this.runNext(workerId);
        if (result.kind === "executed") {
          continue;
        }
        // A worker killed mid-task leaves its row running until its lock expires
        if (this.recover().length > 0) {
          continue;
        }
        if (result.kind === "contended") {
          idleMs = LOCK_CONTENTION_RETRY_MS;
        }
      } catch (err) {
        logger.error("Worker loop error", { workerId, error: err });
      }
      await this.idle(idleMs);
    }
  }

  /**
   * Interruptible wait; stop() and wake() end it early
   */
  private idle(ms: number): Promise<void> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const done = () => {
        clearTimeout(timer);
        this.wakers.delete(done);
        resolve();
      };
      this.wakers.add(done);
      timer = setTimeout(done, ms);
    });
  }

  /**
   * Claim and execute the next pending execution
   */
  private async runNext(workerId: string): Promise<RunNextResult> {
    const row = claimNextPendingExecution(workerId, this.nowIso());
    if (!row) {
      return { kind: "empty" };
    }

    const lock = acquireTaskLock(
      row.task_name,
      workerId,
      this.nowIso(),
      this.config.lockTtlSeconds,
    );
    if (!lock.ok) {
      releaseClaim(row.id);
      logger.warn("Task lock held elsewhere, execution left pending", {
        executionId: row.id,
        taskName: row.task_name,
        lockOwner: lock.ownerId,
        lockExpiresAt: lock.expiresAt,
      });
      return { kind: "contended", executionId: row.id, taskName: row.task_name };
    }

    const refreshTimer = setInterval(() => {
      try {
        if (
          !refreshTaskLock(row.task_name, workerId, this.nowIso(), this.config.lockTtlSeconds)
        ) {
          logger.warn("Task lock lost while running", {
            executionId: row.id,
            taskName: row.task_name,
          });
        }
      } catch (err) {
        logger.error("Task lock refresh failed", {
          executionId: row.id,
          taskName: row.task_name,
          error: err,
        });
      }
    }, this.config.lockTtlSeconds * 1000 * TASK_LOCK_REFRESH_FRACTION);
    refreshTimer.unref();

    try {
      const outcome = await this.execute(row, workerId);
      return { kind: "executed", outcome };
    } finally {
      clearInterval(refreshTimer);
      releaseTaskLock(row.task_name, workerId);
    }
  }

  /**
   * Run attempts until success, a fatal error, exhausted attempts or
   * cancellation. Always leaves the row in a final status.
   */
  private async execute(row: TaskExecutionRow, workerId: string): Promise<ExecutionOutcome> {
    const taskName = row.task_name;
    const log = logger.withContext({ taskName, executionId: row.id, workerId });
    let attempts = row.attempts;

    const finish = (
      status: ExecutionOutcome["status"],
      details: { error?: unknown; counters?: TaskCounters } = {},
    ): ExecutionOutcome => {
      const errorCode = details.error !== undefined ? getErrorCode(details.error) : null;
      finishExecution(row.id, {
        status,
        attempts,
        now: this.nowIso(),
        errorCode,
        errorMessage:
          details.error !== undefined
            ? getErrorMessage(details.error, EXECUTION_ERROR_MESSAGE_MAX_LENGTH)
            : null,
        counters: details.counters,
      });
      return { executionId: row.id, taskName, status, attempts, errorCode };
    };

    const task = this.tasks.find(taskName);
    if (!task) {
      const error = new ConfigurationError(`Unknown task '${taskName}'`);
      log.error("Execution cannot start", { error });
      return finish("failed", { error });
    }

    let params: TaskParams;
    try {
      params = parseParams(row);
    } catch (error) {
      log.error("Execution cannot start", { error });
      return finish("failed", { error });
    }

    for (;;) {
      if (isCancellationRequested(row.id)) {
        log.info("Execution cancelled", { attempts });
        return finish("cancelled");
      }

      attempts++;
      recordAttempt(row.id, attempts);

      const ctx: TaskContext = {
        executionId: row.id,
        taskName,
        attempt: attempts,
        logger: logger.withContext({ taskName, executionId: row.id, attempt: attempts }),
        now: () => this.now(),
        services: this.services,
      };

      try {
        log.info("Task attempt started", { attempt: attempts });
        const counters = await task.run(ctx, params);
        log.info("Task succeeded", { attempt: attempts, counters });
        return finish("succeeded", { counters });
      } catch (error) {
        const classification = classifyError(error);

        if (classification === "FATAL" || attempts >= this.config.maxAttempts) {
          log.error("Task failed", {
            attempt: attempts,
            classification,
            error,
          });
          return finish("failed", { error });
        }

        const delayMs = computeBackoffDelay(attempts, this.config.backoff, this.random);
        log.warn("Task attempt failed, retrying", {
          attempt: attempts,
          maxAttempts: this.config.maxAttempts,
          classification,
          delayMs,
          error,
        });
        await this.sleep(delayMs);
      }
    }
  }
}
