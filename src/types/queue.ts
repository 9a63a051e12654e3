/**
 * Task queue / worker pool type definitions
 */

import type { TaskExecutionRow } from "./db";

/**
 * Lifecycle of a TaskExecutionRecord
 *
 * pending → running → succeeded | failed | cancelled
 * pending → cancelled (cancellation requested before a worker claimed it)
 *
 * pending and running are "in flight": at most one per task name.
 */
export type TaskExecutionStatus =
  | "pending"
  | "running"
  | "succeeded"
  | "failed"
  | "cancelled";

export type TaskParams = Record<string, unknown>;

export type EnqueueOptions = {
  /** Schedule that produced this execution (null for manual enqueues) */
  scheduleName?: string;
  /** Occurrence timestamp the schedule fired for (ISO 8601) */
  scheduledFor?: string;
};

/**
 * Handle returned by enqueue
 *
 * When the task name already has an execution in flight the enqueue is
 * coalesced: `accepted` is false and the handle points at the existing
 * execution.
 */
export type TaskHandle = {
  executionId: number;
  taskName: string;
  accepted: boolean;
};

export type BackoffConfig = {
  baseDelayMs: number;
  maxDelayMs: number;
};

export type WorkerPoolConfig = {
  /** Number of concurrent workers */
  concurrency: number;
  /** Total attempts per execution (initial attempt included) */
  maxAttempts: number;
  backoff: BackoffConfig;
  /** TTL of the per-task lock; refreshed while held */
  lockTtlSeconds: number;
  /** Idle wait between claim attempts when the queue is empty */
  pollIntervalMs: number;
};

/**
 * Final state of an execution as observed by the worker that ran it
 */
export type ExecutionOutcome = {
  executionId: number;
  taskName: string;
  status: Extract<TaskExecutionStatus, "succeeded" | "failed" | "cancelled">;
  attempts: number;
  errorCode: string | null;
};

export type TaskExecutionRecord = TaskExecutionRow;
