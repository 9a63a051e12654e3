/**
 * Task executions repository
 *
 * The task_executions table is both the queue and the execution history.
 * Partial unique indexes keep one in-flight execution per task name and one
 * execution per schedule occurrence.
 */

import type {
  TaskCounters,
  TaskExecutionRow,
  TaskExecutionStatus,
  TaskParams,
} from "@/types";
import { getDb } from "@/db";
import { isUniqueConstraintError } from "@/errors";

export type InsertExecutionInput = {
  taskName: string;
  params: TaskParams;
  scheduleName?: string | null;
  scheduledFor?: string | null;
  now: string;
};

/**
 * Result of inserting a pending execution
 *
 * - created: new pending row
 * - in_flight: the task name already has a pending/running execution
 * - duplicate_occurrence: this schedule occurrence was already enqueued
 */
export type InsertExecutionResult =
  | { status: "created"; execution: TaskExecutionRow }
  | { status: "in_flight"; execution: TaskExecutionRow }
  | { status: "duplicate_occurrence"; execution: TaskExecutionRow };

export function getExecution(id: number): TaskExecutionRow | null {
  const db = getDb();
  const row = db
    .prepare<[number], TaskExecutionRow>("SELECT * FROM task_executions WHERE id = ?")
    .get(id);
  return row ?? null;
}

export function findInFlightExecution(taskName: string): TaskExecutionRow | null {
  const db = getDb();
  const row = db
    .prepare<[string], TaskExecutionRow>(
      `SELECT * FROM task_executions
       WHERE task_name = ? AND status IN ('pending', 'running')`,
    )
    .get(taskName);
  return row ?? null;
}

function findOccurrenceExecution(
  scheduleName: string,
  scheduledFor: string,
): TaskExecutionRow | null {
  const db = getDb();
  const row = db
    .prepare<[string, string], TaskExecutionRow>(
      `SELECT * FROM task_executions
       WHERE schedule_name = ? AND scheduled_for = ?`,
    )
    .get(scheduleName, scheduledFor);
  return row ?? null;
}

/**
 * Insert a pending execution unless the unique indexes refuse it
 */
export function insertPendingExecution(
  input: InsertExecutionInput,
): InsertExecutionResult {
  const db = getDb();
  const scheduleName = input.scheduleName ?? null;
  const scheduledFor = input.scheduledFor ?? null;

  try {
    const row = db
      .prepare<
        [string, string, string | null, string | null, string],
        TaskExecutionRow
      >(
        `
        INSERT INTO task_executions
          (task_name, params_json, schedule_name, scheduled_for, status, enqueued_at)
        VALUES (?, ?, ?, ?, 'pending', ?)
        RETURNING *
      `,
      )
      .get(
        input.taskName,
        JSON.stringify(input.params),
        scheduleName,
        scheduledFor,
        input.now,
      );

    if (!row) {
      throw new Error(`Insert into task_executions returned no row for ${input.taskName}`);
    }
    return { status: "created", execution: row };
  } catch (err) {
    if (!isUniqueConstraintError(err)) {
      throw err;
    }

    if (scheduleName !== null && scheduledFor !== null) {
      const occurrence = findOccurrenceExecution(scheduleName, scheduledFor);
      if (occurrence) {
        return { status: "duplicate_occurrence", execution: occurrence };
      }
    }

    const inFlight = findInFlightExecution(input.taskName);
    if (inFlight) {
      return { status: "in_flight", execution: inFlight };
    }

    throw err;
  }
}

/**
 * Atomically claim the oldest pending execution for a worker
 *
 * @returns The claimed row (now running) or null if the queue is empty
 */
export function claimNextPendingExecution(
  workerId: string,
  now: string,
): TaskExecutionRow | null {
  const db = getDb();
  const row = db
    .prepare<[string, string], TaskExecutionRow>(
      `
      UPDATE task_executions
      SET status = 'running',
          worker_id = ?,
          started_at = COALESCE(started_at, ?)
      WHERE id = (
        SELECT id FROM task_executions
        WHERE status = 'pending' AND cancel_requested = 0
        ORDER BY id
        LIMIT 1
      )
      RETURNING *
    `,
    )
    .get(workerId, now);

  return row ?? null;
}

/**
 * Put a claimed execution back in the queue (task lock held elsewhere)
 */
export function releaseClaim(id: number): void {
  const db = getDb();
  db.prepare<[number]>(
    `UPDATE task_executions
     SET status = 'pending', worker_id = NULL
     WHERE id = ? AND status = 'running'`,
  ).run(id);
}

/**
 * Persist the number of attempts made so far
 */
export function recordAttempt(id: number, attempts: number): void {
  const db = getDb();
  db.prepare<[number, number]>(
    "UPDATE task_executions SET attempts = ? WHERE id = ?",
  ).run(attempts, id);
}

export type FinishExecutionInput = {
  status: Extract<TaskExecutionStatus, "succeeded" | "failed" | "cancelled">;
  attempts: number;
  now: string;
  errorCode?: string | null;
  errorMessage?: string | null;
  counters?: TaskCounters | null;
};

/**
 * Move a running execution to a final status
 */
export function finishExecution(id: number, input: FinishExecutionInput): void {
  const db = getDb();
  db.prepare<
    [string, number, string, string | null, string | null, string | null, number]
  >(
    `
    UPDATE task_executions
    SET status = ?,
        attempts = ?,
        finished_at = ?,
        error_code = ?,
        error_message = ?,
        counters_json = ?
    WHERE id = ? AND status = 'running'
  `,
  ).run(
    input.status,
    input.attempts,
    input.now,
    input.errorCode ?? null,
    input.errorMessage ?? null,
    input.counters ? JSON.stringify(input.counters) : null,
    id,
  );
}

/**
 * Request cancellation of an execution
 *
 * A pending execution is cancelled immediately; a running one is flagged and
 * its worker stops at the next checkpoint between attempts.
 *
 * @returns The execution after the update, or null if it does not exist
 */
export function requestExecutionCancellation(
  id: number,
  now: string,
): TaskExecutionRow | null {
  const db = getDb();

  const run = db.transaction(() => {
    db.prepare<[string, number]>(
      `UPDATE task_executions
       SET status = 'cancelled', cancel_requested = 1, finished_at = ?
       WHERE id = ? AND status = 'pending'`,
    ).run(now, id);

    db.prepare<[number]>(
      `UPDATE task_executions
       SET cancel_requested = 1
       WHERE id = ? AND status = 'running'`,
    ).run(id);

    return getExecution(id);
  });

  return run.immediate();
}

export function isCancellationRequested(id: number): boolean {
  const db = getDb();
  const row = db
    .prepare<[number], { cancel_requested: 0 | 1 }>(
      "SELECT cancel_requested FROM task_executions WHERE id = ?",
    )
    .get(id);
  return row?.cancel_requested === 1;
}

/**
 * Return running executions abandoned by a dead worker to the queue
 *
 * An execution counts as abandoned when no live (unexpired) task lock exists
 * for its task name.
 *
 * @returns Ids of recovered executions
 */
export function recoverAbandonedExecutions(now: string): number[] {
  const db = getDb();
  const rows = db
    .prepare<[string], { id: number }>(
      `
      UPDATE task_executions
      SET status = 'pending', worker_id = NULL
      WHERE status = 'running'
        AND NOT EXISTS (
          SELECT 1 FROM task_locks
          WHERE task_locks.lock_name = task_executions.task_name
            AND task_locks.expires_at > ?
        )
      RETURNING id
    `,
    )
    .all(now);

  return rows.map((r) => r.id);
}

export function countExecutionsByStatus(status: TaskExecutionStatus): number {
  const db = getDb();
  const row = db
    .prepare<[string], { count: number }>(
      "SELECT COUNT(*) AS count FROM task_executions WHERE status = ?",
    )
    .get(status);
  return row?.count ?? 0;
}

export function listExecutions(taskName?: string): TaskExecutionRow[] {
  const db = getDb();
  if (taskName) {
    return db
      .prepare<[string], TaskExecutionRow>(
        "SELECT * FROM task_executions WHERE task_name = ? ORDER BY id",
      )
      .all(taskName);
  }
  return db
    .prepare<[], TaskExecutionRow>("SELECT * FROM task_executions ORDER BY id")
    .all();
}
