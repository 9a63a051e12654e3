/**
 * Database row type definitions
 *
 * Shapes mirror the tables in migrations/. SQLite has no boolean type:
 * flags are stored as 0/1 integers.
 */

import type { JobSource } from "./jobPosting";
import type { TaskExecutionStatus } from "./queue";

/**
 * job_postings row
 */
export type JobPostingRow = {
  id: number;
  source: JobSource;
  external_id: string;
  title: string;
  company: string | null;
  location: string | null;
  salary_min: number | null;
  salary_max: number | null;
  salary_currency: string | null;
  salary_text: string | null;
  employment_type: string | null;
  description: string | null;
  url: string | null;
  is_active: 0 | 1;
  fetched_at: string;
  created_at: string;
  updated_at: string;
  deactivated_at: string | null;
};

/**
 * Named bind parameters for the posting upsert statement
 */
export type JobPostingWriteParams = Omit<
  JobPostingRow,
  "id" | "created_at" | "updated_at" | "deactivated_at"
>;

/**
 * schedule_state row: persisted next-fire time per schedule
 */
export type ScheduleStateRow = {
  schedule_name: string;
  cron: string;
  next_fire_at: string;
  last_fired_at: string | null;
  updated_at: string;
};

/**
 * task_executions row: one TaskExecutionRecord
 */
export type TaskExecutionRow = {
  id: number;
  task_name: string;
  params_json: string;
  schedule_name: string | null;
  scheduled_for: string | null;
  status: TaskExecutionStatus;
  /** Attempts made so far (initial attempt included) */
  attempts: number;
  cancel_requested: 0 | 1;
  worker_id: string | null;
  enqueued_at: string;
  started_at: string | null;
  finished_at: string | null;
  error_code: string | null;
  error_message: string | null;
  counters_json: string | null;
};

/**
 * task_locks row
 */
export type TaskLockRow = {
  lock_name: string;
  owner_id: string;
  acquired_at: string;
  expires_at: string;
  updated_at: string;
};
