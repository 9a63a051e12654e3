/**
 * Schedule state repository
 *
 * One row per registered schedule holding its persisted next fire time.
 */

import type { ScheduleStateRow } from "@/types";
import { getDb } from "@/db";

export function getScheduleState(scheduleName: string): ScheduleStateRow | null {
  const db = getDb();
  const row = db
    .prepare<[string], ScheduleStateRow>(
      "SELECT * FROM schedule_state WHERE schedule_name = ?",
    )
    .get(scheduleName);
  return row ?? null;
}

/**
 * Create or reset a schedule's state (first sight, or cron changed)
 */
export function resetScheduleState(
  scheduleName: string,
  cron: string,
  nextFireAt: string,
  now: string,
): void {
  const db = getDb();
  db.prepare<[string, string, string, string]>(
    `
    INSERT INTO schedule_state (schedule_name, cron, next_fire_at, updated_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(schedule_name) DO UPDATE SET
      cron = excluded.cron,
      next_fire_at = excluded.next_fire_at,
      updated_at = excluded.updated_at
  `,
  ).run(scheduleName, cron, nextFireAt, now);
}

/**
 * Compare-and-set the next fire time
 *
 * Only advances when the stored value still equals expectedNextFireAt, so a
 * concurrent tick that already advanced the schedule wins and this call is a
 * no-op.
 *
 * @returns true if this call advanced the schedule
 */
export function advanceScheduleState(
  scheduleName: string,
  expectedNextFireAt: string,
  nextFireAt: string,
  lastFiredAt: string,
  now: string,
): boolean {
  const db = getDb();
  const result = db
    .prepare<[string, string, string, string, string]>(
      `
      UPDATE schedule_state
      SET next_fire_at = ?, last_fired_at = ?, updated_at = ?
      WHERE schedule_name = ? AND next_fire_at = ?
    `,
    )
    .run(nextFireAt, lastFiredAt, now, scheduleName, expectedNextFireAt);

  return result.changes > 0;
}
