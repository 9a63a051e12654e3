/**
 * Scheduler type definitions
 */

import type { TaskParams } from "./queue";

/**
 * Parsed cron expression: allowed values per field
 *
 * Fields use cron numbering: minute 0-59, hour 0-23, dayOfMonth 1-31,
 * month 1-12, dayOfWeek 0-6 (Sunday = 0).
 */
export type CronFields = {
  minutes: ReadonlySet<number>;
  hours: ReadonlySet<number>;
  daysOfMonth: ReadonlySet<number>;
  months: ReadonlySet<number>;
  daysOfWeek: ReadonlySet<number>;
  /** Whether day-of-month was restricted (not "*") */
  dayOfMonthRestricted: boolean;
  /** Whether day-of-week was restricted (not "*") */
  dayOfWeekRestricted: boolean;
};

/**
 * What a schedule fires
 */
export type ScheduleTarget = {
  taskKey: string;
  params: TaskParams;
};

/**
 * A registered recurring trigger (immutable once registered)
 */
export type ScheduledTaskDefinition = {
  name: string;
  cron: string;
  target: ScheduleTarget;
};

/**
 * Static schedule configuration entry (config/schedules.json)
 */
export type ScheduleConfigEntry = {
  name: string;
  cron: string;
  taskKey: string;
  params: TaskParams;
};

export type SchedulerConfig = {
  /**
   * How many missed occurrences to fire after downtime. Older missed
   * occurrences are skipped. Must be >= 1.
   */
  catchUpOccurrences: number;
  /** Interval between automatic ticks when started */
  tickIntervalMs: number;
};

export type FiredOccurrence = {
  scheduleName: string;
  taskKey: string;
  scheduledFor: string;
  executionId: number;
  /** false when the task was already in flight and the enqueue coalesced */
  accepted: boolean;
};

export type SkippedOccurrence = {
  scheduleName: string;
  scheduledFor: string;
};

export type TickResult = {
  fired: FiredOccurrence[];
  /** Missed occurrences older than the catch-up window */
  skipped: SkippedOccurrence[];
};
