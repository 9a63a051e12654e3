/**
 * Schedule registry: validated, immutable schedule definitions
 */

import type {
  CronFields,
  ScheduleConfigEntry,
  ScheduleTarget,
  ScheduledTaskDefinition,
} from "@/types";
import type { TaskRegistry } from "@/tasks";
import { InvalidScheduleError } from "@/errors";
import { isPlainObject } from "@/utils";
import { CronParseError, nextOccurrence, parseCronExpression } from "./cronExpression";

export type RegisteredSchedule = Readonly<ScheduledTaskDefinition> & {
  readonly fields: CronFields;
};

export class ScheduleRegistry {
  private readonly schedules = new Map<string, RegisteredSchedule>();

  constructor(private readonly tasks: TaskRegistry) {}

  /**
   * Register a recurring trigger
   *
   * @throws {InvalidScheduleError} Empty or duplicate name, malformed or
   *   never-matching recurrence expression, unknown target task
   */
  registerSchedule(
    name: string,
    recurrenceExpr: string,
    target: ScheduleTarget,
  ): RegisteredSchedule {
    const scheduleName = name.trim();
    if (!scheduleName) {
      throw new InvalidScheduleError(name, "name must not be empty");
    }
    if (this.schedules.has(scheduleName)) {
      throw new InvalidScheduleError(scheduleName, "name already registered");
    }

    let fields: CronFields;
    try {
      fields = parseCronExpression(recurrenceExpr);
    } catch (err) {
      if (err instanceof CronParseError) {
        throw new InvalidScheduleError(
          scheduleName,
          `bad recurrence '${recurrenceExpr}': ${err.message}`,
        );
      }
      throw err;
    }

    if (nextOccurrence(fields, new Date()) === null) {
      throw new InvalidScheduleError(
        scheduleName,
        `recurrence '${recurrenceExpr}' never fires`,
      );
    }

    if (!this.tasks.has(target.taskKey)) {
      throw new InvalidScheduleError(
        scheduleName,
        `unknown task '${target.taskKey}'`,
      );
    }
    if (!isPlainObject(target.params)) {
      throw new InvalidScheduleError(scheduleName, "params must be an object");
    }

    const schedule: RegisteredSchedule = Object.freeze({
      name: scheduleName,
      cron: recurrenceExpr.trim().replace(/\s+/g, " "),
      target: Object.freeze({
        taskKey: target.taskKey,
        params: Object.freeze({ ...target.params }),
      }),
      fields,
    });

    this.schedules.set(scheduleName, schedule);
    return schedule;
  }

  registerAll(entries: ScheduleConfigEntry[]): RegisteredSchedule[] {
    return entries.map((entry) =>
      this.registerSchedule(entry.name, entry.cron, {
        taskKey: entry.taskKey,
        params: entry.params,
      }),
    );
  }

  get(name: string): RegisteredSchedule | null {
    return this.schedules.get(name) ?? null;
  }

  /**
   * Registered schedules in registration order
   */
  list(): RegisteredSchedule[] {
    return [...this.schedules.values()];
  }
}
