/**
 * Scheduler: fires registered schedules into the task queue
 *
 * Next fire times live in schedule_state, so a restart neither repeats nor
 * loses occurrences. Advancing a schedule and enqueueing its occurrences
 * happen in one transaction guarded by a compare-and-set on the previous
 * next_fire_at: two ticks for the same time enqueue once.
 */

import type {
  FiredOccurrence,
  SchedulerConfig,
  SkippedOccurrence,
  TickResult,
} from "@/types";
import type { TaskQueue } from "@/queue";
import { advanceScheduleState, getDb, getScheduleState, resetScheduleState } from "@/db";
import { InvalidScheduleError } from "@/errors";
import { MAX_MISSED_OCCURRENCES_LISTED } from "@/constants/scheduler";
import * as logger from "@/logger";
import type { RegisteredSchedule, ScheduleRegistry } from "./scheduleRegistry";
import { nextOccurrence, nextOccurrenceAtOrAfter } from "./cronExpression";

export type SchedulerDeps = {
  registry: ScheduleRegistry;
  queue: TaskQueue;
  config: SchedulerConfig;
  now?: () => Date;
  /** Called after a tick that enqueued at least one execution */
  onEnqueued?: () => void;
};

export class Scheduler {
  private readonly registry: ScheduleRegistry;
  private readonly queue: TaskQueue;
  private readonly config: SchedulerConfig;
  private readonly now: () => Date;
  private readonly onEnqueued?: () => void;
  private timer: NodeJS.Timeout | null = null;

  constructor(deps: SchedulerDeps) {
    if (!Number.isInteger(deps.config.catchUpOccurrences) || deps.config.catchUpOccurrences < 1) {
      throw new RangeError("catchUpOccurrences must be an integer >= 1");
    }
    this.registry = deps.registry;
    this.queue = deps.queue;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
    this.onEnqueued = deps.onEnqueued;
  }

  /**
   * Fire every schedule due at currentTime
   *
   * Per-schedule failures are logged and leave that schedule's state
   * untouched; other schedules still fire.
   */
  tick(currentTime: Date): TickResult {
    const result: TickResult = { fired: [], skipped: [] };

    for (const schedule of this.registry.list()) {
      try {
        const scheduleResult = this.tickSchedule(schedule, currentTime);
        result.fired.push(...scheduleResult.fired);
        result.skipped.push(...scheduleResult.skipped);
      } catch (err) {
        logger.error("Schedule tick failed", {
          scheduleName: schedule.name,
          error: err,
        });
      }
    }

    if (result.skipped.length > 0) {
      logger.warn("Missed occurrences skipped", {
        count: result.skipped.length,
        schedules: [...new Set(result.skipped.map((s) => s.scheduleName))],
      });
    }
    if (result.fired.length > 0) {
      logger.info("Schedules fired", {
        fired: result.fired.map((f) => ({
          schedule: f.scheduleName,
          scheduledFor: f.scheduledFor,
          executionId: f.executionId,
          accepted: f.accepted,
        })),
      });
      if (this.onEnqueued && result.fired.some((f) => f.accepted)) {
        this.onEnqueued();
      }
    }

    return result;
  }

  /**
   * Tick every tickIntervalMs until stop(); the first tick runs immediately
   */
  start(): void {
    if (this.timer) {
      return;
    }
    const loop = () => {
      try {
        this.tick(this.now());
      } catch (err) {
        logger.error("Scheduler tick failed", { error: err });
      }
      this.timer = setTimeout(loop, this.config.tickIntervalMs);
    };
    this.timer = setTimeout(loop, 0);
    logger.info("Scheduler started", {
      schedules: this.registry.list().map((s) => s.name),
      tickIntervalMs: this.config.tickIntervalMs,
    });
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      logger.info("Scheduler stopped");
    }
  }

  private tickSchedule(schedule: RegisteredSchedule, currentTime: Date): TickResult {
    const nowIso = currentTime.toISOString();
    let state = getScheduleState(schedule.name);

    if (!state || state.cron !== schedule.cron) {
      const first = nextOccurrenceAtOrAfter(schedule.fields, currentTime);
      if (!first) {
        throw new InvalidScheduleError(schedule.name, "recurrence never fires");
      }
      resetScheduleState(schedule.name, schedule.cron, first.toISOString(), nowIso);
      logger.info("Schedule initialized", {
        scheduleName: schedule.name,
        cron: schedule.cron,
        nextFireAt: first.toISOString(),
        reason: state ? "cron_changed" : "first_seen",
      });
      state = getScheduleState(schedule.name);
      if (!state) {
        throw new Error(`Schedule state for '${schedule.name}' was not persisted`);
      }
    }

    const dueFrom = new Date(state.next_fire_at);
    if (dueFrom.getTime() > currentTime.getTime()) {
      return { fired: [], skipped: [] };
    }

    // Slide a catch-up window over every missed occurrence
    const kept: Date[] = [];
    const skipped: SkippedOccurrence[] = [];
    let unlistedSkips = 0;
    let occurrence = nextOccurrenceAtOrAfter(schedule.fields, dueFrom);
    while (occurrence && occurrence.getTime() <= currentTime.getTime()) {
      kept.push(occurrence);
      const dropped = kept.length > this.config.catchUpOccurrences ? kept.shift() : undefined;
      if (dropped) {
        if (skipped.length < MAX_MISSED_OCCURRENCES_LISTED) {
          skipped.push({ scheduleName: schedule.name, scheduledFor: dropped.toISOString() });
        } else {
          unlistedSkips++;
        }
      }
      occurrence = nextOccurrence(schedule.fields, occurrence);
    }
    if (unlistedSkips > 0) {
      logger.warn("More missed occurrences skipped than listed", {
        scheduleName: schedule.name,
        unlistedSkips,
      });
    }

    const next = nextOccurrence(schedule.fields, currentTime);
    if (!next) {
      throw new InvalidScheduleError(schedule.name, "recurrence has no future occurrence");
    }
    const lastFiredAt = kept.length > 0 ? kept[kept.length - 1].toISOString() : nowIso;
    const expected = state.next_fire_at;

    const fireInTransaction = getDb().transaction((): FiredOccurrence[] | null => {
      const advanced = advanceScheduleState(
        schedule.name,
        expected,
        next.toISOString(),
        lastFiredAt,
        nowIso,
      );
      if (!advanced) {
        return null;
      }

      return kept.map((occurrence) => {
        const scheduledFor = occurrence.toISOString();
        const handle = this.queue.enqueue(schedule.target.taskKey, schedule.target.params, {
          scheduleName: schedule.name,
          scheduledFor,
        });
        return {
          scheduleName: schedule.name,
          taskKey: schedule.target.taskKey,
          scheduledFor,
          executionId: handle.executionId,
          accepted: handle.accepted,
        };
      });
    });

    const fired = fireInTransaction.immediate();
    if (fired === null) {
      logger.debug("Schedule already advanced by another tick", {
        scheduleName: schedule.name,
        expectedNextFireAt: expected,
      });
      return { fired: [], skipped: [] };
    }

    return { fired, skipped };
  }
}
