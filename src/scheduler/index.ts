export {
  parseCronExpression,
  nextOccurrence,
  nextOccurrenceAtOrAfter,
  matchesCron,
  CronParseError,
} from "./cronExpression";
export { ScheduleRegistry } from "./scheduleRegistry";
export type { RegisteredSchedule } from "./scheduleRegistry";
export { Scheduler } from "./scheduler";
export type { SchedulerDeps } from "./scheduler";
