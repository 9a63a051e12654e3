/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/jobPostingsRepo";
export * from "./repos/taskExecutionsRepo";
export * from "./repos/taskLockRepo";
export * from "./repos/scheduleStateRepo";
