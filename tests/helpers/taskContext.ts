/**
 * TaskContext builder for running tasks outside the worker pool
 */

import type { TaskContext, TaskServices } from "@/types";
import * as logger from "@/logger";

export function makeTaskContext(
  taskName: string,
  services: TaskServices,
  now: Date,
): TaskContext {
  return {
    executionId: 1,
    taskName,
    attempt: 1,
    logger: logger.withContext({ taskName }),
    now: () => now,
    services,
  };
}
