/**
 * Task registry: single source of truth for registered tasks
 *
 * Schedules and manual enqueues refer to tasks by taskKey. The worker pool
 * resolves the key through a TaskRegistry at execution time.
 */

import type { Task } from "@/types";
import { FetchGlobalJobsTask, FetchRegionalJobsTask } from "./ingestJobsTask";
import { DeactivateStaleJobsTask } from "./deactivateStaleJobsTask";

export { createIngestJobsTask } from "./ingestJobsTask";
export type { IngestJobsParams } from "./ingestJobsTask";
export { parseTaskParams } from "./taskParams";

/**
 * All built-in tasks
 */
export const ALL_TASKS: Task[] = [
  FetchGlobalJobsTask,
  FetchRegionalJobsTask,
  DeactivateStaleJobsTask,
];

/**
 * Validate a task list
 *
 * Ensures:
 * - Task keys are non-empty and globally unique
 * - Every task has a run function
 *
 * @throws Error if validation fails
 */
export function validateTaskRegistry(tasks: Task[] = ALL_TASKS): void {
  const seenKeys = new Set<string>();

  for (const task of tasks) {
    if (!task.taskKey) {
      throw new Error("Task missing required field: taskKey");
    }

    if (typeof task.run !== "function") {
      throw new Error(`Task '${task.taskKey}' missing run function`);
    }

    if (seenKeys.has(task.taskKey)) {
      throw new Error(`Duplicate taskKey '${task.taskKey}'`);
    }
    seenKeys.add(task.taskKey);
  }
}

export class TaskRegistry {
  private readonly tasks: Map<string, Task>;

  constructor(tasks: Task[] = ALL_TASKS) {
    validateTaskRegistry(tasks);
    this.tasks = new Map(tasks.map((task) => [task.taskKey, task]));
  }

  has(taskKey: string): boolean {
    return this.tasks.has(taskKey);
  }

  /**
   * @returns The task if registered, null otherwise
   */
  find(taskKey: string): Task | null {
    return this.tasks.get(taskKey) ?? null;
  }

  keys(): string[] {
    return [...this.tasks.keys()];
  }
}

// Run validation at module load time
validateTaskRegistry();
