/**
 * Task queue: durable enqueue of task executions
 */

import type {
  EnqueueOptions,
  TaskExecutionRecord,
  TaskHandle,
  TaskParams,
} from "@/types";
import type { TaskRegistry } from "@/tasks";
import {
  getExecution,
  insertPendingExecution,
  requestExecutionCancellation,
} from "@/db";
import { ConfigurationError } from "@/errors";
import * as logger from "@/logger";

export class TaskQueue {
  constructor(
    private readonly tasks: TaskRegistry,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Enqueue a task execution
   *
   * At most one execution per task name is in flight. When one already is,
   * nothing is inserted and the handle points at the in-flight execution
   * with accepted = false. The same happens when a schedule occurrence was
   * already enqueued.
   *
   * @throws {ConfigurationError} Unknown task name
   */
  enqueue(
    taskName: string,
    params: TaskParams = {},
    options: EnqueueOptions = {},
  ): TaskHandle {
    if (!this.tasks.has(taskName)) {
      throw new ConfigurationError(`Unknown task '${taskName}'`);
    }

    const result = insertPendingExecution({
      taskName,
      params,
      scheduleName: options.scheduleName,
      scheduledFor: options.scheduledFor,
      now: this.now().toISOString(),
    });

    if (result.status === "created") {
      logger.debug("Task enqueued", {
        taskName,
        executionId: result.execution.id,
        scheduleName: options.scheduleName,
        scheduledFor: options.scheduledFor,
      });
      return { executionId: result.execution.id, taskName, accepted: true };
    }

    logger.info("Enqueue coalesced", {
      taskName,
      reason: result.status,
      executionId: result.execution.id,
      executionStatus: result.execution.status,
    });
    return { executionId: result.execution.id, taskName, accepted: false };
  }

  /**
   * Cancel a pending execution now, or flag a running one so its worker
   * stops before the next attempt
   *
   * @returns The execution after the request, or null if unknown
   */
  requestCancellation(executionId: number): TaskExecutionRecord | null {
    const execution = requestExecutionCancellation(
      executionId,
      this.now().toISOString(),
    );
    if (execution) {
      logger.info("Cancellation requested", {
        executionId,
        taskName: execution.task_name,
        status: execution.status,
      });
    }
    return execution;
  }

  getExecution(executionId: number): TaskExecutionRecord | null {
    return getExecution(executionId);
  }
}
