/**
 * Deactivate Stale Jobs Task
 *
 * Soft-deletes postings not re-fetched within the retention window.
 */

import { z } from "zod";
import type { Task, TaskContext, TaskCounters, TaskParams } from "@/types";
import { DEACTIVATE_STALE_JOBS_TASK_KEY } from "@/constants";
import { deactivateStale, retentionCutoff } from "@/ingestion";
import { parseTaskParams } from "./taskParams";

const deactivateParamsSchema = z
  .object({
    /** Overrides JOB_RETENTION_DAYS */
    retentionDays: z.number().int().positive().optional(),
  })
  .strict();

export const DeactivateStaleJobsTask: Task = {
  taskKey: DEACTIVATE_STALE_JOBS_TASK_KEY,
  name: "Deactivate Stale Jobs",

  async run(ctx: TaskContext, rawParams: TaskParams): Promise<TaskCounters> {
    const params = parseTaskParams(
      deactivateParamsSchema,
      DEACTIVATE_STALE_JOBS_TASK_KEY,
      rawParams,
    );
    const retentionDays = params.retentionDays ?? ctx.services.retentionDays;
    const now = ctx.now();
    const cutoff = retentionCutoff(now, retentionDays);

    const deactivated = deactivateStale(cutoff, now);

    ctx.logger.info("Stale postings deactivated", {
      retentionDays,
      cutoff: cutoff.toISOString(),
      deactivated,
    });

    return { deactivated, retention_days: retentionDays };
  },
};
