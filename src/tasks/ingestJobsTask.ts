/**
 * Job ingestion tasks
 *
 * Each run crosses the configured sources with the target set's queries and
 * locations, paginates every pair and upserts the results. One bad pair never
 * stops the others:
 * - unparseable payload: logged with a sample, pair skipped
 * - missing credentials: source skipped for the rest of the run
 * - unavailable source: pair skipped now, whole task retried afterwards
 *
 * Consecutive searches are spaced by a random pause, longer after a 429.
 */

import { z } from "zod";
import type {
  JobSource,
  Task,
  TaskContext,
  TaskCounters,
  TaskParams,
} from "@/types";
import {
  DEFAULT_MAX_PAGES_PER_QUERY,
  FETCH_GLOBAL_JOBS_TASK_KEY,
  FETCH_REGIONAL_JOBS_TASK_KEY,
  INGEST_QUERY_JITTER_MAX_MS,
  INGEST_QUERY_JITTER_MIN_MS,
  INGEST_RATE_LIMIT_PAUSE_MS,
  JOB_SOURCES,
  MAX_PAGES_PER_QUERY_LIMIT,
} from "@/constants";
import {
  ConfigurationError,
  SourceFormatError,
  SourceUnavailableError,
} from "@/errors";
import {
  addUpsertResults,
  emptyUpsertResult,
  ingestSourceQuery,
} from "@/ingestion";
import { jitterDelay } from "@/utils";
import { parseTaskParams } from "./taskParams";

const ingestParamsSchema = z
  .object({
    targetSet: z.string().trim().min(1).optional(),
    sources: z.array(z.enum(JOB_SOURCES)).min(1).optional(),
    /** Overrides the target set's queries */
    queries: z.array(z.string().trim().min(1)).min(1).optional(),
    /** Overrides the target set's locations */
    locations: z.array(z.string().trim().min(1)).optional(),
    maxPages: z
      .number()
      .int()
      .positive()
      .max(MAX_PAGES_PER_QUERY_LIMIT)
      .default(DEFAULT_MAX_PAGES_PER_QUERY),
    pageSize: z.number().int().positive().optional(),
  })
  .strict();

export type IngestJobsParams = z.infer<typeof ingestParamsSchema>;

function pauseAfter(error: unknown): number {
  if (error instanceof SourceUnavailableError && error.status === 429) {
    return INGEST_RATE_LIMIT_PAUSE_MS;
  }
  return jitterDelay(INGEST_QUERY_JITTER_MIN_MS, INGEST_QUERY_JITTER_MAX_MS);
}

type IngestPlan = {
  sources: JobSource[];
  queries: string[];
  locations: Array<string | null>;
};

function planIngestion(
  ctx: TaskContext,
  taskKey: string,
  defaultTargetSet: string,
  params: IngestJobsParams,
): IngestPlan {
  const targetSetName = params.targetSet ?? defaultTargetSet;
  const targetSet = ctx.services.targets[targetSetName];

  const queries = params.queries ?? targetSet?.queries;
  if (!queries) {
    throw new ConfigurationError(`Unknown target set '${targetSetName}' for task '${taskKey}'`);
  }
  const locations = params.locations ?? targetSet?.locations ?? [];

  return {
    sources: params.sources ?? ctx.services.sources.list(),
    queries,
    locations: locations.length > 0 ? locations : [null],
  };
}

export function createIngestJobsTask(options: {
  taskKey: string;
  name: string;
  defaultTargetSet: string;
}): Task {
  const { taskKey, name, defaultTargetSet } = options;

  return {
    taskKey,
    name,

    async run(ctx: TaskContext, rawParams: TaskParams): Promise<TaskCounters> {
      const params = parseTaskParams(ingestParamsSchema, taskKey, rawParams);
      const plan = planIngestion(ctx, taskKey, defaultTargetSet, params);

      ctx.logger.info("Starting job ingestion", {
        sources: plan.sources,
        queries: plan.queries.length,
        locations: plan.locations.length,
        maxPages: params.maxPages,
      });

      const upsert = emptyUpsertResult();
      const misconfigured = new Set<JobSource>();
      let pairsTotal = 0;
      let pairsCompleted = 0;
      let pairsMalformed = 0;
      let pairsFailed = 0;
      let pagesFetched = 0;
      let lastUnavailable: { source: JobSource; error: unknown } | null = null;
      let pauseMs = 0;

      for (const source of plan.sources) {
        for (const query of plan.queries) {
          for (const location of plan.locations) {
            if (misconfigured.has(source)) {
              continue;
            }
            if (pauseMs > 0) {
              ctx.logger.debug("Pausing before next search", { pauseMs });
              await ctx.services.sleep(pauseMs);
            }
            pairsTotal++;

            const result = await ingestSourceQuery({
              sources: ctx.services.sources,
              source,
              query: { query, location, pageSize: params.pageSize },
              maxPages: params.maxPages,
              now: ctx.now,
              logger: ctx.logger,
            });

            pauseMs = pauseAfter(result.error);
            pagesFetched += result.pagesFetched;
            addUpsertResults(upsert, result.upsert);

            if (result.error === null) {
              pairsCompleted++;
            } else if (result.error instanceof SourceFormatError) {
              pairsMalformed++;
            } else if (result.error instanceof ConfigurationError) {
              misconfigured.add(source);
              ctx.logger.error("Source misconfigured, skipping it for this run", {
                source,
                error: result.error.message,
              });
            } else {
              pairsFailed++;
              lastUnavailable = { source, error: result.error };
            }
          }
        }
      }

      const counters: TaskCounters = {
        pairs_total: pairsTotal,
        pairs_completed: pairsCompleted,
        pairs_malformed: pairsMalformed,
        pairs_failed: pairsFailed,
        sources_misconfigured: misconfigured.size,
        pages_fetched: pagesFetched,
        postings_processed: upsert.processed,
        postings_inserted: upsert.inserted,
        postings_updated: upsert.updated,
        postings_stale: upsert.stale,
        postings_failed: upsert.failed,
      };

      ctx.logger.info("Job ingestion finished", counters);

      if (lastUnavailable) {
        const cause = lastUnavailable.error;
        throw new SourceUnavailableError(
          lastUnavailable.source,
          `${pairsFailed} of ${pairsTotal} queries failed`,
          {
            status: cause instanceof SourceUnavailableError ? cause.status : undefined,
            cause,
          },
        );
      }

      if (plan.sources.length > 0 && misconfigured.size === plan.sources.length) {
        throw new ConfigurationError("No configured source could be queried", [
          ...misconfigured,
        ]);
      }

      return counters;
    },
  };
}

export const FetchGlobalJobsTask = createIngestJobsTask({
  taskKey: FETCH_GLOBAL_JOBS_TASK_KEY,
  name: "Fetch Global Jobs",
  defaultTargetSet: "global",
});

export const FetchRegionalJobsTask = createIngestJobsTask({
  taskKey: FETCH_REGIONAL_JOBS_TASK_KEY,
  name: "Fetch Regional Jobs",
  defaultTargetSet: "regional",
});
