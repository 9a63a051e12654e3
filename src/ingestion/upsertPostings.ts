/**
 * Batch upsert of posting candidates
 *
 * Per-candidate failures are logged and counted; they never abort the batch.
 */

import type { JobPostingCandidate, UpsertPostingsResult } from "@/types";
import * as logger from "@/logger";
import type { PostingWriteFn } from "./postingPersistence";
import { persistPosting } from "./postingPersistence";

export type UpsertPostingsOptions = {
  /** Storage write (defaults to the job_postings repository) */
  write?: PostingWriteFn;
};

/**
 * Merge candidates into storage keyed by (source, externalId)
 *
 * Idempotent: upserting the same candidates twice leaves one row per
 * identity and reports them as updated the second time.
 */
export function upsertPostings(
  candidates: JobPostingCandidate[],
  now: string,
  options: UpsertPostingsOptions = {},
): UpsertPostingsResult {
  const result: UpsertPostingsResult = {
    processed: 0,
    inserted: 0,
    updated: 0,
    stale: 0,
    failed: 0,
  };

  for (const candidate of candidates) {
    result.processed++;
    try {
      const outcome = persistPosting(candidate, now, options.write);
      result[outcome]++;
    } catch (err) {
      result.failed++;
      logger.error("Failed to upsert posting", {
        source: candidate.source,
        externalId: candidate.externalId,
        error: err,
      });
    }
  }

  return result;
}
