/**
 * Posting persistence: candidate to job_postings row
 */

import type {
  JobPostingCandidate,
  JobPostingWriteParams,
  UpsertOutcome,
} from "@/types";
import { upsertJobPosting } from "@/db";
import { DuplicateKeyRace } from "@/errors";
import * as logger from "@/logger";

export type PostingWriteFn = (
  params: JobPostingWriteParams,
  now: string,
) => { outcome: UpsertOutcome };

export function toWriteParams(candidate: JobPostingCandidate): JobPostingWriteParams {
  return {
    source: candidate.source,
    external_id: candidate.externalId,
    title: candidate.title,
    company: candidate.company,
    location: candidate.location,
    salary_min: candidate.salary?.min ?? null,
    salary_max: candidate.salary?.max ?? null,
    salary_currency: candidate.salary?.currency ?? null,
    salary_text: candidate.salary?.text ?? null,
    employment_type: candidate.employmentType,
    description: candidate.description,
    url: candidate.url,
    is_active: candidate.isActive ? 1 : 0,
    fetched_at: candidate.fetchedAt,
  };
}

/**
 * Upsert one candidate, retrying once if it lost a duplicate-key race
 *
 * @throws Whatever the second attempt throws, or any non-race error
 */
export function persistPosting(
  candidate: JobPostingCandidate,
  now: string,
  write: PostingWriteFn = upsertJobPosting,
): UpsertOutcome {
  const params = toWriteParams(candidate);

  try {
    return write(params, now).outcome;
  } catch (err) {
    if (!(err instanceof DuplicateKeyRace)) {
      throw err;
    }
    logger.debug("Duplicate key race, retrying upsert", {
      identityKey: err.identityKey,
    });
    return write(params, now).outcome;
  }
}
