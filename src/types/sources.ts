/**
 * Job source adapter type definitions
 */

import type { JobPostingCandidate, JobSource } from "./jobPosting";

/**
 * One (query, location) search against a source
 */
export type SourceQuery = {
  /** Free-text search, usually a job title or category */
  query: string;
  /** Free-text location (e.g., "Nairobi, Kenya"); null searches everywhere */
  location: string | null;
  /** Requested page size; adapters clamp to their own maximum */
  pageSize?: number;
};

/**
 * One page of normalized results
 */
export type SourcePage = {
  source: JobSource;
  candidates: JobPostingCandidate[];
  /** Continuation token for the next page; null marks end of results */
  nextPageToken: string | null;
};
