/**
 * Ingestion task constants
 */

/**
 * Default number of pages fetched per (source, query, location) when the
 * schedule does not say otherwise
 */
export const DEFAULT_MAX_PAGES_PER_QUERY = 2;

/**
 * Hard cap on pages per (source, query, location), whatever the schedule says
 */
export const MAX_PAGES_PER_QUERY_LIMIT = 10;

/**
 * Task keys of the built-in tasks
 */
export const FETCH_GLOBAL_JOBS_TASK_KEY = "fetch-global-jobs";
export const FETCH_REGIONAL_JOBS_TASK_KEY = "fetch-regional-jobs";
export const DEACTIVATE_STALE_JOBS_TASK_KEY = "deactivate-stale-jobs";

/**
 * Random pause between two (source, query, location) searches
 */
export const INGEST_QUERY_JITTER_MIN_MS = 15_000;
export const INGEST_QUERY_JITTER_MAX_MS = 25_000;

/**
 * Pause after a search the provider rate-limited (HTTP 429)
 */
export const INGEST_RATE_LIMIT_PAUSE_MS = 60_000;
