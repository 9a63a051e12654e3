/**
 * Scheduler constants
 */

/**
 * Upper bound on minutes scanned when searching for the next cron match.
 * Covers more than four years, enough for "0 0 29 2 *".
 */
export const CRON_SEARCH_LIMIT_MINUTES = 60 * 24 * 366 * 5;

/**
 * Upper bound on skipped occurrences listed in one tick result after
 * downtime. Further skips are only counted in the log.
 */
export const MAX_MISSED_OCCURRENCES_LISTED = 1_000;
