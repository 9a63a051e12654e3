/**
 * Runner/orchestration type definitions
 */

/**
 * Error classification for task execution failures
 *
 * - RATE_LIMIT: HTTP 429 or provider-specific rate limit signals
 *   - Retried with backoff
 *
 * - TRANSIENT: Timeouts, 5xx errors, network failures, unavailable sources
 *   - Retried (may succeed on next attempt)
 *
 * - FATAL: Invalid config, missing credentials, unparseable payloads
 *   - Not retried (will fail again)
 */
export type ErrorClassification = "RATE_LIMIT" | "TRANSIENT" | "FATAL";

/**
 * Summary of a single-pass run (RUN_MODE=once or task)
 */
export type RunSummary = {
  enqueued: number;
  succeeded: number;
  failed: number;
  cancelled: number;
};
