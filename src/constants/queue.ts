/**
 * Task queue / worker pool constants
 */

/**
 * Maximum length of error messages persisted on execution records
 */
export const EXECUTION_ERROR_MESSAGE_MAX_LENGTH = 500;

/**
 * Fraction of the lock TTL between refreshes of a held task lock
 */
export const TASK_LOCK_REFRESH_FRACTION = 0.25;

/**
 * Delay before a claimed execution whose lock is held elsewhere is offered
 * to workers again
 */
export const LOCK_CONTENTION_RETRY_MS = 1_000;
