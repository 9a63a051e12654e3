/**
 * Task lock type definitions
 */

/**
 * Lock acquisition result
 */
export type TaskLockAcquireResult =
  | { ok: true; expiresAt: string }
  | { ok: false; reason: "LOCKED"; ownerId: string; expiresAt: string };
