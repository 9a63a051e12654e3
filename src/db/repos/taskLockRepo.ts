/**
 * Task lock repository
 *
 * TTL locks keyed by task name, shared by every worker process on the same
 * database. An expired lock can be taken over, so a crashed holder never
 * blocks its task forever.
 */

import type { TaskLockAcquireResult, TaskLockRow } from "@/types";
import { getDb } from "@/db";

function addSeconds(iso: string, seconds: number): string {
  return new Date(Date.parse(iso) + seconds * 1000).toISOString();
}

/**
 * Acquire a lock, taking it over if the current holder's lease expired
 *
 * Atomic across processes through INSERT ... ON CONFLICT: the conflict
 * update only applies when the stored lease is expired.
 */
export function acquireTaskLock(
  lockName: string,
  ownerId: string,
  now: string,
  ttlSeconds: number,
): TaskLockAcquireResult {
  const db = getDb();
  const expiresAt = addSeconds(now, ttlSeconds);

  const result = db
    .prepare<[string, string, string, string, string]>(
      `
      INSERT INTO task_locks (lock_name, owner_id, acquired_at, expires_at, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(lock_name) DO UPDATE SET
        owner_id = excluded.owner_id,
        acquired_at = excluded.acquired_at,
        expires_at = excluded.expires_at,
        updated_at = excluded.updated_at
      WHERE task_locks.expires_at <= excluded.acquired_at
    `,
    )
    .run(lockName, ownerId, now, expiresAt, now);

  if (result.changes > 0) {
    return { ok: true, expiresAt };
  }

  const holder = getTaskLock(lockName);
  return {
    ok: false,
    reason: "LOCKED",
    ownerId: holder?.owner_id ?? "unknown",
    expiresAt: holder?.expires_at ?? expiresAt,
  };
}

/**
 * Extend the lease of a lock this owner holds
 *
 * @returns false if the lock is no longer held by ownerId
 */
export function refreshTaskLock(
  lockName: string,
  ownerId: string,
  now: string,
  ttlSeconds: number,
): boolean {
  const db = getDb();
  const result = db
    .prepare<[string, string, string, string]>(
      `
      UPDATE task_locks
      SET expires_at = ?, updated_at = ?
      WHERE lock_name = ? AND owner_id = ?
    `,
    )
    .run(addSeconds(now, ttlSeconds), now, lockName, ownerId);

  return result.changes > 0;
}

/**
 * Release a lock this owner holds
 *
 * @returns false if the lock was not held by ownerId
 */
export function releaseTaskLock(lockName: string, ownerId: string): boolean {
  const db = getDb();
  const result = db
    .prepare<[string, string]>(
      "DELETE FROM task_locks WHERE lock_name = ? AND owner_id = ?",
    )
    .run(lockName, ownerId);

  return result.changes > 0;
}

export function getTaskLock(lockName: string): TaskLockRow | null {
  const db = getDb();
  const row = db
    .prepare<[string], TaskLockRow>("SELECT * FROM task_locks WHERE lock_name = ?")
    .get(lockName);
  return row ?? null;
}
