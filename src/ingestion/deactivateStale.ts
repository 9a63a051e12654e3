/**
 * Retention cleanup for job postings
 */

import { deactivateStalePostings } from "@/db";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Cutoff for a retention window: postings fetched before it are stale
 */
export function retentionCutoff(now: Date, retentionDays: number): Date {
  return new Date(now.getTime() - retentionDays * DAY_MS);
}

/**
 * Soft-delete active postings whose fetched_at is before olderThan
 *
 * @returns Number of postings deactivated
 */
export function deactivateStale(olderThan: Date, now: Date = new Date()): number {
  return deactivateStalePostings(olderThan.toISOString(), now.toISOString());
}
