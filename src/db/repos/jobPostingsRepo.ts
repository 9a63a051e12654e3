/**
 * Job postings repository
 *
 * Data access for the job_postings table. Identity is (source, external_id).
 */

import type {
  JobPostingRow,
  JobPostingWriteParams,
  JobSource,
  UpsertOutcome,
} from "@/types";
import { getDb } from "@/db";
import { DuplicateKeyRace, isUniqueConstraintError } from "@/errors";

type UpsertStatementParams = JobPostingWriteParams & {
  now: string;
  deactivated_at: string | null;
};

export type UpsertJobPostingResult = {
  outcome: UpsertOutcome;
  /** Row as stored after the write (the newer row when outcome is "stale") */
  row: JobPostingRow;
};

/**
 * Insert or update a posting by (source, external_id)
 *
 * Runs in an IMMEDIATE transaction so the existence check and the write see
 * the same state. Writes whose fetched_at is older than the stored one are
 * ignored (later write wins); id and created_at are never touched.
 *
 * @throws DuplicateKeyRace if the unique index rejects the write anyway
 */
export function upsertJobPosting(
  params: JobPostingWriteParams,
  now: string,
): UpsertJobPostingResult {
  const db = getDb();

  const selectExisting = db.prepare<[string, string], JobPostingRow>(
    "SELECT * FROM job_postings WHERE source = ? AND external_id = ?",
  );

  const upsert = db.prepare<UpsertStatementParams, JobPostingRow>(`
    INSERT INTO job_postings (
      source, external_id, title, company, location,
      salary_min, salary_max, salary_currency, salary_text,
      employment_type, description, url, is_active,
      fetched_at, created_at, updated_at, deactivated_at
    ) VALUES (
      @source, @external_id, @title, @company, @location,
      @salary_min, @salary_max, @salary_currency, @salary_text,
      @employment_type, @description, @url, @is_active,
      @fetched_at, @now, @now, @deactivated_at
    )
    ON CONFLICT(source, external_id) DO UPDATE SET
      title = excluded.title,
      company = excluded.company,
      location = excluded.location,
      salary_min = excluded.salary_min,
      salary_max = excluded.salary_max,
      salary_currency = excluded.salary_currency,
      salary_text = excluded.salary_text,
      employment_type = excluded.employment_type,
      description = excluded.description,
      url = excluded.url,
      is_active = excluded.is_active,
      fetched_at = excluded.fetched_at,
      updated_at = excluded.updated_at,
      deactivated_at = CASE
        WHEN excluded.is_active = 1 THEN NULL
        ELSE COALESCE(job_postings.deactivated_at, excluded.updated_at)
      END
    WHERE excluded.fetched_at >= job_postings.fetched_at
    RETURNING *
  `);

  const run = db.transaction((): UpsertJobPostingResult => {
    const existing = selectExisting.get(params.source, params.external_id);

    const written = upsert.get({
      ...params,
      now,
      deactivated_at: params.is_active === 1 ? null : now,
    });

    if (written) {
      return { outcome: existing ? "updated" : "inserted", row: written };
    }

    // Conflict update skipped by the fetched_at guard
    if (!existing) {
      throw new Error(
        `Upsert of ${params.source}:${params.external_id} wrote nothing and no row exists`,
      );
    }
    return { outcome: "stale", row: existing };
  });

  try {
    return run.immediate();
  } catch (err) {
    if (isUniqueConstraintError(err)) {
      throw new DuplicateKeyRace(`${params.source}:${params.external_id}`, {
        cause: err,
      });
    }
    throw err;
  }
}

export function getJobPosting(
  source: JobSource,
  externalId: string,
): JobPostingRow | null {
  const db = getDb();
  const row = db
    .prepare<[string, string], JobPostingRow>(
      "SELECT * FROM job_postings WHERE source = ? AND external_id = ?",
    )
    .get(source, externalId);

  return row ?? null;
}

export function countJobPostings(options: { activeOnly?: boolean } = {}): number {
  const db = getDb();
  const sql = options.activeOnly
    ? "SELECT COUNT(*) AS count FROM job_postings WHERE is_active = 1"
    : "SELECT COUNT(*) AS count FROM job_postings";
  const row = db.prepare<[], { count: number }>(sql).get();
  return row?.count ?? 0;
}

/**
 * Soft-delete active postings last fetched before a cutoff
 *
 * @param olderThan - ISO cutoff; postings with fetched_at strictly before it
 *   are deactivated
 * @returns Number of postings deactivated
 */
export function deactivateStalePostings(olderThan: string, now: string): number {
  const db = getDb();
  const result = db
    .prepare<[string, string, string]>(
      `
      UPDATE job_postings
      SET is_active = 0,
          deactivated_at = ?,
          updated_at = ?
      WHERE is_active = 1
        AND fetched_at < ?
    `,
    )
    .run(now, now, olderThan);

  return result.changes;
}
