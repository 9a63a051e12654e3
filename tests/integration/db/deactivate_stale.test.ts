/**
 * Retention cleanup: postings not re-fetched within the window are
 * soft-deleted, recent ones are kept
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { makeCandidate } from "../../helpers/candidates";
import { countJobPostings, getJobPosting } from "@/db";
import { deactivateStale, persistPosting, retentionCutoff } from "@/ingestion";

const NOW = new Date("2026-10-19T00:00:00.000Z");

describe("deactivateStale", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should compute the retention cutoff", () => {
    expect(retentionCutoff(NOW, 30).toISOString()).toBe("2026-09-19T00:00:00.000Z");
  });

  it("should deactivate postings older than the window and keep recent ones", () => {
    harness = createTestDb();
    const seededAt = "2026-10-18T00:00:00.000Z";

    persistPosting(
      makeCandidate({ externalId: "old", fetchedAt: "2026-09-18T00:00:00.000Z" }),
      seededAt,
    );
    persistPosting(
      makeCandidate({ externalId: "recent", fetchedAt: "2026-10-18T00:00:00.000Z" }),
      seededAt,
    );

    const deactivated = deactivateStale(retentionCutoff(NOW, 30), NOW);

    expect(deactivated).toBe(1);
    expect(getJobPosting("serpapi", "old")).toMatchObject({
      is_active: 0,
      deactivated_at: "2026-10-19T00:00:00.000Z",
    });
    expect(getJobPosting("serpapi", "recent")).toMatchObject({
      is_active: 1,
      deactivated_at: null,
    });
    expect(countJobPostings()).toBe(2);
    expect(countJobPostings({ activeOnly: true })).toBe(1);
  });

  it("should not touch postings that are already inactive", () => {
    harness = createTestDb();
    persistPosting(
      makeCandidate({ fetchedAt: "2026-09-01T00:00:00.000Z" }),
      "2026-09-01T00:00:00.000Z",
    );

    expect(deactivateStale(retentionCutoff(NOW, 30), NOW)).toBe(1);
    expect(deactivateStale(retentionCutoff(NOW, 30), NOW)).toBe(0);
    expect(getJobPosting("serpapi", "job-1")?.deactivated_at).toBe(
      "2026-10-19T00:00:00.000Z",
    );
  });
});
