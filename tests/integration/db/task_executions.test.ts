/**
 * Task execution records: in-flight coalescing, occurrence dedupe, claiming,
 * cancellation and recovery
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import {
  acquireTaskLock,
  claimNextPendingExecution,
  countExecutionsByStatus,
  finishExecution,
  getExecution,
  insertPendingExecution,
  isCancellationRequested,
  recoverAbandonedExecutions,
  releaseClaim,
  requestExecutionCancellation,
} from "@/db";

const T0 = "2026-10-19T02:00:00.000Z";
const T1 = "2026-10-19T02:01:00.000Z";

describe("task executions", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should coalesce a second enqueue while the first is in flight", () => {
    harness = createTestDb();

    const first = insertPendingExecution({
      taskName: "fetch-global-jobs",
      params: { maxPages: 1 },
      now: T0,
    });
    const second = insertPendingExecution({
      taskName: "fetch-global-jobs",
      params: { maxPages: 2 },
      now: T1,
    });

    expect(first.status).toBe("created");
    expect(first.execution.params_json).toBe('{"maxPages":1}');
    expect(second.status).toBe("in_flight");
    expect(second.execution.id).toBe(first.execution.id);
    expect(countExecutionsByStatus("pending")).toBe(1);
  });

  it("should accept a new execution once the previous one finished", () => {
    harness = createTestDb();

    const first = insertPendingExecution({ taskName: "t", params: {}, now: T0 });
    claimNextPendingExecution("worker-a", T0);
    finishExecution(first.execution.id, { status: "succeeded", attempts: 1, now: T1 });

    const second = insertPendingExecution({ taskName: "t", params: {}, now: T1 });
    expect(second.status).toBe("created");
    expect(second.execution.id).not.toBe(first.execution.id);
  });

  it("should record each schedule occurrence at most once", () => {
    harness = createTestDb();

    const first = insertPendingExecution({
      taskName: "t",
      params: {},
      scheduleName: "nightly",
      scheduledFor: T0,
      now: T0,
    });
    claimNextPendingExecution("worker-a", T0);
    finishExecution(first.execution.id, { status: "succeeded", attempts: 1, now: T1 });

    const again = insertPendingExecution({
      taskName: "t",
      params: {},
      scheduleName: "nightly",
      scheduledFor: T0,
      now: T1,
    });

    expect(again.status).toBe("duplicate_occurrence");
    expect(again.execution.id).toBe(first.execution.id);
  });

  it("should claim pending executions oldest first", () => {
    harness = createTestDb();

    const a = insertPendingExecution({ taskName: "a", params: {}, now: T0 });
    const b = insertPendingExecution({ taskName: "b", params: {}, now: T0 });

    const claimed = claimNextPendingExecution("worker-1", T1);
    expect(claimed?.id).toBe(a.execution.id);
    expect(claimed).toMatchObject({ status: "running", worker_id: "worker-1", started_at: T1 });

    expect(claimNextPendingExecution("worker-2", T1)?.id).toBe(b.execution.id);
    expect(claimNextPendingExecution("worker-3", T1)).toBeNull();
  });

  it("should return a released claim to the queue", () => {
    harness = createTestDb();

    const created = insertPendingExecution({ taskName: "a", params: {}, now: T0 });
    const claimed = claimNextPendingExecution("worker-1", T0);
    releaseClaim(created.execution.id);

    expect(getExecution(created.execution.id)).toMatchObject({
      status: "pending",
      worker_id: null,
    });
    expect(claimNextPendingExecution("worker-2", T1)?.id).toBe(claimed?.id);
  });

  it("should cancel a pending execution immediately", () => {
    harness = createTestDb();

    const created = insertPendingExecution({ taskName: "a", params: {}, now: T0 });
    const cancelled = requestExecutionCancellation(created.execution.id, T1);

    expect(cancelled).toMatchObject({ status: "cancelled", finished_at: T1, cancel_requested: 1 });
    expect(claimNextPendingExecution("worker-1", T1)).toBeNull();
    expect(insertPendingExecution({ taskName: "a", params: {}, now: T1 }).status).toBe("created");
  });

  it("should flag a running execution for cancellation", () => {
    harness = createTestDb();

    const created = insertPendingExecution({ taskName: "a", params: {}, now: T0 });
    claimNextPendingExecution("worker-1", T0);

    const flagged = requestExecutionCancellation(created.execution.id, T1);
    expect(flagged).toMatchObject({ status: "running", cancel_requested: 1 });
    expect(isCancellationRequested(created.execution.id)).toBe(true);
    expect(requestExecutionCancellation(9999, T1)).toBeNull();
  });

  it("should ignore finish calls for executions that are not running", () => {
    harness = createTestDb();

    const created = insertPendingExecution({ taskName: "a", params: {}, now: T0 });
    requestExecutionCancellation(created.execution.id, T0);
    finishExecution(created.execution.id, { status: "succeeded", attempts: 1, now: T1 });

    expect(getExecution(created.execution.id)?.status).toBe("cancelled");
  });

  it("should recover running executions whose lock is gone or expired", () => {
    harness = createTestDb();

    const orphan = insertPendingExecution({ taskName: "orphan", params: {}, now: T0 });
    const held = insertPendingExecution({ taskName: "held", params: {}, now: T0 });
    claimNextPendingExecution("worker-dead", T0);
    claimNextPendingExecution("worker-alive", T0);
    acquireTaskLock("held", "worker-alive", T0, 3600);

    expect(recoverAbandonedExecutions(T1)).toEqual([orphan.execution.id]);
    expect(getExecution(orphan.execution.id)?.status).toBe("pending");
    expect(getExecution(held.execution.id)?.status).toBe("running");

    // Once the lease has run out the held execution is recovered too
    expect(recoverAbandonedExecutions("2026-10-19T03:00:00.000Z")).toEqual([
      held.execution.id,
    ]);
  });
});
