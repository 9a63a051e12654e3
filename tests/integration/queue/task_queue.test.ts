/**
 * TaskQueue enqueue and cancellation
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { TaskRegistry } from "@/tasks";
import { TaskQueue } from "@/queue";
import { ConfigurationError } from "@/errors";

const NOW = new Date("2026-10-19T02:00:00.000Z");

describe("TaskQueue", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  function createQueue(): TaskQueue {
    return new TaskQueue(
      new TaskRegistry([{ taskKey: "t", name: "T", run: async () => ({}) }]),
      () => NOW,
    );
  }

  it("should accept the first enqueue and coalesce the next", () => {
    harness = createTestDb();
    const queue = createQueue();

    const first = queue.enqueue("t", { a: 1 });
    const second = queue.enqueue("t", { a: 2 });

    expect(first).toEqual({ executionId: first.executionId, taskName: "t", accepted: true });
    expect(second).toEqual({ executionId: first.executionId, taskName: "t", accepted: false });
    expect(queue.getExecution(first.executionId)).toMatchObject({
      status: "pending",
      params_json: '{"a":1}',
      enqueued_at: NOW.toISOString(),
    });
  });

  it("should refuse an unknown task", () => {
    harness = createTestDb();
    expect(() => createQueue().enqueue("missing")).toThrow(ConfigurationError);
  });

  it("should cancel a pending execution and accept a new one", () => {
    harness = createTestDb();
    const queue = createQueue();

    const first = queue.enqueue("t");
    expect(queue.requestCancellation(first.executionId)?.status).toBe("cancelled");

    const next = queue.enqueue("t");
    expect(next.accepted).toBe(true);
    expect(next.executionId).not.toBe(first.executionId);
    expect(queue.requestCancellation(12345)).toBeNull();
  });
});
