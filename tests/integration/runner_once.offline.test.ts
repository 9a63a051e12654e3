/**
 * Runner single-pass and single-task modes, wired from environment and
 * config files, with sources mocked
 */

import { rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { describe, it, expect, afterEach, beforeEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../helpers/testDb";
import { createMockHttp, loadFixture, type MockHttp } from "../helpers/mockHttp";
import { loadEnv } from "@/config";
import { bootstrap, runMode, runOnce, runTaskNow } from "@/orchestration/runner";
import { CAREERJET_SEARCH_URL, SERPAPI_SEARCH_URL } from "@/constants";
import { countJobPostings, getDb, getScheduleState, listExecutions } from "@/db";
import { ConfigurationError } from "@/errors";

const NOW = new Date("2026-10-19T02:00:00.000Z");

describe("runner (offline)", () => {
  let harness: TestDbHarness | null = null;
  let mock: MockHttp;

  beforeEach(() => {
    mock = createMockHttp();
    mock.on("GET", SERPAPI_SEARCH_URL, loadFixture("serpapi/page1.json"));
    mock.on("GET", CAREERJET_SEARCH_URL, loadFixture("careerjet/jobs.json"));
  });

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  function createApp() {
    harness = createTestDb();
    const env = loadEnv({
      DB_PATH: harness.dbPath,
      RUN_MODE: "once",
      WORKER_CONCURRENCY: "1",
      SERPAPI_KEY: "test-key",
      CAREERJET_AFFID: "test-affid",
      SCHEDULES_FILE: "tests/fixtures/config/schedules.json",
      TARGETS_FILE: "tests/fixtures/config/targets.json",
    });
    return bootstrap(env, {
      httpRequest: mock.request,
      now: () => NOW,
      sleep: async () => undefined,
    });
  }

  it("should fire due schedules and run them in one pass", async () => {
    const app = createApp();

    const summary = await runOnce(app, NOW);

    expect(summary).toEqual({ enqueued: 1, succeeded: 1, failed: 0, cancelled: 0 });
    expect(countJobPostings()).toBe(4);
    expect(getScheduleState("global-nightly")?.next_fire_at).toBe("2026-10-20T02:00:00.000Z");
    // 2026-10-19 is a Monday; the weekly cleanup waits for Sunday
    expect(getScheduleState("cleanup-weekly")?.next_fire_at).toBe("2026-10-25T03:00:00.000Z");
  });

  it("should do nothing on a second pass for the same time", async () => {
    const app = createApp();

    await runOnce(app, NOW);
    const again = await runOnce(app, NOW);

    expect(again).toEqual({ enqueued: 0, succeeded: 0, failed: 0, cancelled: 0 });
    expect(listExecutions()).toHaveLength(1);
  });

  it("should run a task on demand with its schedule's params", async () => {
    const app = createApp();

    const summary = await runTaskNow(app, "fetch-global-jobs");

    expect(summary).toEqual({ enqueued: 1, succeeded: 1, failed: 0, cancelled: 0 });
    const [execution] = listExecutions("fetch-global-jobs");
    expect(execution.params_json).toBe('{"maxPages":1}');
    expect(execution.schedule_name).toBeNull();
  });

  it("should count a failed execution in the summary", async () => {
    const app = createApp();
    mock.reset();
    mock.onResponse("GET", SERPAPI_SEARCH_URL, { status: 401, body: "denied" });
    mock.onResponse("GET", CAREERJET_SEARCH_URL, { status: 403, body: "denied" });

    const summary = await runOnce(app, NOW);

    expect(summary).toEqual({ enqueued: 1, succeeded: 0, failed: 1, cancelled: 0 });
    expect(listExecutions("fetch-global-jobs")[0]).toMatchObject({
      status: "failed",
      attempts: 1,
      error_code: "ConfigurationError",
    });
  });

  it("should close the database when bootstrap fails", async () => {
    const dbPath = join(tmpdir(), `runner-bootstrap-${Date.now()}.db`);
    const env = loadEnv({
      DB_PATH: dbPath,
      RUN_MODE: "once",
      SCHEDULES_FILE: "tests/fixtures/config/broken.json",
      TARGETS_FILE: "tests/fixtures/config/targets.json",
    });

    try {
      await expect(runMode(env)).rejects.toBeInstanceOf(ConfigurationError);
      expect(() => getDb()).toThrow("Database not opened");
    } finally {
      for (const suffix of ["", "-wal", "-shm"]) {
        rmSync(dbPath + suffix, { force: true });
      }
    }
  });
});
