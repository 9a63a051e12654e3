/**
 * SerpApi adapter against the mock HTTP harness
 *
 * No network: every request goes through createMockHttp().
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createMockHttp, loadFixture, type MockHttp } from "../../helpers/mockHttp";
import { SerpApiAdapter } from "@/clients/serpapi";
import { SERPAPI_SEARCH_URL } from "@/constants";
import {
  ConfigurationError,
  SourceFormatError,
  SourceUnavailableError,
} from "@/errors";

const NOW = new Date("2026-10-19T02:00:00.000Z");
const QUERY = { query: "Software Engineer", location: "Nairobi, Kenya" };

describe("SerpApiAdapter (offline)", () => {
  let mock: MockHttp;
  let adapter: SerpApiAdapter;

  beforeEach(() => {
    mock = createMockHttp();
    adapter = new SerpApiAdapter({
      apiKey: "test-key",
      httpRequest: mock.request,
      now: () => NOW,
    });
  });

  it("should map the first page and return its continuation token", async () => {
    mock.on("GET", SERPAPI_SEARCH_URL, loadFixture("serpapi/page1.json"));

    const page = await adapter.fetchPage(QUERY, null);

    expect(page.source).toBe("serpapi");
    expect(page.candidates.map((c) => c.externalId)).toEqual([
      "fixture-job-001",
      "fixture-job-002",
    ]);
    expect(page.candidates[0].fetchedAt).toBe("2026-10-19T02:00:00.000Z");
    expect(page.nextPageToken).toBe("fixture-token-2");

    const [request] = mock.getRecordedRequests();
    expect(request.query).toMatchObject({
      engine: "google_jobs",
      q: "Software Engineer",
      location: "Nairobi, Kenya",
      hl: "en",
      gl: "ke",
      api_key: "test-key",
    });
    expect(request.query?.next_page_token).toBeUndefined();
  });

  it("should follow the continuation token to the last page", async () => {
    mock.onCustom("GET", SERPAPI_SEARCH_URL, (req) => ({
      status: 200,
      body:
        req.query?.next_page_token === "fixture-token-2"
          ? loadFixture("serpapi/page2.json")
          : loadFixture("serpapi/page1.json"),
    }));

    const first = await adapter.fetchPage(QUERY, null);
    const second = await adapter.fetchPage(QUERY, first.nextPageToken);

    expect(second.candidates.map((c) => c.externalId)).toEqual(["fixture-job-003"]);
    expect(second.nextPageToken).toBeNull();
    expect(mock.getRecordedRequests()[1].query?.next_page_token).toBe("fixture-token-2");
  });

  it("should treat the provider's no-results error as an empty last page", async () => {
    mock.on("GET", SERPAPI_SEARCH_URL, {
      error: "Google hasn't returned any results for this query.",
    });

    expect(await adapter.fetchPage(QUERY, null)).toEqual({
      source: "serpapi",
      candidates: [],
      nextPageToken: null,
    });
  });

  it("should end pagination when a page has no results", async () => {
    mock.on("GET", SERPAPI_SEARCH_URL, {
      jobs_results: [],
      serpapi_pagination: { next_page_token: "dangling" },
    });

    expect((await adapter.fetchPage(QUERY, null)).nextPageToken).toBeNull();
  });

  it("should reject a payload that does not match the schema", async () => {
    mock.on("GET", SERPAPI_SEARCH_URL, { jobs_results: [{ title: "No id" }] });

    const failure = adapter.fetchPage(QUERY, null);
    await expect(failure).rejects.toBeInstanceOf(SourceFormatError);
    await expect(failure).rejects.toThrow("jobs_results.0.job_id: Required");
  });

  it("should reject any other provider error", async () => {
    mock.on("GET", SERPAPI_SEARCH_URL, { error: "Unsupported location." });

    await expect(adapter.fetchPage(QUERY, null)).rejects.toThrow(
      "serpapi returned an unparseable payload: provider error: Unsupported location.",
    );
  });

  it("should report HTTP failures as unavailable without leaking the key", async () => {
    mock.onResponse("GET", SERPAPI_SEARCH_URL, { status: 503, body: "busy" });

    const error = await adapter.fetchPage(QUERY, null).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error instanceof SourceUnavailableError && error.status).toBe(503);
    expect(error instanceof Error && error.message).toBe(
      "serpapi unavailable: HTTP 503 Mock Response",
    );
  });

  it("should report rejected credentials as a configuration error", async () => {
    mock.onResponse("GET", SERPAPI_SEARCH_URL, { status: 401, body: { error: "Invalid key" } });

    await expect(adapter.fetchPage(QUERY, null)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("should refuse to run without an API key", async () => {
    const unconfigured = new SerpApiAdapter({ httpRequest: mock.request });

    await expect(unconfigured.fetchPage(QUERY, null)).rejects.toThrow(
      "SerpApi key is not configured: SERPAPI_KEY: Required",
    );
    expect(mock.getRecordedRequests()).toEqual([]);
  });
});
