/**
 * Unit tests for HTTP client helpers
 */

import { describe, it, expect } from "vitest";
import { buildUrl, parseRetryAfter } from "@/clients/http/httpClient";

describe("buildUrl", () => {
  it("should append query params and drop undefined ones", () => {
    expect(
      buildUrl("https://api.example.com/search", {
        q: "data analyst",
        page: 2,
        location: undefined,
      }),
    ).toBe("https://api.example.com/search?q=data+analyst&page=2");
  });

  it("should repeat array params", () => {
    expect(buildUrl("https://api.example.com/search", { tag: ["a", "b"] })).toBe(
      "https://api.example.com/search?tag=a&tag=b",
    );
  });

  it("should leave the URL alone without params", () => {
    expect(buildUrl("https://api.example.com/search")).toBe("https://api.example.com/search");
  });
});

describe("parseRetryAfter", () => {
  const nowMs = Date.parse("2026-10-19T02:00:00.000Z");

  it("should read delay seconds", () => {
    expect(parseRetryAfter("120", nowMs)).toBe(120_000);
    expect(parseRetryAfter("0", nowMs)).toBeNull();
  });

  it("should read an HTTP date", () => {
    expect(parseRetryAfter("Mon, 19 Oct 2026 02:00:30 GMT", nowMs)).toBe(30_000);
    expect(parseRetryAfter("Mon, 19 Oct 2026 01:59:00 GMT", nowMs)).toBeNull();
  });

  it("should ignore missing or unreadable values", () => {
    expect(parseRetryAfter(null, nowMs)).toBeNull();
    expect(parseRetryAfter("soon", nowMs)).toBeNull();
  });
});
