/**
 * Unit tests for error classification and source failure wrapping
 */

import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  InvalidScheduleError,
  SourceFormatError,
  SourceUnavailableError,
  classifyError,
  getErrorCode,
  getErrorMessage,
  wrapSourceRequestFailure,
} from "@/errors";
import { HttpError } from "@/clients/http";

function httpError(status: number, statusText = "Error"): HttpError {
  return new HttpError({
    status,
    statusText,
    url: "https://api.example.com/search?api_key=test-key",
  });
}

describe("classifyError", () => {
  it("should treat configuration and payload errors as fatal", () => {
    expect(classifyError(new SourceFormatError("serpapi", "bad shape", {}))).toBe("FATAL");
    expect(classifyError(new ConfigurationError("missing key"))).toBe("FATAL");
    expect(classifyError(new InvalidScheduleError("nightly", "bad"))).toBe("FATAL");
  });

  it("should detect rate limits directly or wrapped", () => {
    expect(classifyError(httpError(429))).toBe("RATE_LIMIT");
    expect(
      classifyError(new SourceUnavailableError("careerjet", "HTTP 429", { status: 429 })),
    ).toBe("RATE_LIMIT");
  });

  it("should treat everything else as transient", () => {
    expect(classifyError(httpError(503))).toBe("TRANSIENT");
    expect(classifyError(new SourceUnavailableError("serpapi", "request timed out"))).toBe(
      "TRANSIENT",
    );
    expect(classifyError(new Error("socket hang up"))).toBe("TRANSIENT");
    expect(classifyError("boom")).toBe("TRANSIENT");
  });
});

describe("getErrorCode", () => {
  it("should use the error class name when it has one", () => {
    expect(getErrorCode(new SourceUnavailableError("serpapi", "down"))).toBe(
      "SourceUnavailableError",
    );
    expect(getErrorCode(new ConfigurationError("missing key"))).toBe("ConfigurationError");
  });

  it("should fall back to the classification", () => {
    expect(getErrorCode(new Error("plain"))).toBe("TRANSIENT");
    expect(getErrorCode("boom")).toBe("TRANSIENT");
  });
});

describe("getErrorMessage", () => {
  it("should truncate long messages", () => {
    expect(getErrorMessage(new Error("a".repeat(10)), 8)).toBe("aaaaa...");
    expect(getErrorMessage("short", 8)).toBe("short");
  });
});

describe("wrapSourceRequestFailure", () => {
  it("should map rejected credentials to a configuration error", () => {
    const wrapped = wrapSourceRequestFailure("serpapi", httpError(401, "Unauthorized"));

    expect(wrapped).toBeInstanceOf(ConfigurationError);
    expect(wrapped.message).toBe("serpapi rejected the configured credentials: HTTP 401");
  });

  it("should keep the status and drop the URL", () => {
    const wrapped = wrapSourceRequestFailure("careerjet", httpError(502, "Bad Gateway"));

    expect(wrapped).toBeInstanceOf(SourceUnavailableError);
    expect(wrapped.message).toBe("careerjet unavailable: HTTP 502 Bad Gateway");
    expect(wrapped instanceof SourceUnavailableError && wrapped.status).toBe(502);
  });

  it("should report timeouts", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";

    expect(wrapSourceRequestFailure("serpapi", abort).message).toBe(
      "serpapi unavailable: request timed out",
    );
  });

  it("should wrap network failures", () => {
    const wrapped = wrapSourceRequestFailure("serpapi", new TypeError("fetch failed"));
    expect(wrapped.message).toBe("serpapi unavailable: fetch failed");
    expect(wrapped.cause).toBeInstanceOf(TypeError);
  });
});
