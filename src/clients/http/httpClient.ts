/**
 * HTTP client: JSON over native fetch
 * Supports timeouts, query params, retries with exponential backoff, and structured errors
 *
 * Responses are returned as `unknown`: every caller validates the payload
 * before trusting its shape.
 */

import type { HttpQueryValue, HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import { computeBackoffDelay, sleep } from "@/utils/backoff";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (arrays become repeated params, undefined is dropped)
 */
export function buildUrl(
  baseUrl: string,
  query?: Record<string, HttpQueryValue | undefined>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  }

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Check if an error is retryable
 * Returns true for network errors, timeouts, and retryable HTTP status codes
 */
function isErrorRetryable(error: unknown, method: string): boolean {
  // Only retry idempotent methods
  if (!RETRYABLE_HTTP_METHODS.has(method)) {
    return false;
  }

  if (error instanceof HttpError) {
    return RETRYABLE_STATUS_CODES.has(error.status);
  }

  // AbortError (timeout), TypeError (network failure from fetch)
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
export function parseRetryAfter(
  retryAfterHeader: string | null,
  nowMs: number = Date.now(),
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  if (/^\d+$/.test(retryAfterHeader.trim())) {
    const seconds = parseInt(retryAfterHeader, 10);
    return seconds > 0 ? seconds * 1000 : null;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - nowMs;
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
    };

    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(url, options);

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    if (response.status === 204) {
      return undefined;
    }

    const text = await response.text();
    const contentType = response.headers.get("content-type") ?? "";
    const isJson =
      contentType.includes("application/json") || contentType.includes("+json");

    if (!isJson) {
      logger.warn("Non-JSON response received", {
        method: req.method,
        url: req.url,
        status: response.status,
        contentType: contentType || "none",
      });
      return text;
    }

    try {
      return JSON.parse(text);
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url: req.url,
        status: response.status,
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      // Hand the raw text back; payload validation reports it with a sample
      return text;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * Retries are only performed for idempotent methods (GET, HEAD) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408, 429 (respects Retry-After), 5xx
 *
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors or timeouts (after all retries exhausted)
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxRetryAfterMs = req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await performRequest(req, url, timeoutMs);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !isErrorRetryable(error, req.method)) {
        break;
      }

      let retryAfterMs: number | null = null;
      if (error instanceof HttpError && (error.status === 429 || error.status === 503)) {
        retryAfterMs = parseRetryAfter(error.headers?.get("retry-after") ?? null);
      }

      const delayMs =
        retryAfterMs !== null
          ? Math.min(retryAfterMs, maxRetryAfterMs)
          : computeBackoffDelay(attempt, { baseDelayMs, maxDelayMs });

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError
            ? `status ${error.status}`
            : error instanceof Error
              ? error.name
              : "unknown",
      });

      await sleep(delayMs);
    }
  }

  throw lastError;
}
