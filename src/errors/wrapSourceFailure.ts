/**
 * Translate a failed provider request into the source error taxonomy
 */

import type { JobSource } from "@/types";
import { HttpError } from "@/clients/http/httpError";
import { ConfigurationError } from "./configErrors";
import { SourceUnavailableError } from "./sourceErrors";

/**
 * - 401/403: credentials rejected → ConfigurationError (not retried)
 * - other HTTP status, timeout, network failure → SourceUnavailableError
 *
 * Messages never include the request URL, which may carry an API key.
 */
export function wrapSourceRequestFailure(source: JobSource, error: unknown): Error {
  if (error instanceof HttpError) {
    if (error.status === 401 || error.status === 403) {
      return new ConfigurationError(`${source} rejected the configured credentials`, [
        `HTTP ${error.status}`,
      ]);
    }
    return new SourceUnavailableError(
      source,
      `HTTP ${error.status}${error.statusText ? ` ${error.statusText}` : ""}`,
      { status: error.status, cause: error },
    );
  }

  if (error instanceof Error) {
    const reason = error.name === "AbortError" ? "request timed out" : error.message;
    return new SourceUnavailableError(source, reason, { cause: error });
  }

  return new SourceUnavailableError(source, String(error), { cause: error });
}
