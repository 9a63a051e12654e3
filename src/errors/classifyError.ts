/**
 * Error classification for retry decisions
 */

import type { ErrorClassification } from "@/types";
import { HttpError } from "@/clients/http/httpError";
import { SourceFormatError, SourceUnavailableError } from "./sourceErrors";
import { InvalidScheduleError } from "./scheduleErrors";
import { ConfigurationError } from "./configErrors";

/**
 * Classify an error raised by a task attempt
 *
 * - FATAL: SourceFormatError, InvalidScheduleError, ConfigurationError
 * - RATE_LIMIT: HTTP 429 (directly or wrapped in SourceUnavailableError)
 * - TRANSIENT: everything else, including unknown errors
 */
export function classifyError(error: unknown): ErrorClassification {
  if (
    error instanceof SourceFormatError ||
    error instanceof InvalidScheduleError ||
    error instanceof ConfigurationError
  ) {
    return "FATAL";
  }

  if (error instanceof HttpError) {
    return error.status === 429 ? "RATE_LIMIT" : "TRANSIENT";
  }

  if (error instanceof SourceUnavailableError) {
    return error.status === 429 ? "RATE_LIMIT" : "TRANSIENT";
  }

  return "TRANSIENT";
}

/**
 * Stable error code persisted on execution records
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof Error && error.name !== "Error") {
    return error.name;
  }
  return classifyError(error);
}

/**
 * Extract a short error message for persistence
 */
export function getErrorMessage(error: unknown, maxLength: number): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.length > maxLength
    ? message.substring(0, maxLength - 3) + "..."
    : message;
}
