/**
 * Job source errors
 *
 * SourceUnavailableError is transient (network/HTTP failure, retried by the
 * worker pool). SourceFormatError means a payload arrived but could not be
 * understood; retrying would fetch the same payload, so it is not retried.
 */

import type { JobSource } from "@/types";
import { PAYLOAD_SAMPLE_MAX_LENGTH } from "@/constants/sources";

export class SourceUnavailableError extends Error {
  public readonly source: JobSource;
  /** HTTP status when the failure was an HTTP response */
  public readonly status?: number;

  constructor(
    source: JobSource,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(`${source} unavailable: ${message}`, { cause: options.cause });
    this.name = "SourceUnavailableError";
    this.source = source;
    this.status = options.status;
  }
}

export class SourceFormatError extends Error {
  public readonly source: JobSource;
  /** Truncated raw payload, for diagnosis */
  public readonly payloadSample: string;

  constructor(source: JobSource, message: string, payload: unknown) {
    super(`${source} returned an unparseable payload: ${message}`);
    this.name = "SourceFormatError";
    this.source = source;
    this.payloadSample = samplePayload(payload);
  }
}

/**
 * Serialize and truncate a payload for logs and error records
 */
export function samplePayload(payload: unknown): string {
  let text: string;
  if (typeof payload === "string") {
    text = payload;
  } else {
    try {
      text = JSON.stringify(payload) ?? String(payload);
    } catch {
      text = String(payload);
    }
  }
  return text.length > PAYLOAD_SAMPLE_MAX_LENGTH
    ? text.substring(0, PAYLOAD_SAMPLE_MAX_LENGTH) + "..."
    : text;
}
