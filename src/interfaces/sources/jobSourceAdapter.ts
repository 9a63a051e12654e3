/**
 * JobSourceAdapter interface: provider-agnostic contract for job sources
 *
 * One call fetches one page of one (query, location) search and returns
 * normalized candidates. Adapters hold credentials and an HTTP function but
 * no state between calls, so they can be shared by concurrent tasks.
 */

import type { JobSource, SourcePage, SourceQuery } from "@/types";

export interface JobSourceAdapter {
  readonly source: JobSource;

  /**
   * Largest page size the provider accepts; larger requests are clamped
   */
  readonly maxPageSize: number;

  /**
   * Fetch one page of results
   *
   * @param pageToken - Continuation token from the previous page, or null
   *   for the first page
   * @throws {SourceUnavailableError} Network failure, timeout or non-2xx
   *   response (retryable)
   * @throws {SourceFormatError} Payload received but not understood
   * @throws {ConfigurationError} Missing or rejected credentials
   */
  fetchPage(query: SourceQuery, pageToken: string | null): Promise<SourcePage>;
}
