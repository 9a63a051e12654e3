/**
 * SerpApiAdapter: Google Jobs results through SerpApi
 *
 * Continuation uses SerpApi's next_page_token. Page size is fixed by the
 * engine.
 */

import type { JobSourceAdapter } from "@/interfaces";
import type { HttpRequestFn, SourcePage, SourceQuery } from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  HTTP_USER_AGENT,
  SERPAPI_DEFAULT_LANGUAGE,
  SERPAPI_ENGINE,
  SERPAPI_HTTP_MAX_ATTEMPTS,
  SERPAPI_HTTP_TIMEOUT_MS,
  SERPAPI_NO_RESULTS_ERROR_FRAGMENT,
  SERPAPI_PAGE_SIZE,
  SERPAPI_SEARCH_URL,
} from "@/constants";
import {
  ConfigurationError,
  SourceFormatError,
  wrapSourceRequestFailure,
} from "@/errors";
import { formatZodIssues } from "@/utils";
import * as logger from "@/logger";
import { countryCodeForLocation, mapSerpApiJob } from "./mappers";
import { serpApiResponseSchema } from "./schema";

export interface SerpApiAdapterConfig {
  apiKey?: string;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
  /** Clock used to stamp fetchedAt on candidates */
  now?: () => Date;
}

export class SerpApiAdapter implements JobSourceAdapter {
  readonly source = "serpapi" as const;
  readonly maxPageSize = SERPAPI_PAGE_SIZE;
  private readonly apiKey: string | undefined;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => Date;

  constructor(config: SerpApiAdapterConfig = {}) {
    this.apiKey = config.apiKey;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.now = config.now ?? (() => new Date());
  }

  async fetchPage(query: SourceQuery, pageToken: string | null): Promise<SourcePage> {
    if (!this.apiKey) {
      throw new ConfigurationError("SerpApi key is not configured", [
        "SERPAPI_KEY: Required",
      ]);
    }

    logger.debug("Fetching SerpApi page", {
      query: query.query,
      location: query.location,
      continued: pageToken !== null,
    });

    let payload: unknown;
    try {
      payload = await this.httpRequest({
        method: "GET",
        url: SERPAPI_SEARCH_URL,
        headers: { "User-Agent": HTTP_USER_AGENT },
        query: {
          engine: SERPAPI_ENGINE,
          q: query.query,
          location: query.location ?? undefined,
          hl: SERPAPI_DEFAULT_LANGUAGE,
          gl: countryCodeForLocation(query.location),
          next_page_token: pageToken ?? undefined,
          api_key: this.apiKey,
        },
        timeoutMs: SERPAPI_HTTP_TIMEOUT_MS,
        retry: { maxAttempts: SERPAPI_HTTP_MAX_ATTEMPTS },
      });
    } catch (error) {
      throw wrapSourceRequestFailure(this.source, error);
    }

    const parsed = serpApiResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SourceFormatError(
        this.source,
        formatZodIssues(parsed.error).slice(0, 3).join("; "),
        payload,
      );
    }

    const data = parsed.data;
    if (data.error) {
      if (data.error.includes(SERPAPI_NO_RESULTS_ERROR_FRAGMENT)) {
        return { source: this.source, candidates: [], nextPageToken: null };
      }
      throw new SourceFormatError(this.source, `provider error: ${data.error}`, payload);
    }

    const fetchedAt = this.now().toISOString();
    const candidates = (data.jobs_results ?? []).map((job) =>
      mapSerpApiJob(job, fetchedAt),
    );

    const nextPageToken =
      candidates.length > 0 ? data.serpapi_pagination?.next_page_token || null : null;

    return { source: this.source, candidates, nextPageToken };
  }
}
