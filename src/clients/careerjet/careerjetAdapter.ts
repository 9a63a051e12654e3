/**
 * CareerjetAdapter: Careerjet public search API
 *
 * Continuation is the 1-based page number, carried as a string token.
 */

import type { JobSourceAdapter } from "@/interfaces";
import type { HttpRequestFn, SourcePage, SourceQuery } from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  CAREERJET_DEFAULT_LOCALE,
  CAREERJET_DEFAULT_PAGE_SIZE,
  CAREERJET_HTTP_MAX_ATTEMPTS,
  CAREERJET_HTTP_TIMEOUT_MS,
  CAREERJET_MAX_PAGE_SIZE,
  CAREERJET_SEARCH_URL,
  CAREERJET_USER_IP,
  HTTP_USER_AGENT,
} from "@/constants";
import {
  ConfigurationError,
  SourceFormatError,
  wrapSourceRequestFailure,
} from "@/errors";
import { formatZodIssues } from "@/utils";
import * as logger from "@/logger";
import { mapCareerjetJob } from "./mappers";
import { careerjetResponseSchema } from "./schema";

export interface CareerjetAdapterConfig {
  /** Careerjet affiliate id */
  affid?: string;
  locale?: string;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
  now?: () => Date;
}

/**
 * Parse a page token; null means the first page
 *
 * @throws {SourceFormatError} Token is not a page number
 */
export function parseCareerjetPageToken(pageToken: string | null): number {
  if (pageToken === null) {
    return 1;
  }
  const page = Number(pageToken);
  if (!Number.isInteger(page) || page < 1) {
    throw new SourceFormatError("careerjet", `invalid page token '${pageToken}'`, pageToken);
  }
  return page;
}

export class CareerjetAdapter implements JobSourceAdapter {
  readonly source = "careerjet" as const;
  readonly maxPageSize = CAREERJET_MAX_PAGE_SIZE;
  private readonly affid: string | undefined;
  private readonly locale: string;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => Date;

  constructor(config: CareerjetAdapterConfig = {}) {
    this.affid = config.affid;
    this.locale = config.locale ?? CAREERJET_DEFAULT_LOCALE;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.now = config.now ?? (() => new Date());
  }

  async fetchPage(query: SourceQuery, pageToken: string | null): Promise<SourcePage> {
    if (!this.affid) {
      throw new ConfigurationError("Careerjet affiliate id is not configured", [
        "CAREERJET_AFFID: Required",
      ]);
    }

    const page = parseCareerjetPageToken(pageToken);
    const pageSize = Math.max(
      1,
      Math.min(query.pageSize ?? CAREERJET_DEFAULT_PAGE_SIZE, this.maxPageSize),
    );

    logger.debug("Fetching Careerjet page", {
      query: query.query,
      location: query.location,
      page,
      pageSize,
    });

    let payload: unknown;
    try {
      payload = await this.httpRequest({
        method: "GET",
        url: CAREERJET_SEARCH_URL,
        headers: { "User-Agent": HTTP_USER_AGENT },
        query: {
          keywords: query.query,
          location: query.location ?? undefined,
          affid: this.affid,
          locale_code: this.locale,
          pagesize: pageSize,
          page,
          sort: "date",
          user_ip: CAREERJET_USER_IP,
          user_agent: HTTP_USER_AGENT,
        },
        timeoutMs: CAREERJET_HTTP_TIMEOUT_MS,
        retry: { maxAttempts: CAREERJET_HTTP_MAX_ATTEMPTS },
      });
    } catch (error) {
      throw wrapSourceRequestFailure(this.source, error);
    }

    const parsed = careerjetResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SourceFormatError(
        this.source,
        formatZodIssues(parsed.error).slice(0, 3).join("; "),
        payload,
      );
    }

    const data = parsed.data;
    if (data.type !== "JOBS") {
      const detail =
        data.type === "LOCATIONS"
          ? `ambiguous location '${query.location ?? ""}'`
          : `response type ${data.type}${data.error ? `: ${data.error}` : ""}`;
      throw new SourceFormatError(this.source, detail, payload);
    }

    const fetchedAt = this.now().toISOString();
    const candidates = (data.jobs ?? []).map((job) =>
      mapCareerjetJob(job, this.locale, fetchedAt),
    );

    const totalPages = data.pages ?? page;
    const nextPageToken =
      candidates.length > 0 && page < totalPages ? String(page + 1) : null;

    return { source: this.source, candidates, nextPageToken };
  }
}
