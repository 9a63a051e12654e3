/**
 * Source registry: adapters by source name
 */

import type { JobSourceAdapter } from "@/interfaces";
import type { HttpRequestFn, JobSource, SourcePage, SourceQuery } from "@/types";
import { JOB_SOURCES } from "@/constants/sources";
import { ConfigurationError } from "@/errors";
import { SerpApiAdapter } from "@/clients/serpapi";
import { CareerjetAdapter } from "@/clients/careerjet";

export function isJobSource(value: string): value is JobSource {
  return JOB_SOURCES.some((source) => source === value);
}

export class SourceRegistry {
  private readonly adapters = new Map<JobSource, JobSourceAdapter>();

  constructor(adapters: JobSourceAdapter[]) {
    for (const adapter of adapters) {
      if (this.adapters.has(adapter.source)) {
        throw new ConfigurationError(`Duplicate adapter for source ${adapter.source}`);
      }
      this.adapters.set(adapter.source, adapter);
    }
  }

  has(source: JobSource): boolean {
    return this.adapters.has(source);
  }

  /**
   * Registered sources, in JOB_SOURCES order
   */
  list(): JobSource[] {
    return JOB_SOURCES.filter((source) => this.adapters.has(source));
  }

  get(source: JobSource): JobSourceAdapter {
    const adapter = this.adapters.get(source);
    if (!adapter) {
      throw new ConfigurationError(`No adapter registered for source ${source}`);
    }
    return adapter;
  }

  /**
   * Fetch one page from a source
   *
   * @param pageToken - null for the first page, otherwise the previous
   *   page's nextPageToken
   */
  fetchPage(
    source: JobSource,
    query: SourceQuery,
    pageToken: string | null,
  ): Promise<SourcePage> {
    return this.get(source).fetchPage(query, pageToken);
  }
}

export type DefaultSourceOptions = {
  serpApiKey?: string;
  careerjetAffid?: string;
  httpRequest?: HttpRequestFn;
  now?: () => Date;
};

/**
 * Registry with every built-in adapter. Adapters without credentials are
 * still registered and fail with ConfigurationError when used.
 */
export function createDefaultSourceRegistry(
  options: DefaultSourceOptions = {},
): SourceRegistry {
  return new SourceRegistry([
    new SerpApiAdapter({
      apiKey: options.serpApiKey,
      httpRequest: options.httpRequest,
      now: options.now,
    }),
    new CareerjetAdapter({
      affid: options.careerjetAffid,
      httpRequest: options.httpRequest,
      now: options.now,
    }),
  ]);
}
