/**
 * Paginated ingestion of one (source, query) pair
 */

import type {
  JobSource,
  Logger,
  SourceQuery,
  UpsertPostingsResult,
} from "@/types";
import type { SourceRegistry } from "@/sources";
import { SourceFormatError } from "@/errors";
import type { PostingWriteFn } from "./postingPersistence";
import { upsertPostings } from "./upsertPostings";

export type IngestSourceQueryInput = {
  sources: SourceRegistry;
  source: JobSource;
  query: SourceQuery;
  maxPages: number;
  now: () => Date;
  logger: Logger;
  write?: PostingWriteFn;
};

export type IngestSourceQueryResult = {
  pagesFetched: number;
  upsert: UpsertPostingsResult;
  /** Error that ended pagination early, or null when it ran to completion */
  error: unknown;
};

export function emptyUpsertResult(): UpsertPostingsResult {
  return { processed: 0, inserted: 0, updated: 0, stale: 0, failed: 0 };
}

export function addUpsertResults(
  target: UpsertPostingsResult,
  addition: UpsertPostingsResult,
): void {
  target.processed += addition.processed;
  target.inserted += addition.inserted;
  target.updated += addition.updated;
  target.stale += addition.stale;
  target.failed += addition.failed;
}

/**
 * Fetch up to maxPages pages and upsert each page as it arrives
 *
 * Pages already upserted stay upserted when a later page fails. The error is
 * returned, not thrown, so the caller can carry on with other pairs.
 */
export async function ingestSourceQuery(
  input: IngestSourceQueryInput,
): Promise<IngestSourceQueryResult> {
  const { sources, source, query, maxPages, now, logger } = input;
  const upsert = emptyUpsertResult();
  let pagesFetched = 0;
  let pageToken: string | null = null;

  try {
    do {
      const page = await sources.fetchPage(source, query, pageToken);
      pagesFetched++;

      const pageResult = upsertPostings(page.candidates, now().toISOString(), {
        write: input.write,
      });
      addUpsertResults(upsert, pageResult);

      pageToken = page.nextPageToken;
    } while (pageToken !== null && pagesFetched < maxPages);
  } catch (error) {
    if (error instanceof SourceFormatError) {
      logger.warn("Unparseable source payload, skipping query", {
        source,
        query: query.query,
        location: query.location,
        page: pagesFetched + 1,
        error: error.message,
        payloadSample: error.payloadSample,
      });
    } else {
      logger.warn("Source query failed", {
        source,
        query: query.query,
        location: query.location,
        page: pagesFetched + 1,
        error,
      });
    }
    return { pagesFetched, upsert, error };
  }

  logger.debug("Source query ingested", {
    source,
    query: query.query,
    location: query.location,
    pagesFetched,
    ...upsert,
  });

  return { pagesFetched, upsert, error: null };
}
