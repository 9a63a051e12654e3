/**
 * Ingestion module: merge source candidates into storage
 */

export { upsertPostings } from "./upsertPostings";
export type { UpsertPostingsOptions } from "./upsertPostings";
export { persistPosting, toWriteParams } from "./postingPersistence";
export type { PostingWriteFn } from "./postingPersistence";
export {
  ingestSourceQuery,
  emptyUpsertResult,
  addUpsertResults,
} from "./ingestSourceQuery";
export type {
  IngestSourceQueryInput,
  IngestSourceQueryResult,
} from "./ingestSourceQuery";
export { deactivateStale, retentionCutoff } from "./deactivateStale";
