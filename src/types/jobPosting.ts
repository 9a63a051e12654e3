/**
 * Job posting type definitions: source-agnostic normalized shape
 */

import type { JOB_SOURCES } from "@/constants/sources";

/**
 * Supported job sources
 */
export type JobSource = (typeof JOB_SOURCES)[number];

export type EmploymentType = "Full-time" | "Part-time" | "Contract" | "Internship";

export type SalaryRange = {
  min: number | null;
  max: number | null;
  currency: string | null;
  /** Salary text as published by the source */
  text: string | null;
};

/**
 * A normalized posting produced by a source adapter, before it is merged
 * into storage. Identity is (source, externalId).
 */
export type JobPostingCandidate = {
  source: JobSource;
  externalId: string;
  title: string;
  company: string | null;
  location: string | null;
  salary: SalaryRange | null;
  employmentType: EmploymentType | null;
  description: string | null;
  url: string | null;
  isActive: boolean;
  /** When the candidate was fetched (ISO 8601) */
  fetchedAt: string;
};

/**
 * Outcome of merging a single candidate
 *
 * - inserted: no row existed for the identity key
 * - updated: existing row refreshed with the candidate's fields
 * - stale: existing row already holds a newer fetch; candidate ignored
 */
export type UpsertOutcome = "inserted" | "updated" | "stale";

export type UpsertPostingsResult = {
  processed: number;
  inserted: number;
  updated: number;
  stale: number;
  failed: number;
};
