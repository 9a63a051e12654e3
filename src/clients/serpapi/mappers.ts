/**
 * SerpApi payload mappers: Google Jobs results to posting candidates
 */

import type { JobPostingCandidate } from "@/types";
import {
  SERPAPI_COUNTRY_CODES,
  SERPAPI_DEFAULT_COUNTRY,
} from "@/constants/clients/serpapi";
import { cleanText, inferEmploymentType, parseSalaryRange } from "@/utils";
import type { SerpApiJob } from "./schema";

/**
 * Google country code (gl) for a free-text location
 */
export function countryCodeForLocation(location: string | null): string {
  if (!location) {
    return SERPAPI_DEFAULT_COUNTRY;
  }

  const normalized = location.toLowerCase();
  for (const [name, code] of SERPAPI_COUNTRY_CODES) {
    if (new RegExp(`\\b${name}\\b`).test(normalized)) {
      return code;
    }
  }
  return SERPAPI_DEFAULT_COUNTRY;
}

export function mapSerpApiJob(job: SerpApiJob, fetchedAt: string): JobPostingCandidate {
  const title = cleanText(job.title) ?? job.title;
  const description = job.description?.trim() || null;

  return {
    source: "serpapi",
    externalId: job.job_id,
    title,
    company: cleanText(job.company_name),
    location: cleanText(job.location),
    salary: parseSalaryRange(job.detected_extensions?.salary),
    // Google Jobs lists almost only full-time roles without a schedule hint
    employmentType:
      inferEmploymentType(
        job.detected_extensions?.schedule_type,
        `${title} ${description ?? ""}`,
      ) ?? "Full-time",
    description,
    url: job.apply_options?.[0]?.link || job.share_link || null,
    isActive: true,
    fetchedAt,
  };
}
