/**
 * Careerjet payload mappers
 *
 * Careerjet publishes no job id: the externalId is derived from the posting
 * URL, so the same posting re-fetched later maps to the same identity.
 */

import type { JobPostingCandidate } from "@/types";
import { CAREERJET_LOCALE_CURRENCIES } from "@/constants/clients/careerjet";
import {
  cleanText,
  deriveExternalId,
  inferEmploymentType,
  parseSalaryRange,
} from "@/utils";
import type { CareerjetJob } from "./schema";

export function currencyForLocale(locale: string): string | null {
  return CAREERJET_LOCALE_CURRENCIES[locale] ?? null;
}

export function mapCareerjetJob(
  job: CareerjetJob,
  locale: string,
  fetchedAt: string,
): JobPostingCandidate {
  const title = cleanText(job.title) ?? job.title;
  const description = job.description?.trim() || null;
  const url = job.url.trim();

  return {
    source: "careerjet",
    externalId: deriveExternalId(url),
    title,
    company: cleanText(job.company),
    location: cleanText(job.locations),
    salary: parseSalaryRange(job.salary, currencyForLocale(locale)),
    employmentType: inferEmploymentType(null, `${title} ${description ?? ""}`),
    description,
    url,
    isActive: true,
    fetchedAt,
  };
}
