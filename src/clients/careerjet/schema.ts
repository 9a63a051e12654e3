/**
 * Careerjet search response schema
 */

import { z } from "zod";

export const careerjetJobSchema = z
  .object({
    title: z.string().min(1),
    company: z.string().nullish(),
    locations: z.string().nullish(),
    salary: z.string().nullish(),
    description: z.string().nullish(),
    url: z.string().min(1),
    site: z.string().nullish(),
    date: z.string().nullish(),
  })
  .passthrough();

/**
 * type is "JOBS" for results, "LOCATIONS" when the location is ambiguous,
 * "ERROR" otherwise
 */
export const careerjetResponseSchema = z
  .object({
    type: z.string(),
    jobs: z.array(careerjetJobSchema).optional(),
    hits: z.number().optional(),
    pages: z.number().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type CareerjetJob = z.infer<typeof careerjetJobSchema>;
export type CareerjetResponse = z.infer<typeof careerjetResponseSchema>;
