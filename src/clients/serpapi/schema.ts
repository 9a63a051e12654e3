/**
 * SerpApi Google Jobs response schema
 *
 * Only the fields the mapper reads are declared; everything else passes
 * through untouched.
 */

import { z } from "zod";

export const serpApiJobSchema = z
  .object({
    job_id: z.string().min(1),
    title: z.string().min(1),
    company_name: z.string().nullish(),
    location: z.string().nullish(),
    description: z.string().nullish(),
    detected_extensions: z
      .object({
        salary: z.string().nullish(),
        schedule_type: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    apply_options: z
      .array(z.object({ link: z.string().nullish() }).passthrough())
      .nullish(),
    share_link: z.string().nullish(),
  })
  .passthrough();

export const serpApiResponseSchema = z
  .object({
    /** Provider-level error, returned with HTTP 200 */
    error: z.string().optional(),
    jobs_results: z.array(serpApiJobSchema).optional(),
    serpapi_pagination: z
      .object({ next_page_token: z.string().nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type SerpApiJob = z.infer<typeof serpApiJobSchema>;
export type SerpApiResponse = z.infer<typeof serpApiResponseSchema>;
