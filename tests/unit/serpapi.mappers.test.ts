/**
 * Unit tests for SerpApi mappers
 *
 * Google Jobs payload → posting candidate. No DB, no HTTP.
 */

import { describe, it, expect } from "vitest";
import { countryCodeForLocation, mapSerpApiJob } from "@/clients/serpapi";
import { serpApiResponseSchema } from "@/clients/serpapi/schema";
import { loadFixture } from "../helpers/mockHttp";

const FETCHED_AT = "2026-10-19T02:00:00.000Z";

function fixtureJobs(name: string) {
  return serpApiResponseSchema.parse(loadFixture(`serpapi/${name}`)).jobs_results ?? [];
}

describe("mapSerpApiJob", () => {
  const [senior, intern] = fixtureJobs("page1.json");
  const [backend] = fixtureJobs("page2.json");

  it("should map a complete result", () => {
    expect(mapSerpApiJob(senior, FETCHED_AT)).toEqual({
      source: "serpapi",
      externalId: "fixture-job-001",
      title: "Senior Software Engineer",
      company: "Example Logistics Ltd",
      location: "Nairobi, Kenya",
      salary: {
        min: 80000,
        max: 120000,
        currency: "USD",
        text: "$80,000 - $120,000 a year",
      },
      employmentType: "Full-time",
      description: "Build and run backend services for route planning.",
      url: "https://jobs.example.com/apply/001",
      isActive: true,
      fetchedAt: FETCHED_AT,
    });
  });

  it("should fall back to the share link and read the schedule hint", () => {
    const candidate = mapSerpApiJob(intern, FETCHED_AT);

    expect(candidate.url).toBe("https://www.example.com/jobs/002");
    expect(candidate.employmentType).toBe("Internship");
    expect(candidate.salary).toBeNull();
  });

  it("should infer the employment type from the description", () => {
    const candidate = mapSerpApiJob(backend, FETCHED_AT);

    expect(candidate.employmentType).toBe("Part-time");
    expect(candidate.url).toBeNull();
  });

  it("should default to full-time when nothing hints otherwise", () => {
    const candidate = mapSerpApiJob(
      { job_id: "plain-1", title: "Engineer", description: "Build things." },
      FETCHED_AT,
    );

    expect(candidate.employmentType).toBe("Full-time");
    expect(candidate.company).toBeNull();
    expect(candidate.location).toBeNull();
  });
});

describe("countryCodeForLocation", () => {
  it.each([
    ["Nairobi, Kenya", "ke"],
    ["London, UK", "gb"],
    ["Toronto, Canada", "ca"],
    ["Kyiv, Ukraine", "us"],
    ["Remote", "us"],
  ])("should map '%s' to '%s'", (location, code) => {
    expect(countryCodeForLocation(location)).toBe(code);
  });

  it("should use the default country without a location", () => {
    expect(countryCodeForLocation(null)).toBe("us");
  });
});
