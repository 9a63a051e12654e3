/**
 * Unit tests for cron parsing and next-occurrence search (UTC)
 */

import { describe, it, expect } from "vitest";
import {
  CronParseError,
  matchesCron,
  nextOccurrence,
  nextOccurrenceAtOrAfter,
  parseCronExpression,
} from "@/scheduler/cronExpression";

function sorted(values: ReadonlySet<number>): number[] {
  return [...values].sort((a, b) => a - b);
}

function next(expr: string, after: string): string | null {
  return nextOccurrence(parseCronExpression(expr), new Date(after))?.toISOString() ?? null;
}

describe("parseCronExpression", () => {
  it("should expand wildcards to the full field range", () => {
    const cron = parseCronExpression("* * * * *");

    expect(cron.minutes.size).toBe(60);
    expect(cron.hours.size).toBe(24);
    expect(cron.daysOfMonth.size).toBe(31);
    expect(cron.months.size).toBe(12);
    expect(sorted(cron.daysOfWeek)).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(cron.dayOfMonthRestricted).toBe(false);
    expect(cron.dayOfWeekRestricted).toBe(false);
  });

  it("should parse lists, ranges and steps", () => {
    const cron = parseCronExpression("*/15 8-10 1,15 1-12/3 *");

    expect(sorted(cron.minutes)).toEqual([0, 15, 30, 45]);
    expect(sorted(cron.hours)).toEqual([8, 9, 10]);
    expect(sorted(cron.daysOfMonth)).toEqual([1, 15]);
    expect(sorted(cron.months)).toEqual([1, 4, 7, 10]);
    expect(cron.dayOfMonthRestricted).toBe(true);
  });

  it("should run 'a/n' from a to the end of the field", () => {
    const cron = parseCronExpression("50/5 * * * *");
    expect(sorted(cron.minutes)).toEqual([50, 55]);
  });

  it("should accept month and weekday names", () => {
    const cron = parseCronExpression("0 0 * jan,JUL mon-wed");

    expect(sorted(cron.months)).toEqual([1, 7]);
    expect(sorted(cron.daysOfWeek)).toEqual([1, 2, 3]);
    expect(cron.dayOfWeekRestricted).toBe(true);
  });

  it("should treat day-of-week 7 as Sunday", () => {
    const cron = parseCronExpression("0 0 * * 7");
    expect(sorted(cron.daysOfWeek)).toEqual([0]);
  });

  it("should tolerate extra whitespace between fields", () => {
    const cron = parseCronExpression("  0   2 * * *  ");
    expect(sorted(cron.hours)).toEqual([2]);
  });

  it.each([
    ["* * *", "Expected 5 fields (minute hour day-of-month month day-of-week), got 3"],
    ["", "Expected 5 fields (minute hour day-of-month month day-of-week), got 0"],
    ["60 * * * *", "minute value 60 out of range 0-59"],
    ["* 24 * * *", "hour value 24 out of range 0-23"],
    ["* * 0 * *", "day of month value 0 out of range 1-31"],
    ["*/0 * * * *", "Invalid minute step '0'"],
    ["5-1 * * * *", "Invalid minute range '5-1'"],
    ["abc * * * *", "Invalid minute value 'abc'"],
    ["* * * FOO *", "Invalid month value 'FOO'"],
    ["1,,2 * * * *", "Invalid minute field '1,,2'"],
  ])("should reject '%s'", (expr, message) => {
    expect(() => parseCronExpression(expr)).toThrow(CronParseError);
    expect(() => parseCronExpression(expr)).toThrow(message);
  });
});

describe("matchesCron", () => {
  it("should match on minute granularity regardless of seconds", () => {
    const cron = parseCronExpression("30 14 * * *");

    expect(matchesCron(cron, new Date("2026-10-19T14:30:45.500Z"))).toBe(true);
    expect(matchesCron(cron, new Date("2026-10-19T14:31:00.000Z"))).toBe(false);
  });
});

describe("nextOccurrence", () => {
  it("should find the next daily occurrence later the same day", () => {
    expect(next("0 2 * * *", "2026-10-19T01:30:00.000Z")).toBe("2026-10-19T02:00:00.000Z");
  });

  it("should return a time strictly after the reference", () => {
    expect(next("0 2 * * *", "2026-10-19T02:00:00.000Z")).toBe("2026-10-20T02:00:00.000Z");
  });

  it("should roll over month and year boundaries", () => {
    expect(next("0 0 1 * *", "2026-12-15T10:00:00.000Z")).toBe("2027-01-01T00:00:00.000Z");
  });

  it("should skip weekends for a weekday schedule", () => {
    // 2026-10-17 is a Saturday
    expect(next("0 9 * * MON-FRI", "2026-10-17T10:00:00.000Z")).toBe(
      "2026-10-19T09:00:00.000Z",
    );
  });

  it("should match either day field when both are restricted", () => {
    // 2026-10-19 is a Monday; the following Monday comes before Nov 1st
    expect(next("0 0 1 * MON", "2026-10-19T12:00:00.000Z")).toBe("2026-10-26T00:00:00.000Z");
    expect(next("0 0 1 * MON", "2026-10-27T12:00:00.000Z")).toBe("2026-11-01T00:00:00.000Z");
  });

  it("should find leap days years ahead", () => {
    expect(next("0 0 29 2 *", "2026-03-01T00:00:00.000Z")).toBe("2028-02-29T00:00:00.000Z");
  });

  it("should return null for an expression that never matches", () => {
    expect(next("0 0 30 2 *", "2026-01-01T00:00:00.000Z")).toBeNull();
  });

  it("should step through minutes within the hour", () => {
    expect(next("*/15 * * * *", "2026-10-19T10:07:12.000Z")).toBe("2026-10-19T10:15:00.000Z");
    expect(next("*/15 * * * *", "2026-10-19T10:45:00.000Z")).toBe("2026-10-19T11:00:00.000Z");
  });
});

describe("nextOccurrenceAtOrAfter", () => {
  it("should return the reference itself when it is an occurrence", () => {
    const cron = parseCronExpression("0 2 * * *");

    expect(nextOccurrenceAtOrAfter(cron, new Date("2026-10-19T02:00:00.000Z"))?.toISOString()).toBe(
      "2026-10-19T02:00:00.000Z",
    );
    expect(nextOccurrenceAtOrAfter(cron, new Date("2026-10-19T02:00:00.001Z"))?.toISOString()).toBe(
      "2026-10-20T02:00:00.000Z",
    );
  });
});
