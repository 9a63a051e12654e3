/**
 * Five-field cron expressions, evaluated in UTC
 *
 *   ┌ minute (0-59)
 *   │ ┌ hour (0-23)
 *   │ │ ┌ day of month (1-31)
 *   │ │ │ ┌ month (1-12 or JAN-DEC)
 *   │ │ │ │ ┌ day of week (0-7 or SUN-SAT; 0 and 7 are Sunday)
 *   * * * * *
 *
 * Each field takes "*", values, ranges "a-b", lists "a,b" and steps
 * "*\/n", "a-b/n", "a/n". When both day fields are restricted a day
 * matches if either matches.
 */

import type { CronFields } from "@/types";
import { CRON_SEARCH_LIMIT_MINUTES } from "@/constants/scheduler";

const MINUTE_MS = 60_000;

const MONTH_NAMES = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];
const DAY_NAMES = ["SUN", "MON", "TUE", "WED", "THU", "FRI", "SAT"];

type FieldSpec = {
  label: string;
  min: number;
  max: number;
  /** Symbolic names; index + offset is the numeric value */
  names?: { values: string[]; offset: number };
};

const FIELD_SPECS: readonly FieldSpec[] = [
  { label: "minute", min: 0, max: 59 },
  { label: "hour", min: 0, max: 23 },
  { label: "day of month", min: 1, max: 31 },
  { label: "month", min: 1, max: 12, names: { values: MONTH_NAMES, offset: 1 } },
  { label: "day of week", min: 0, max: 7, names: { values: DAY_NAMES, offset: 0 } },
];

export class CronParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CronParseError";
  }
}

function parseValue(token: string, spec: FieldSpec): number {
  const upper = token.toUpperCase();
  const nameIndex = spec.names?.values.indexOf(upper) ?? -1;
  if (spec.names && nameIndex >= 0) {
    return nameIndex + spec.names.offset;
  }

  if (!/^\d+$/.test(token)) {
    throw new CronParseError(`Invalid ${spec.label} value '${token}'`);
  }
  const value = parseInt(token, 10);
  if (value < spec.min || value > spec.max) {
    throw new CronParseError(
      `${spec.label} value ${value} out of range ${spec.min}-${spec.max}`,
    );
  }
  return value;
}

function parseField(field: string, spec: FieldSpec): Set<number> {
  const values = new Set<number>();

  for (const part of field.split(",")) {
    const pieces = part.split("/");
    if (pieces.length > 2 || pieces[0] === "") {
      throw new CronParseError(`Invalid ${spec.label} field '${field}'`);
    }
    const [rangePart, stepPart] = pieces;

    let step = 1;
    if (stepPart !== undefined) {
      if (!/^\d+$/.test(stepPart) || parseInt(stepPart, 10) === 0) {
        throw new CronParseError(`Invalid ${spec.label} step '${stepPart}'`);
      }
      step = parseInt(stepPart, 10);
    }

    let start: number;
    let end: number;
    if (rangePart === "*") {
      start = spec.min;
      end = spec.max;
    } else if (rangePart.includes("-")) {
      const bounds = rangePart.split("-");
      if (bounds.length !== 2) {
        throw new CronParseError(`Invalid ${spec.label} range '${rangePart}'`);
      }
      start = parseValue(bounds[0], spec);
      end = parseValue(bounds[1], spec);
      if (start > end) {
        throw new CronParseError(`Invalid ${spec.label} range '${rangePart}'`);
      }
    } else {
      start = parseValue(rangePart, spec);
      // "a/n" runs from a to the end of the field
      end = stepPart !== undefined ? spec.max : start;
    }

    for (let value = start; value <= end; value += step) {
      values.add(value);
    }
  }

  return values;
}

/**
 * Parse a 5-field cron expression
 *
 * @throws {CronParseError} On any malformed field
 */
export function parseCronExpression(expression: string): CronFields {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5 || fields[0] === "") {
    throw new CronParseError(
      `Expected 5 fields (minute hour day-of-month month day-of-week), got ${
        fields[0] === "" ? 0 : fields.length
      }`,
    );
  }

  const [minutes, hours, daysOfMonth, months, rawDaysOfWeek] = fields.map(
    (field, index) => parseField(field, FIELD_SPECS[index]),
  );

  const daysOfWeek = new Set<number>();
  for (const day of rawDaysOfWeek) {
    daysOfWeek.add(day === 7 ? 0 : day);
  }

  return {
    minutes,
    hours,
    daysOfMonth,
    months,
    daysOfWeek,
    dayOfMonthRestricted: !fields[2].startsWith("*"),
    dayOfWeekRestricted: !fields[4].startsWith("*"),
  };
}

function dayMatches(cron: CronFields, date: Date): boolean {
  const domMatch = cron.daysOfMonth.has(date.getUTCDate());
  const dowMatch = cron.daysOfWeek.has(date.getUTCDay());

  if (cron.dayOfMonthRestricted && cron.dayOfWeekRestricted) {
    return domMatch || dowMatch;
  }
  if (cron.dayOfMonthRestricted) {
    return domMatch;
  }
  if (cron.dayOfWeekRestricted) {
    return dowMatch;
  }
  return true;
}

/**
 * Whether the minute containing `date` matches
 */
export function matchesCron(cron: CronFields, date: Date): boolean {
  return (
    cron.minutes.has(date.getUTCMinutes()) &&
    cron.hours.has(date.getUTCHours()) &&
    cron.months.has(date.getUTCMonth() + 1) &&
    dayMatches(cron, date)
  );
}

/**
 * First matching minute strictly after `after`
 *
 * @returns null if nothing matches within the search horizon (e.g. "0 0 30 2 *")
 */
export function nextOccurrence(cron: CronFields, after: Date): Date | null {
  const startMs = Math.floor(after.getTime() / MINUTE_MS) * MINUTE_MS + MINUTE_MS;
  const limitMs = startMs + CRON_SEARCH_LIMIT_MINUTES * MINUTE_MS;
  const candidate = new Date(startMs);

  while (candidate.getTime() <= limitMs) {
    if (!cron.months.has(candidate.getUTCMonth() + 1)) {
      candidate.setUTCMonth(candidate.getUTCMonth() + 1, 1);
      candidate.setUTCHours(0, 0, 0, 0);
      continue;
    }
    if (!dayMatches(cron, candidate)) {
      candidate.setUTCDate(candidate.getUTCDate() + 1);
      candidate.setUTCHours(0, 0, 0, 0);
      continue;
    }
    if (!cron.hours.has(candidate.getUTCHours())) {
      candidate.setUTCHours(candidate.getUTCHours() + 1, 0, 0, 0);
      continue;
    }
    if (!cron.minutes.has(candidate.getUTCMinutes())) {
      candidate.setUTCMinutes(candidate.getUTCMinutes() + 1, 0, 0);
      continue;
    }
    return candidate;
  }

  return null;
}

/**
 * First matching minute at or after `at`
 */
export function nextOccurrenceAtOrAfter(cron: CronFields, at: Date): Date | null {
  return nextOccurrence(cron, new Date(at.getTime() - 1));
}
