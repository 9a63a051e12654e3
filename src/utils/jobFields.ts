/**
 * Field normalization shared by source mappers
 */

import { createHash } from "crypto";
import type { EmploymentType, SalaryRange } from "@/types";
import { DERIVED_EXTERNAL_ID_LENGTH } from "@/constants/sources";

const SALARY_AMOUNT_PATTERN = /(\d[\d,]*(?:\.\d+)?)(\s*[kK]\b)?/g;

const CURRENCY_MARKERS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\$|\busd\b/i, "USD"],
  [/£|\bgbp\b/i, "GBP"],
  [/€|\beur\b/i, "EUR"],
  [/\bksh\b|\bkes\b/i, "KES"],
  [/₹|\binr\b/i, "INR"],
];

/**
 * Parse a free-text salary into a range
 *
 * "$80,000 - $120,000 a year" → { min: 80000, max: 120000, currency: "USD" }
 * "£45K"                      → { min: 45000, max: null, currency: "GBP" }
 *
 * Returns null for empty input. Text without amounts keeps the text with
 * null bounds.
 */
export function parseSalaryRange(
  text: string | null | undefined,
  defaultCurrency: string | null = null,
): SalaryRange | null {
  const trimmed = text?.trim();
  if (!trimmed) {
    return null;
  }

  const amounts: number[] = [];
  for (const match of trimmed.matchAll(SALARY_AMOUNT_PATTERN)) {
    const value = parseFloat(match[1].replace(/,/g, ""));
    if (Number.isFinite(value)) {
      amounts.push(Math.round(match[2] ? value * 1000 : value));
    }
    if (amounts.length === 2) {
      break;
    }
  }

  let currency = defaultCurrency;
  for (const [pattern, code] of CURRENCY_MARKERS) {
    if (pattern.test(trimmed)) {
      currency = code;
      break;
    }
  }

  const [first, second] = amounts;
  const min = first ?? null;
  const max = second ?? null;

  return {
    min: min !== null && max !== null ? Math.min(min, max) : min,
    max: min !== null && max !== null ? Math.max(min, max) : max,
    currency,
    text: trimmed,
  };
}

/**
 * Infer an employment type from a source's schedule hint, then from the
 * posting text. Returns null when neither says anything.
 */
export function inferEmploymentType(
  scheduleHint: string | null | undefined,
  text: string | null | undefined,
): EmploymentType | null {
  const hint = scheduleHint?.toLowerCase() ?? "";
  if (hint.includes("full")) return "Full-time";
  if (hint.includes("part")) return "Part-time";
  if (hint.includes("contract")) return "Contract";
  if (hint.includes("intern")) return "Internship";

  const body = text?.toLowerCase() ?? "";
  if (/\bpart[- ]time\b/.test(body)) return "Part-time";
  if (/\bcontract(or)?\b/.test(body)) return "Contract";
  if (/\bintern(ship)?\b/.test(body)) return "Internship";
  if (/\bfull[- ]time\b/.test(body)) return "Full-time";

  return null;
}

/**
 * Stable externalId for sources that publish no identifier of their own
 */
export function deriveExternalId(...parts: string[]): string {
  return createHash("sha256")
    .update(parts.map((p) => p.trim().toLowerCase()).join("::"))
    .digest("hex")
    .substring(0, DERIVED_EXTERNAL_ID_LENGTH);
}

/**
 * Collapse whitespace; empty strings become null
 */
export function cleanText(value: string | null | undefined): string | null {
  const cleaned = value?.replace(/\s+/g, " ").trim();
  return cleaned ? cleaned : null;
}
