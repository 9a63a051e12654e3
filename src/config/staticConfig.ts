/**
 * Static configuration files: schedules and ingestion targets
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import type { IngestionTargets, ScheduleConfigEntry } from "@/types";
import { ConfigurationError } from "@/errors";
import { formatZodIssues } from "@/utils";

const scheduleEntrySchema = z.object({
  name: z.string().trim().min(1),
  cron: z.string().trim().min(1),
  taskKey: z.string().trim().min(1),
  params: z.record(z.unknown()).default({}),
});

const schedulesFileSchema = z.object({
  schedules: z.array(scheduleEntrySchema),
});

const targetSetSchema = z.object({
  queries: z.array(z.string().trim().min(1)).min(1),
  // Empty list: search without a location filter
  locations: z.array(z.string().trim().min(1)).default([]),
});

const targetsFileSchema = z.object({
  targetSets: z.record(targetSetSchema),
});

function readJsonFile(filePath: string): unknown {
  const absolutePath = resolve(process.cwd(), filePath);
  let raw: string;
  try {
    raw = readFileSync(absolutePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${absolutePath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Config file ${absolutePath} is not valid JSON`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
}

export function parseScheduleConfig(data: unknown): ScheduleConfigEntry[] {
  const result = schedulesFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid schedule configuration",
      formatZodIssues(result.error),
    );
  }
  return result.data.schedules;
}

export function parseIngestionTargets(data: unknown): IngestionTargets {
  const result = targetsFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid ingestion targets configuration",
      formatZodIssues(result.error),
    );
  }
  return result.data.targetSets;
}

export function loadScheduleConfig(filePath: string): ScheduleConfigEntry[] {
  return parseScheduleConfig(readJsonFile(filePath));
}

export function loadIngestionTargets(filePath: string): IngestionTargets {
  return parseIngestionTargets(readJsonFile(filePath));
}
