import type { z, ZodTypeAny } from "zod";
import type { TaskParams } from "@/types";
import { ConfigurationError } from "@/errors";
import { formatZodIssues } from "@/utils";

/**
 * Validate a task's params; invalid params are a configuration error
 */
export function parseTaskParams<S extends ZodTypeAny>(
  schema: S,
  taskKey: string,
  params: TaskParams,
): z.infer<S> {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid params for task '${taskKey}'`,
      formatZodIssues(result.error),
    );
  }
  return result.data;
}
