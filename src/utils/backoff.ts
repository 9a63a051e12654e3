/**
 * Exponential backoff helpers shared by the HTTP client and the worker pool
 */

import type { BackoffConfig } from "@/types";

/**
 * Compute exponential backoff delay with jitter
 * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 *
 * @param attempt - 1-based number of the attempt that just failed
 */
export function computeBackoffDelay(
  attempt: number,
  config: BackoffConfig,
  random: () => number = Math.random,
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  const jitter = 0.5 + random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

/**
 * Uniform random delay in [minMs, maxMs]
 */
export function jitterDelay(
  minMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  return Math.floor(random() * (maxMs - minMs + 1)) + minMs;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
