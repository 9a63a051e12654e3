/**
 * Runner entrypoint
 *
 * Usage:
 *   # Scheduler + workers until SIGINT/SIGTERM (default)
 *   npm run build && node dist/runnerMain.js
 *
 *   # One scheduler tick, run what it enqueued, exit
 *   RUN_MODE=once node dist/runnerMain.js
 *
 *   # Run one task now
 *   RUN_MODE=task TASK_NAME=deactivate-stale-jobs node dist/runnerMain.js
 *
 * Environment variables: see .env.example
 */

import "dotenv/config";
import { loadEnv } from "./config";
import { runMode } from "./orchestration/runner";
import * as logger from "./logger";

async function main(): Promise<number> {
  return runMode(loadEnv());
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  });
