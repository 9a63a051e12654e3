/**
 * Raised when a schedule definition cannot be registered: malformed
 * recurrence expression, duplicate name, or unknown target task.
 * A configuration bug; fatal at startup.
 */
export class InvalidScheduleError extends Error {
  public readonly scheduleName: string;

  constructor(scheduleName: string, reason: string) {
    super(`Invalid schedule '${scheduleName}': ${reason}`);
    this.name = "InvalidScheduleError";
    this.scheduleName = scheduleName;
  }
}
