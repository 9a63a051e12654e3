/**
 * Storage errors
 */

/**
 * Two writers raced on the same identity key and the unique index rejected
 * one of them. Benign: the loser retries its upsert once.
 */
export class DuplicateKeyRace extends Error {
  public readonly identityKey: string;

  constructor(identityKey: string, options: { cause?: unknown } = {}) {
    super(`Duplicate key race on ${identityKey}`, { cause: options.cause });
    this.name = "DuplicateKeyRace";
    this.identityKey = identityKey;
  }
}

/**
 * Check if an error is a SQLite UNIQUE constraint violation
 *
 * SQLite reports constraint violations with messages starting with:
 * "UNIQUE constraint failed: table_name.column_name"
 */
export function isUniqueConstraintError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }

  return err.message.startsWith("UNIQUE constraint failed:");
}
