/**
 * SQLite database connection
 *
 * Process-wide singleton. Repositories read it through getDb().
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";

let db: Database.Database | null = null;

function resolveDbPath(dbPath?: string): string {
  const resolved = dbPath || process.env.DB_PATH || join(process.cwd(), "data", "app.db");

  if (resolved !== ":memory:") {
    mkdirSync(dirname(resolved), { recursive: true });
  }

  return resolved;
}

/**
 * Open the database with required pragmas
 * Returns the existing connection if already open
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath(dbPath));
  db.pragma("journal_mode = WAL");
  // Another process holding the write lock: wait instead of failing with SQLITE_BUSY
  db.pragma("busy_timeout = 5000");

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * @internal Test use only - injects a test database into the singleton
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
