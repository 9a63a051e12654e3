/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ in filename order, recording each
 * in schema_migrations.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import * as logger from "@/logger";
import { closeDb, openDb } from "./connection";

export const DEFAULT_MIGRATIONS_DIR = join(process.cwd(), "migrations");

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db
    .prepare<[], { version: string }>("SELECT version FROM schema_migrations")
    .all();
  return new Set(rows.map((r) => r.version));
}

function listMigrationFiles(migrationsDir: string): string[] {
  return readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
}

function applyMigration(
  db: Database.Database,
  migrationsDir: string,
  filename: string,
): void {
  const sql = readFileSync(join(migrationsDir, filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Apply every pending migration to the given database
 *
 * @returns Filenames applied by this call
 */
export function applyPendingMigrations(
  db: Database.Database,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR,
): string[] {
  ensureMigrationsTable(db);

  const applied = getAppliedMigrations(db);
  const pending = listMigrationFiles(migrationsDir).filter(
    (f) => !applied.has(f),
  );

  for (const migration of pending) {
    logger.info("Applying migration", { migration });
    applyMigration(db, migrationsDir, migration);
  }

  return pending;
}

/**
 * CLI entrypoint: migrate the database at DB_PATH and close it
 */
export function runMigrations(): void {
  const db = openDb();
  try {
    const applied = applyPendingMigrations(db);
    logger.info("Migrations complete", { applied: applied.length });
  } finally {
    closeDb();
  }
}

if (require.main === module) {
  runMigrations();
}
