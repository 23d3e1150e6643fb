/**
 * SQLite schema migrations for tierstash.
 * Creates all required tables if they do not already exist (idempotent).
 */

import Database from "better-sqlite3";

/** Current schema version */
export const SCHEMA_VERSION = "1";

/**
 * Run all migrations against the provided database instance.
 * Safe to call multiple times: all DDL statements use IF NOT EXISTS.
 */
export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS task (
      id             TEXT    PRIMARY KEY,
      title          TEXT    NOT NULL,
      tier           TEXT    NOT NULL DEFAULT 'l1',
      isCompleted    INTEGER NOT NULL DEFAULT 0,
      createdAt      REAL    NOT NULL,
      tierAssignedAt REAL    NOT NULL,
      completedAt    REAL
    );
    CREATE INDEX IF NOT EXISTS idx_task_active
      ON task(isCompleted, tierAssignedAt);

    CREATE TABLE IF NOT EXISTS schema_meta (
      key   TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);

  // Upsert the current schema version into schema_meta
  db.prepare(
    `INSERT INTO schema_meta (key, value) VALUES ('schema_version', ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value`
  ).run(SCHEMA_VERSION);
}
