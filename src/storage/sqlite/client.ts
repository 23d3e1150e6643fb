/**
 * SQLite database client for tierstash
 * Opens (or creates) the database at ${TIERSTASH_HOME}/tierstash.db
 * Applies WAL journal mode and busy_timeout pragmas on open.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import Database from "better-sqlite3";

import { GLOBAL_CONFIG_DIR, HOME_ENV_VAR, STATE_DB_FILE_NAME } from "../../constants.js";

/**
 * Resolve the tierstash home directory (config file and database live here).
 */
export function getHomeDir(): string {
  return process.env[HOME_ENV_VAR] || path.join(os.homedir(), GLOBAL_CONFIG_DIR);
}

/**
 * Get the path to the SQLite database file inside `homeDir`.
 */
export function getDbPath(homeDir: string = getHomeDir()): string {
  return path.join(homeDir, STATE_DB_FILE_NAME);
}

/**
 * Create (or open) a Database instance at `<homeDir>/tierstash.db`.
 * The directory is created if it does not exist.
 * Callers own the instance and must close it.
 */
export function createDbForDir(homeDir: string): Database.Database {
  fs.mkdirSync(homeDir, { recursive: true });

  const db = new Database(getDbPath(homeDir));

  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");

  return db;
}
