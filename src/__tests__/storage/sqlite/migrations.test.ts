/**
 * Tests for SQLite schema migrations
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import Database from "better-sqlite3";

import { SCHEMA_VERSION, runMigrations } from "../../../storage/sqlite/migrations.js";
import { createDbForDir, getDbPath } from "../../../storage/sqlite/client.js";

let tmpDir: string;
let db: Database.Database;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tierstash-migrations-test-"));
  db = new Database(path.join(tmpDir, "test.db"));
});

afterEach(() => {
  db.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("runMigrations", () => {
  it("creates the task and schema_meta tables", () => {
    runMigrations(db);

    const tables = db
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type='table' ORDER BY name`)
      .all()
      .map((t) => t.name);

    expect(tables).toEqual(["schema_meta", "task"]);
  });

  it("creates the task columns", () => {
    runMigrations(db);

    const columns = db
      .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('task') ORDER BY cid`)
      .all()
      .map((c) => c.name);

    expect(columns).toEqual([
      "id",
      "title",
      "tier",
      "isCompleted",
      "createdAt",
      "tierAssignedAt",
      "completedAt",
    ]);
  });

  it("stores schema_version in schema_meta", () => {
    runMigrations(db);

    const row = db
      .prepare<[], { value: string }>(`SELECT value FROM schema_meta WHERE key = 'schema_version'`)
      .get();

    expect(row?.value).toBe(SCHEMA_VERSION);
  });

  it("is idempotent and keeps data", () => {
    runMigrations(db);
    db.prepare(
      `INSERT INTO task (id, title, tier, isCompleted, createdAt, tierAssignedAt) VALUES (?, ?, ?, 0, ?, ?)`
    ).run("t1", "Keep me", "l2", 100, 100);

    expect(() => runMigrations(db)).not.toThrow();

    const count = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM task`).get();
    expect(count?.count).toBe(1);
  });

  it("defaults tier to l1 and isCompleted to 0", () => {
    runMigrations(db);
    db.prepare(`INSERT INTO task (id, title, createdAt, tierAssignedAt) VALUES ('t1', 'x', 1, 1)`).run();

    const row = db
      .prepare<[], { tier: string; isCompleted: number; completedAt: number | null }>(
        `SELECT tier, isCompleted, completedAt FROM task WHERE id = 't1'`
      )
      .get();
    expect(row).toEqual({ tier: "l1", isCompleted: 0, completedAt: null });
  });
});

describe("createDbForDir", () => {
  it("creates the home directory and opens the database in WAL mode", () => {
    const home = path.join(tmpDir, "nested", "home");
    const opened = createDbForDir(home);
    try {
      expect(fs.existsSync(getDbPath(home))).toBe(true);
      expect(opened.pragma("journal_mode", { simple: true })).toBe("wal");
      expect(opened.pragma("busy_timeout", { simple: true })).toBe(5000);
    } finally {
      opened.close();
    }
  });
});
