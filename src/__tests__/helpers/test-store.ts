/**
 * Temporary on-disk task stores for tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import Database from "better-sqlite3";

import { SqliteTaskRepository } from "../../storage/repositories/sqlite/task-repository.js";
import { runMigrations } from "../../storage/sqlite/migrations.js";
import { TaskStore } from "../../storage/task-store.js";
import { createTask } from "../../tasks/task.js";
import type { ITask } from "../../tasks/task.js";
import type { Tier } from "../../tiers/tier.js";

export interface ITestStore {
  dir: string;
  db: Database.Database;
  repository: SqliteTaskRepository;
  store: TaskStore;
  cleanup(): void;
}

export function createTestStore(prefix = "tierstash-test-"): ITestStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const db = new Database(path.join(dir, "test.db"));
  runMigrations(db);
  const repository = new SqliteTaskRepository(db);
  const store = new TaskStore(repository, () => db.close());
  return {
    dir,
    db,
    repository,
    store,
    cleanup() {
      if (db.open) {
        db.close();
      }
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

export const T0 = new Date("2026-01-01T09:00:00.000Z");

/** `seconds` after T0 */
export function at(seconds: number): Date {
  return new Date(T0.getTime() + seconds * 1000);
}

/**
 * Build an active task whose tier clock started `ageSeconds` before `now`.
 */
export function taskAged(
  id: string,
  tier: Tier,
  ageSeconds: number,
  now: Date = T0,
  title = `task ${id}`,
): ITask {
  const assigned = new Date(now.getTime() - ageSeconds * 1000);
  return createTask({ id, title, tier, now: assigned });
}
