/**
 * Durable task store.
 *
 * Wraps ITaskRepository and applies the storage failure semantics: nothing
 * thrown by the storage layer escapes this class. Reads fall back to empty
 * results and writes to `false`.
 */

import type Database from "better-sqlite3";

import { StorageError, toStorageError } from "../errors.js";
import type { ITask } from "../tasks/task.js";
import { emptyTierCounts } from "../tiers/tier.js";
import type { Tier } from "../tiers/tier.js";
import { createLogger } from "../utils/logger.js";
import type { ITaskRepository, ITaskSnapshot } from "./repositories/interfaces.js";
import { SqliteTaskRepository } from "./repositories/sqlite/task-repository.js";
import { createDbForDir } from "./sqlite/client.js";
import { runMigrations } from "./sqlite/migrations.js";

const log = createLogger("store");

/**
 * Serialized form of a task in the JSON export. Keys are declared in
 * alphabetical order, which is the order JSON.stringify emits them.
 */
interface IExportedTask {
  completedAt: string | null;
  createdAt: string;
  id: string;
  isCompleted: boolean;
  tier: Tier;
  tierAssignedAt: string;
  title: string;
}

/**
 * ISO-8601 without fractional seconds, e.g. "2026-01-01T09:00:00Z".
 */
export function formatExportDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function toExportedTask(task: ITask): IExportedTask {
  return {
    completedAt: task.completedAt ? formatExportDate(task.completedAt) : null,
    createdAt: formatExportDate(task.createdAt),
    id: task.id,
    isCompleted: task.isCompleted,
    tier: task.tier,
    tierAssignedAt: formatExportDate(task.tierAssignedAt),
    title: task.title,
  };
}

export class TaskStore {
  private readonly repository: ITaskRepository | null;
  private readonly onClose: (() => void) | null;
  private unavailableWarned = false;

  constructor(repository: ITaskRepository | null, onClose: (() => void) | null = null) {
    this.repository = repository;
    this.onClose = onClose;
  }

  /** False when the store was opened without a working database. */
  get isAvailable(): boolean {
    return this.repository !== null;
  }

  add(task: ITask): boolean {
    return this.write("add", (repo) => {
      repo.add(task);
      return true;
    });
  }

  fetchActive(): ITask[] {
    return this.read("fetchActive", [], (repo) => repo.getActive());
  }

  fetchCompleted(): ITask[] {
    return this.read("fetchCompleted", [], (repo) => repo.getCompleted());
  }

  complete(id: string, now: Date): boolean {
    return this.write("complete", (repo) => repo.complete(id, now));
  }

  updateTier(id: string, tier: Tier, now: Date): boolean {
    return this.write("updateTier", (repo) => repo.updateTier(id, tier, now));
  }

  clearCompleted(): boolean {
    return this.write("clearCompleted", (repo) => {
      const removed = repo.clearCompleted();
      log.debug("Cleared completed tasks", { removed });
      return true;
    });
  }

  clearAll(): boolean {
    return this.write("clearAll", (repo) => {
      const removed = repo.clearAll();
      log.debug("Cleared all tasks", { removed });
      return true;
    });
  }

  countActive(tier: Tier): number {
    return this.read("countActive", 0, (repo) => repo.countActive(tier));
  }

  countActiveByTier(): Record<Tier, number> {
    return this.read("countActiveByTier", emptyTierCounts(), (repo) => repo.countActiveByTier());
  }

  /**
   * Every task as a pretty-printed JSON array: active tasks first, then
   * completed, each in fetch order.
   */
  exportSnapshot(): string {
    const empty: ITaskSnapshot = { active: [], completed: [] };
    const snapshot = this.read("exportSnapshot", empty, (repo) => repo.getSnapshot());
    const tasks = [...snapshot.active, ...snapshot.completed].map(toExportedTask);
    return JSON.stringify(tasks, null, 2);
  }

  /** Release the underlying database handle, if any. */
  close(): void {
    this.onClose?.();
  }

  private read<T>(operation: string, fallback: T, fn: (repo: ITaskRepository) => T): T {
    const repo = this.requireRepository(operation);
    if (!repo) {
      return fallback;
    }
    try {
      return fn(repo);
    } catch (err) {
      const error = toStorageError(err);
      log.error("Storage read failed", { operation, kind: error.kind, error });
      return fallback;
    }
  }

  private write(operation: string, fn: (repo: ITaskRepository) => boolean): boolean {
    const repo = this.requireRepository(operation);
    if (!repo) {
      return false;
    }
    try {
      const changed = fn(repo);
      log.debug("Storage write", { operation, changed });
      return changed;
    } catch (err) {
      const error = toStorageError(err);
      log.error("Storage write failed", { operation, kind: error.kind, error });
      return false;
    }
  }

  private requireRepository(operation: string): ITaskRepository | null {
    if (this.repository) {
      return this.repository;
    }
    if (!this.unavailableWarned) {
      this.unavailableWarned = true;
      const error = new StorageError("unavailable", "Task database is not available");
      log.warn(error.message, { operation });
    }
    return null;
  }
}

/**
 * Open the task database under `homeDir` and wrap it in a TaskStore.
 * Falls back to an unavailable store when the database cannot be opened.
 */
export function openTaskStore(homeDir: string): TaskStore {
  let db: Database.Database | null = null;
  try {
    db = createDbForDir(homeDir);
    runMigrations(db);
    const opened = db;
    return new TaskStore(new SqliteTaskRepository(opened), () => opened.close());
  } catch (err) {
    db?.close();
    log.error("Failed to open task database", { homeDir, error: toStorageError(err, "unavailable") });
    return new TaskStore(null);
  }
}
