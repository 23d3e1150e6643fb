/**
 * SQLite implementation of ITaskRepository.
 * Persists tasks in the `task` table; timestamps are stored as epoch seconds.
 */

import Database from "better-sqlite3";
import { inject, injectable } from "tsyringe";

import { StorageError } from "../../../errors.js";
import type { ITask } from "../../../tasks/task.js";
import { emptyTierCounts, tierFromStorage } from "../../../tiers/tier.js";
import type { Tier } from "../../../tiers/tier.js";
import type { ITaskRepository, ITaskSnapshot } from "../interfaces.js";

interface ITaskRow {
  id: string;
  title: string;
  tier: string;
  isCompleted: number;
  createdAt: number;
  tierAssignedAt: number;
  completedAt: number | null;
}

interface ITierCountRow {
  tier: string;
  count: number;
}

const TASK_COLUMNS = "id, title, tier, isCompleted, createdAt, tierAssignedAt, completedAt";

function toEpochSeconds(date: Date): number {
  return date.getTime() / 1000;
}

function fromEpochSeconds(seconds: number): Date {
  return new Date(Math.round(seconds * 1000));
}

function rowToTask(row: ITaskRow): ITask {
  return {
    id: row.id,
    title: row.title,
    tier: tierFromStorage(row.tier),
    isCompleted: row.isCompleted !== 0,
    createdAt: fromEpochSeconds(row.createdAt),
    tierAssignedAt: fromEpochSeconds(row.tierAssignedAt),
    completedAt: row.completedAt === null ? null : fromEpochSeconds(row.completedAt),
  };
}

function isPrimaryKeyViolation(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    (err.code === "SQLITE_CONSTRAINT_PRIMARYKEY" || err.code === "SQLITE_CONSTRAINT_UNIQUE")
  );
}

@injectable()
export class SqliteTaskRepository implements ITaskRepository {
  private readonly _db: Database.Database;

  constructor(@inject("Database") db: Database.Database) {
    this._db = db;
  }

  add(task: ITask): void {
    try {
      this._db
        .prepare<[string, string, string, number, number, number, number | null]>(
          `INSERT INTO task (${TASK_COLUMNS})
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          task.id,
          task.title,
          task.tier,
          task.isCompleted ? 1 : 0,
          toEpochSeconds(task.createdAt),
          toEpochSeconds(task.tierAssignedAt),
          task.completedAt ? toEpochSeconds(task.completedAt) : null
        );
    } catch (err) {
      if (isPrimaryKeyViolation(err)) {
        throw new StorageError("duplicate_id", `Task ${task.id} already exists`, { cause: err });
      }
      throw err;
    }
  }

  getById(id: string): ITask | null {
    const row = this._db
      .prepare<[string], ITaskRow>(`SELECT ${TASK_COLUMNS} FROM task WHERE id = ?`)
      .get(id);
    return row ? rowToTask(row) : null;
  }

  getActive(): ITask[] {
    return this._db
      .prepare<[], ITaskRow>(
        `SELECT ${TASK_COLUMNS} FROM task
         WHERE isCompleted = 0
         ORDER BY tierAssignedAt ASC, rowid ASC`
      )
      .all()
      .map(rowToTask);
  }

  getCompleted(): ITask[] {
    return this._db
      .prepare<[], ITaskRow>(
        `SELECT ${TASK_COLUMNS} FROM task
         WHERE isCompleted = 1
         ORDER BY completedAt DESC, rowid ASC`
      )
      .all()
      .map(rowToTask);
  }

  getSnapshot(): ITaskSnapshot {
    const read = this._db.transaction(
      (): ITaskSnapshot => ({ active: this.getActive(), completed: this.getCompleted() })
    );
    return read();
  }

  complete(id: string, completedAt: Date): boolean {
    const result = this._db
      .prepare<[number, string]>(
        "UPDATE task SET isCompleted = 1, completedAt = ? WHERE id = ? AND isCompleted = 0"
      )
      .run(toEpochSeconds(completedAt), id);
    return result.changes > 0;
  }

  updateTier(id: string, tier: Tier, assignedAt: Date): boolean {
    const result = this._db
      .prepare<[string, number, string]>(
        "UPDATE task SET tier = ?, tierAssignedAt = ? WHERE id = ? AND isCompleted = 0"
      )
      .run(tier, toEpochSeconds(assignedAt), id);
    return result.changes > 0;
  }

  clearCompleted(): number {
    return this._db.prepare("DELETE FROM task WHERE isCompleted = 1").run().changes;
  }

  clearAll(): number {
    return this._db.prepare("DELETE FROM task").run().changes;
  }

  countActive(tier: Tier): number {
    return this.countActiveByTier()[tier];
  }

  /** Unknown stored tiers count as l1, matching how rows decode */
  countActiveByTier(): Record<Tier, number> {
    const rows = this._db
      .prepare<[], ITierCountRow>(
        `SELECT tier, COUNT(*) AS count FROM task
         WHERE isCompleted = 0
         GROUP BY tier`
      )
      .all();

    const counts = emptyTierCounts();
    for (const row of rows) {
      counts[tierFromStorage(row.tier)] += row.count;
    }
    return counts;
  }
}
