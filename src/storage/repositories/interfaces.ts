/**
 * Repository interface contracts for the tierstash storage layer.
 * These interfaces define the API that concrete SQLite implementations must satisfy.
 */

import type { ITask } from "../../tasks/task.js";
import type { Tier } from "../../tiers/tier.js";

export interface ITaskSnapshot {
  active: ITask[];
  completed: ITask[];
}

export interface ITaskRepository {
  /** Insert a new task. Throws StorageError("duplicate_id") when the id exists. */
  add(task: ITask): void;
  getById(id: string): ITask | null;
  /** Active tasks, oldest tier assignment first; ties in insertion order */
  getActive(): ITask[];
  /** Completed tasks, most recently completed first */
  getCompleted(): ITask[];
  /** Active and completed tasks read in one transaction */
  getSnapshot(): ITaskSnapshot;
  /** Returns false when no active task has this id */
  complete(id: string, completedAt: Date): boolean;
  /** Returns false when no active task has this id */
  updateTier(id: string, tier: Tier, assignedAt: Date): boolean;
  /** Returns the number of deleted rows */
  clearCompleted(): number;
  /** Returns the number of deleted rows */
  clearAll(): number;
  countActive(tier: Tier): number;
  countActiveByTier(): Record<Tier, number>;
}
