/**
 * Tiering engine: the in-memory view of the task list.
 *
 * Holds a refreshable copy of the store's active and completed tasks,
 * applies user mutations through the store, and tells subscribers whenever
 * the copy is refreshed.
 */

import { inject, injectable } from "tsyringe";

import { TaskStore } from "../storage/task-store.js";
import { createTask } from "../tasks/task.js";
import type { ITask } from "../tasks/task.js";
import { TIERS, emptyTierCounts, previousTier, promotedTier } from "../tiers/tier.js";
import type { Tier } from "../tiers/tier.js";
import type { IClock } from "../utils/clock.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("engine");

export type EngineChangeReason = "reload" | "reload_completed" | "escalation";

export interface IEngineChange {
  reason: EngineChangeReason;
  tasks: readonly ITask[];
  completedTasks: readonly ITask[];
  lastEscalationTime: Date | null;
}

export type EngineListener = (change: IEngineChange) => void;

export interface ITierGroup {
  tier: Tier;
  tasks: ITask[];
}

@injectable()
export class TieringEngine {
  private _tasks: ITask[] = [];
  private _completedTasks: ITask[] = [];
  private _lastEscalationTime: Date | null = null;
  private readonly listeners = new Set<EngineListener>();

  constructor(
    @inject("TaskStore") private readonly store: TaskStore,
    @inject("Clock") private readonly clock: IClock,
  ) {}

  /** Active tasks, ascending tierAssignedAt */
  get tasks(): readonly ITask[] {
    return this._tasks;
  }

  /** Completed tasks, most recent first */
  get completedTasks(): readonly ITask[] {
    return this._completedTasks;
  }

  get lastEscalationTime(): Date | null {
    return this._lastEscalationTime;
  }

  /** First tier in display order holding an active task */
  get highestActiveTier(): Tier | null {
    return TIERS.find((tier) => this._tasks.some((task) => task.tier === tier)) ?? null;
  }

  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  reload(): void {
    this._tasks = this.store.fetchActive();
    this.emit("reload");
  }

  reloadCompleted(): void {
    this._completedTasks = this.store.fetchCompleted();
    this.emit("reload_completed");
  }

  /**
   * Add a task with the given title. Whitespace is trimmed; an empty title
   * is ignored and returns null.
   */
  addTask(title: string, tier: Tier): ITask | null {
    const trimmed = title.trim();
    if (trimmed.length === 0) {
      log.debug("Ignoring empty task title");
      return null;
    }

    const task = createTask({ title: trimmed, tier, now: this.clock.now() });
    const saved = this.store.add(task);
    this.reload();
    return saved ? task : null;
  }

  completeTask(task: ITask): boolean {
    const changed = this.store.complete(task.id, this.clock.now());
    this.reload();
    this.reloadCompleted();
    return changed;
  }

  /** Move one tier toward L1. No-op at L1. */
  promoteTask(task: ITask): boolean {
    const target = promotedTier(task.tier);
    if (!target) {
      return false;
    }
    const changed = this.store.updateTier(task.id, target, this.clock.now());
    this.reload();
    return changed;
  }

  /** Move one tier toward MEM. No-op at MEM. */
  snoozeTask(task: ITask): boolean {
    const target = previousTier(task.tier);
    if (!target) {
      return false;
    }
    const changed = this.store.updateTier(task.id, target, this.clock.now());
    this.reload();
    return changed;
  }

  clearCompleted(): boolean {
    const changed = this.store.clearCompleted();
    this.reloadCompleted();
    return changed;
  }

  clearAllData(): boolean {
    const changed = this.store.clearAll();
    this.reload();
    this.reloadCompleted();
    return changed;
  }

  activeTasks(tier: Tier): ITask[] {
    return this._tasks.filter((task) => task.tier === tier);
  }

  /**
   * First active task whose title contains `match`, case-insensitively.
   */
  findTask(match: string): ITask | null {
    const needle = match.trim().toLowerCase();
    if (needle.length === 0) {
      return null;
    }
    return this._tasks.find((task) => task.title.toLowerCase().includes(needle)) ?? null;
  }

  tierCounts(): Record<Tier, number> {
    const counts = emptyTierCounts();
    for (const task of this._tasks) {
      counts[task.tier] += 1;
    }
    return counts;
  }

  /** Non-empty tiers in display order */
  groupedByTier(): ITierGroup[] {
    return TIERS.map((tier) => ({ tier, tasks: this.activeTasks(tier) })).filter(
      (group) => group.tasks.length > 0,
    );
  }

  /**
   * Refresh after the scheduler committed at least one escalation.
   */
  recordEscalation(now: Date): void {
    this._tasks = this.store.fetchActive();
    this._lastEscalationTime = new Date(now.getTime());
    this.emit("escalation");
  }

  private emit(reason: EngineChangeReason): void {
    const change: IEngineChange = {
      reason,
      tasks: this._tasks,
      completedTasks: this._completedTasks,
      lastEscalationTime: this._lastEscalationTime,
    };
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        log.error("Engine listener failed", { reason, error: err });
      }
    }
  }
}
