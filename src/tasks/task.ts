/**
 * Task entity and its time-derived display helpers.
 */

import { randomUUID } from "crypto";

import type { Tier } from "../tiers/tier.js";

export interface ITask {
  id: string;
  title: string;
  tier: Tier;
  isCompleted: boolean;
  createdAt: Date;
  /** Escalation clock; changes on every tier mutation, not on completion */
  tierAssignedAt: Date;
  /** Set exactly once, when the task is completed */
  completedAt: Date | null;
}

export interface ICreateTaskInput {
  title: string;
  tier: Tier;
  now: Date;
  id?: string;
}

/**
 * Build a fresh active task. Both timestamps are set to `now`.
 */
export function createTask(input: ICreateTaskInput): ITask {
  return {
    id: input.id ?? randomUUID(),
    title: input.title,
    tier: input.tier,
    isCompleted: false,
    createdAt: new Date(input.now.getTime()),
    tierAssignedAt: new Date(input.now.getTime()),
    completedAt: null,
  };
}

/**
 * Seconds the task has spent in its current tier.
 */
export function dwellSeconds(task: ITask, now: Date): number {
  return (now.getTime() - task.tierAssignedAt.getTime()) / 1000;
}

/**
 * Relative age string for display, e.g. "2h ago" or "just now".
 */
export function relativeTimeString(task: ITask, now: Date): string {
  const interval = (now.getTime() - task.createdAt.getTime()) / 1000;
  if (interval < 60) {
    return "just now";
  }
  if (interval < 3600) {
    return `${Math.floor(interval / 60)}m ago`;
  }
  if (interval < 86400) {
    return `${Math.floor(interval / 3600)}h ago`;
  }
  return `${Math.floor(interval / 86400)}d ago`;
}
