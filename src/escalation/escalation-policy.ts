/**
 * Pure escalation planning.
 *
 * Given a snapshot of active tasks, decide which tasks move one tier toward
 * L1. No I/O; the scheduler commits the plan.
 */

import { dwellSeconds } from "../tasks/task.js";
import type { ITask } from "../tasks/task.js";
import { TIER_INFO, emptyTierCounts } from "../tiers/tier.js";
import type { Tier } from "../tiers/tier.js";
import type { AdmissionMode } from "../types.js";

export interface IEscalation {
  task: ITask;
  from: Tier;
  to: Tier;
}

/**
 * Plan the escalations for one pass.
 *
 * Tasks are visited in snapshot order (ascending tierAssignedAt). In
 * "pass-start" mode every capacity check counts occupancy from the snapshot
 * as it was when the pass started. In "sequential" mode each admitted
 * escalation is added to the destination's count before the next check.
 */
export function planEscalations(
  snapshot: readonly ITask[],
  now: Date,
  mode: AdmissionMode = "pass-start",
): IEscalation[] {
  const occupancy = emptyTierCounts();
  for (const task of snapshot) {
    if (!task.isCompleted) {
      occupancy[task.tier] += 1;
    }
  }

  const plan: IEscalation[] = [];
  for (const task of snapshot) {
    if (task.isCompleted) continue;

    const info = TIER_INFO[task.tier];
    const target = info.escalationTarget;
    if (!target || info.escalationThresholdSeconds <= 0) continue;
    if (dwellSeconds(task, now) < info.escalationThresholdSeconds) continue;
    if (occupancy[target] >= info.targetTierCapacity) continue;

    plan.push({ task, from: task.tier, to: target });

    if (mode === "sequential") {
      occupancy[target] += 1;
      occupancy[task.tier] -= 1;
    }
  }
  return plan;
}
