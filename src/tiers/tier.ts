/**
 * Tier taxonomy for tierstash tasks.
 *
 * Four fixed tiers named after cache levels. L1 is the hottest (most urgent),
 * MEM is parked work that never escalates on its own.
 */

// ---------------------------------------------------------------------------
// Tiers
// ---------------------------------------------------------------------------

/** Display order, hottest first. */
export const TIERS = ["l1", "l2", "l3", "mem"] as const;
export type Tier = (typeof TIERS)[number];

export interface ITierInfo {
  /** Long label, e.g. "L1 Cache" */
  label: string;
  /** Short label, e.g. "L1" */
  shortLabel: string;
  /** Hex color used by terminal output */
  color: string;
  /** Position in display order (L1 = 0) */
  sortOrder: number;
  /** Seconds a task must dwell before auto-escalation; 0 = never */
  escalationThresholdSeconds: number;
  /** Tier a task escalates into, null when the tier never escalates */
  escalationTarget: Tier | null;
  /** Escalation is allowed while the target tier holds fewer active tasks than this */
  targetTierCapacity: number;
  /** Tab-style cycling order (wraps around) */
  manualNext: Tier;
  /** Snooze / demote target, null at the bottom */
  manualPrevious: Tier | null;
  /** Promote target, null at the top */
  manualPromoted: Tier | null;
}

export const TIER_INFO: Record<Tier, ITierInfo> = {
  l1: {
    label: "L1 Cache",
    shortLabel: "L1",
    color: "#FF453A",
    sortOrder: 0,
    escalationThresholdSeconds: 0,
    escalationTarget: null,
    targetTierCapacity: 0,
    manualNext: "l2",
    manualPrevious: "l2",
    manualPromoted: null,
  },
  l2: {
    label: "L2 Cache",
    shortLabel: "L2",
    color: "#FF9F0A",
    sortOrder: 1,
    escalationThresholdSeconds: 2 * 3600,
    escalationTarget: "l1",
    targetTierCapacity: 3,
    manualNext: "l3",
    manualPrevious: "l3",
    manualPromoted: "l1",
  },
  l3: {
    label: "L3 Cache",
    shortLabel: "L3",
    color: "#30D158",
    sortOrder: 2,
    escalationThresholdSeconds: 5 * 3600,
    escalationTarget: "l2",
    targetTierCapacity: 3,
    manualNext: "mem",
    manualPrevious: "mem",
    manualPromoted: "l2",
  },
  mem: {
    label: "Main Memory",
    shortLabel: "MEM",
    color: "#636366",
    sortOrder: 3,
    escalationThresholdSeconds: 0,
    escalationTarget: null,
    targetTierCapacity: 0,
    manualNext: "l1",
    manualPrevious: null,
    manualPromoted: "l3",
  },
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Check if a string is a stored tier value.
 */
export function isTier(value: string): value is Tier {
  return (TIERS as readonly string[]).includes(value);
}

/**
 * Parse a tier from user input: accepts the stored value ("l2") or the
 * short label ("L2", "MEM"), case-insensitively.
 */
export function parseTier(input: string): Tier | null {
  const normalized = input.trim().toLowerCase();
  return isTier(normalized) ? normalized : null;
}

/**
 * Decode a tier read back from storage. Unknown values fall back to L1.
 */
export function tierFromStorage(value: string): Tier {
  return isTier(value) ? value : "l1";
}

export function promotedTier(tier: Tier): Tier | null {
  return TIER_INFO[tier].manualPromoted;
}

export function previousTier(tier: Tier): Tier | null {
  return TIER_INFO[tier].manualPrevious;
}

export function nextTier(tier: Tier): Tier {
  return TIER_INFO[tier].manualNext;
}

/**
 * Compare two tiers by display order (L1 first).
 */
export function compareTiers(a: Tier, b: Tier): number {
  return TIER_INFO[a].sortOrder - TIER_INFO[b].sortOrder;
}

/**
 * Build a zeroed per-tier counter.
 */
export function emptyTierCounts(): Record<Tier, number> {
  return { l1: 0, l2: 0, l3: 0, mem: 0 };
}
