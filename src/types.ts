/**
 * Type definitions for tierstash
 */

import type { Tier } from "./tiers/tier.js";

/**
 * How capacity is counted inside one escalation pass.
 * - "pass-start": occupancy comes from the snapshot read at the start of the pass
 * - "sequential": occupancy is recounted after every admitted escalation
 */
export type AdmissionMode = "pass-start" | "sequential";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Complete tierstash configuration
 */
export interface ITierstashConfig {
  // Escalation

  /** Global switch for the background escalation pass */
  escalationEnabled: boolean;

  /** Seconds between escalation passes */
  escalationIntervalSeconds: number;

  /** Seconds before the first escalation pass after start */
  escalationInitialDelaySeconds: number;

  /** Capacity counting rule within a single pass */
  admissionMode: AdmissionMode;

  // Notifications

  /** Whether escalation events are handed to notification subscribers */
  notificationsEnabled: boolean;

  // Tasks

  /** Tier used by `add` when no tier is given */
  defaultTier: Tier;

  // Logging

  /** Minimum level written by the structured logger */
  logLevel: LogLevel;
}
