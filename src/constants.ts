/**
 * Default configuration values for tierstash
 */

import type { Tier } from "./tiers/tier.js";
import type { AdmissionMode, LogLevel } from "./types.js";

// Escalation Configuration (in seconds)
export const DEFAULT_ESCALATION_ENABLED = true;
export const DEFAULT_ESCALATION_INTERVAL = 300;
export const DEFAULT_ESCALATION_INITIAL_DELAY = 60;
export const DEFAULT_ADMISSION_MODE: AdmissionMode = "pass-start";
export const VALID_ADMISSION_MODES: AdmissionMode[] = ["pass-start", "sequential"];

// Notification Configuration
export const DEFAULT_NOTIFICATIONS_ENABLED = true;

// Task Configuration
export const DEFAULT_TIER: Tier = "l1";

// Log Configuration
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
export const VALID_LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

// File Names and Paths
export const CONFIG_FILE_NAME = "tierstash.config.json";
export const GLOBAL_CONFIG_DIR = ".tierstash";
export const STATE_DB_FILE_NAME = "tierstash.db";

// Environment
export const HOME_ENV_VAR = "TIERSTASH_HOME";
export const ENV_PREFIX = "TIERSTASH_";
