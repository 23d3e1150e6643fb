/**
 * Configuration loader for tierstash
 * Loads config from: defaults -> config file -> environment variables
 */

import * as fs from "fs";
import * as path from "path";

import {
  CONFIG_FILE_NAME,
  DEFAULT_ADMISSION_MODE,
  DEFAULT_ESCALATION_ENABLED,
  DEFAULT_ESCALATION_INITIAL_DELAY,
  DEFAULT_ESCALATION_INTERVAL,
  DEFAULT_LOG_LEVEL,
  DEFAULT_NOTIFICATIONS_ENABLED,
  DEFAULT_TIER,
  VALID_ADMISSION_MODES,
  VALID_LOG_LEVELS,
} from "./constants.js";
import { parseTier } from "./tiers/tier.js";
import type { AdmissionMode, ITierstashConfig, LogLevel } from "./types.js";

/** Lower bounds, in seconds */
export const MIN_ESCALATION_INTERVAL = 1;
export const MIN_ESCALATION_INITIAL_DELAY = 0;
/** Largest delay Node timers accept (2^31 - 1 ms), in whole seconds */
export const MAX_TIMER_SECONDS = 2_147_483;

export const CONFIG_KEYS = [
  "escalationEnabled",
  "notificationsEnabled",
  "escalationIntervalSeconds",
  "escalationInitialDelaySeconds",
  "admissionMode",
  "defaultTier",
  "logLevel",
] as const satisfies readonly (keyof ITierstashConfig)[];

export type ConfigKey = (typeof CONFIG_KEYS)[number];

/**
 * Get the default configuration values
 */
export function getDefaultConfig(): ITierstashConfig {
  return {
    // Escalation
    escalationEnabled: DEFAULT_ESCALATION_ENABLED,
    escalationIntervalSeconds: DEFAULT_ESCALATION_INTERVAL,
    escalationInitialDelaySeconds: DEFAULT_ESCALATION_INITIAL_DELAY,
    admissionMode: DEFAULT_ADMISSION_MODE,

    // Notifications
    notificationsEnabled: DEFAULT_NOTIFICATIONS_ENABLED,

    // Tasks
    defaultTier: DEFAULT_TIER,

    // Logging
    logLevel: DEFAULT_LOG_LEVEL,
  };
}

/**
 * Load configuration from a JSON file
 */
function loadConfigFile(configPath: string): Partial<ITierstashConfig> | null {
  try {
    if (!fs.existsSync(configPath)) {
      return null;
    }

    const content = fs.readFileSync(configPath, "utf-8");
    const rawConfig: unknown = JSON.parse(content);
    if (rawConfig === null || typeof rawConfig !== "object" || Array.isArray(rawConfig)) {
      throw new Error("expected a JSON object");
    }

    return normalizeConfig(Object.fromEntries(Object.entries(rawConfig)));
  } catch (error) {
    // If file exists but can't be parsed, warn but don't fail
    console.warn(
      `Warning: Could not parse config file at ${configPath}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
    return null;
  }
}

/**
 * Keep the recognised, well-typed keys of a raw config object.
 * Out-of-range numbers and unknown enum values are dropped.
 */
function normalizeConfig(rawConfig: Record<string, unknown>): Partial<ITierstashConfig> {
  const normalized: Partial<ITierstashConfig> = {};

  const readString = (value: unknown): string | undefined =>
    typeof value === "string" ? value : undefined;
  const readNumber = (value: unknown): number | undefined =>
    typeof value === "number" && !Number.isNaN(value) ? value : undefined;
  const readBoolean = (value: unknown): boolean | undefined =>
    typeof value === "boolean" ? value : undefined;

  normalized.escalationEnabled = readBoolean(rawConfig.escalationEnabled);
  normalized.notificationsEnabled = readBoolean(rawConfig.notificationsEnabled);
  normalized.escalationIntervalSeconds = validateInterval(
    readNumber(rawConfig.escalationIntervalSeconds)
  );
  normalized.escalationInitialDelaySeconds = validateInitialDelay(
    readNumber(rawConfig.escalationInitialDelaySeconds)
  );
  normalized.admissionMode = validateAdmissionMode(readString(rawConfig.admissionMode) ?? "") ?? undefined;
  normalized.defaultTier = parseTier(readString(rawConfig.defaultTier) ?? "") ?? undefined;
  normalized.logLevel = validateLogLevel(readString(rawConfig.logLevel) ?? "") ?? undefined;

  return normalized;
}

/**
 * Parse a boolean string value
 */
export function parseBoolean(value: string): boolean | null {
  const normalized = value.toLowerCase().trim();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  return null;
}

function parseSeconds(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

function validateInterval(value: number | undefined): number | undefined {
  return value !== undefined && value >= MIN_ESCALATION_INTERVAL && value <= MAX_TIMER_SECONDS
    ? value
    : undefined;
}

function validateInitialDelay(value: number | undefined): number | undefined {
  return value !== undefined && value >= MIN_ESCALATION_INITIAL_DELAY && value <= MAX_TIMER_SECONDS
    ? value
    : undefined;
}

/**
 * Validate and return an admission mode value
 */
export function validateAdmissionMode(value: string): AdmissionMode | null {
  return VALID_ADMISSION_MODES.find((mode) => mode === value.trim()) ?? null;
}

/**
 * Validate and return a log level value
 */
export function validateLogLevel(value: string): LogLevel | null {
  const normalized = value.trim().toLowerCase();
  return VALID_LOG_LEVELS.find((level) => level === normalized) ?? null;
}

/**
 * Merge configuration layers
 * Environment values take precedence over file values
 */
function mergeConfigs(
  base: ITierstashConfig,
  fileConfig: Partial<ITierstashConfig> | null,
  envConfig: Partial<ITierstashConfig>
): ITierstashConfig {
  const merged: ITierstashConfig = { ...base };

  for (const layer of [fileConfig, envConfig]) {
    if (!layer) continue;
    if (layer.escalationEnabled !== undefined) merged.escalationEnabled = layer.escalationEnabled;
    if (layer.notificationsEnabled !== undefined)
      merged.notificationsEnabled = layer.notificationsEnabled;
    if (layer.escalationIntervalSeconds !== undefined)
      merged.escalationIntervalSeconds = layer.escalationIntervalSeconds;
    if (layer.escalationInitialDelaySeconds !== undefined)
      merged.escalationInitialDelaySeconds = layer.escalationInitialDelaySeconds;
    if (layer.admissionMode !== undefined) merged.admissionMode = layer.admissionMode;
    if (layer.defaultTier !== undefined) merged.defaultTier = layer.defaultTier;
    if (layer.logLevel !== undefined) merged.logLevel = layer.logLevel;
  }

  return merged;
}

/**
 * Read TIERSTASH_* environment overrides. Invalid values are ignored.
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): Partial<ITierstashConfig> {
  const envConfig: Partial<ITierstashConfig> = {};

  if (env.TIERSTASH_ESCALATION_ENABLED) {
    const enabled = parseBoolean(env.TIERSTASH_ESCALATION_ENABLED);
    if (enabled !== null) {
      envConfig.escalationEnabled = enabled;
    }
  }

  if (env.TIERSTASH_NOTIFICATIONS_ENABLED) {
    const enabled = parseBoolean(env.TIERSTASH_NOTIFICATIONS_ENABLED);
    if (enabled !== null) {
      envConfig.notificationsEnabled = enabled;
    }
  }

  if (env.TIERSTASH_ESCALATION_INTERVAL) {
    const interval = validateInterval(parseSeconds(env.TIERSTASH_ESCALATION_INTERVAL));
    if (interval !== undefined) {
      envConfig.escalationIntervalSeconds = interval;
    }
  }

  if (env.TIERSTASH_ESCALATION_INITIAL_DELAY) {
    const delay = validateInitialDelay(parseSeconds(env.TIERSTASH_ESCALATION_INITIAL_DELAY));
    if (delay !== undefined) {
      envConfig.escalationInitialDelaySeconds = delay;
    }
  }

  if (env.TIERSTASH_ADMISSION_MODE) {
    const mode = validateAdmissionMode(env.TIERSTASH_ADMISSION_MODE);
    if (mode !== null) {
      envConfig.admissionMode = mode;
    }
  }

  if (env.TIERSTASH_DEFAULT_TIER) {
    const tier = parseTier(env.TIERSTASH_DEFAULT_TIER);
    if (tier !== null) {
      envConfig.defaultTier = tier;
    }
  }

  if (env.TIERSTASH_LOG_LEVEL) {
    const level = validateLogLevel(env.TIERSTASH_LOG_LEVEL);
    if (level !== null) {
      envConfig.logLevel = level;
    }
  }

  return envConfig;
}

/**
 * Load tierstash configuration
 * Priority: defaults < config file < environment variables
 *
 * @param homeDir - Directory holding tierstash.config.json
 */
export function loadConfig(homeDir: string, env: NodeJS.ProcessEnv = process.env): ITierstashConfig {
  const configPath = path.join(homeDir, CONFIG_FILE_NAME);
  const fileConfig = loadConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  return mergeConfigs(getDefaultConfig(), fileConfig, envConfig);
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

/**
 * Turn a `config set <key> <value>` pair into a partial config.
 * Throws with a user-facing message when the key or value is invalid.
 */
export function parseConfigAssignment(key: string, value: string): Partial<ITierstashConfig> {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }

  switch (key) {
    case "escalationEnabled":
    case "notificationsEnabled": {
      const parsed = parseBoolean(value);
      if (parsed === null) {
        throw new Error(`${key} must be true or false`);
      }
      return key === "escalationEnabled"
        ? { escalationEnabled: parsed }
        : { notificationsEnabled: parsed };
    }
    case "escalationIntervalSeconds": {
      const parsed = validateInterval(parseSeconds(value));
      if (parsed === undefined) {
        throw new Error(
          `${key} must be a number between ${MIN_ESCALATION_INTERVAL} and ${MAX_TIMER_SECONDS}`
        );
      }
      return { escalationIntervalSeconds: parsed };
    }
    case "escalationInitialDelaySeconds": {
      const parsed = validateInitialDelay(parseSeconds(value));
      if (parsed === undefined) {
        throw new Error(
          `${key} must be a number between ${MIN_ESCALATION_INITIAL_DELAY} and ${MAX_TIMER_SECONDS}`
        );
      }
      return { escalationInitialDelaySeconds: parsed };
    }
    case "admissionMode": {
      const parsed = validateAdmissionMode(value);
      if (parsed === null) {
        throw new Error(`${key} must be one of: ${VALID_ADMISSION_MODES.join(", ")}`);
      }
      return { admissionMode: parsed };
    }
    case "defaultTier": {
      const parsed = parseTier(value);
      if (parsed === null) {
        throw new Error(`${key} must be one of: l1, l2, l3, mem`);
      }
      return { defaultTier: parsed };
    }
    case "logLevel": {
      const parsed = validateLogLevel(value);
      if (parsed === null) {
        throw new Error(`${key} must be one of: ${VALID_LOG_LEVELS.join(", ")}`);
      }
      return { logLevel: parsed };
    }
  }
}
