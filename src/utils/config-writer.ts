/**
 * Config writer utility for tierstash
 * Saves partial config changes to tierstash.config.json while preserving unknown keys
 */

import * as fs from "fs";
import * as path from "path";

import { CONFIG_FILE_NAME } from "../constants.js";
import type { ITierstashConfig } from "../types.js";

export interface ISaveConfigResult {
  success: boolean;
  error?: string;
}

/**
 * Save partial config changes to the tierstash.config.json file.
 * Reads the existing file, merges changes, and writes back.
 * Preserves unknown keys (like $schema).
 */
export function saveConfig(
  homeDir: string,
  changes: Partial<ITierstashConfig>
): ISaveConfigResult {
  const configPath = path.join(homeDir, CONFIG_FILE_NAME);

  try {
    let existing: Record<string, unknown> = {};
    if (fs.existsSync(configPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
      if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
        existing = Object.fromEntries(Object.entries(parsed));
      }
    } else {
      fs.mkdirSync(homeDir, { recursive: true });
    }

    const merged = { ...existing };
    for (const [key, value] of Object.entries(changes)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }

    // Write back with consistent formatting
    fs.writeFileSync(configPath, JSON.stringify(merged, null, 2) + "\n");

    return { success: true };
  } catch (err) {
    return {
      success: false,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}
