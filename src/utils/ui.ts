/**
 * UI utilities for tierstash
 * Provides colored output, tier badges, and table formatting
 */

import chalk from "chalk";
import Table from "cli-table3";

import type { ITask } from "../tasks/task.js";
import { relativeTimeString } from "../tasks/task.js";
import { TIER_INFO } from "../tiers/tier.js";
import type { Tier } from "../tiers/tier.js";

/**
 * Print a success message with green check prefix
 */
export function success(msg: string): void {
  console.log(chalk.green("✔"), msg);
}

/**
 * Print a warning message with yellow warning prefix
 */
export function warn(msg: string): void {
  console.log(chalk.yellow("⚠"), msg);
}

/**
 * Print an info message with cyan info prefix
 */
export function info(msg: string): void {
  console.log(chalk.cyan("ℹ"), msg);
}

/**
 * Print a bold section header with underline
 */
export function header(title: string): void {
  const line = "─".repeat(Math.max(40, title.length + 4));
  console.log();
  console.log(chalk.bold(title));
  console.log(chalk.dim(line));
}

/**
 * Print dimmed text for secondary information
 */
export function dim(msg: string): void {
  console.log(chalk.dim(msg));
}

/**
 * Format and print a key-value pair with consistent alignment
 */
export function label(key: string, value: string): void {
  const paddedKey = key.padEnd(30);
  console.log(`  ${chalk.dim(paddedKey)}${value}`);
}

/**
 * Create a configured cli-table3 instance with sensible defaults
 */
export function createTable(options?: Table.TableConstructorOptions): Table.Table {
  const defaultOptions: Table.TableConstructorOptions = {
    chars: {
      top: "─",
      "top-mid": "┬",
      "top-left": "┌",
      "top-right": "┐",
      bottom: "─",
      "bottom-mid": "┴",
      "bottom-left": "└",
      "bottom-right": "┘",
      left: "│",
      "left-mid": "├",
      mid: "─",
      "mid-mid": "┼",
      right: "│",
      "right-mid": "┤",
      middle: "│",
    },
    style: {
      "padding-left": 1,
      "padding-right": 1,
      head: ["cyan"],
      border: ["dim"],
    },
  };

  return new Table({ ...defaultOptions, ...options });
}

/**
 * Short tier label in the tier's color, e.g. a red "L1"
 */
export function formatTier(tier: Tier): string {
  const { shortLabel, color } = TIER_INFO[tier];
  return chalk.hex(color).bold(shortLabel);
}

/**
 * Build the task table printed by `list` and `exec`.
 */
export function renderTaskTable(tasks: readonly ITask[], now: Date): string {
  const table = createTable({ head: ["Tier", "Title", "Age"] });
  for (const task of tasks) {
    table.push([formatTier(task.tier), task.title, chalk.dim(relativeTimeString(task, now))]);
  }
  return table.toString();
}
