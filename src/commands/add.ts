/**
 * Add command: create a task in a tier
 */

import { Command } from "commander";

import { parseTier } from "../tiers/tier.js";
import type { Tier } from "../tiers/tier.js";
import { formatTier, success } from "../utils/ui.js";
import { run, withServices } from "./context.js";

export interface IAddOptions {
  tier?: string;
}

/**
 * Resolve a --tier option, throwing a user-facing error for unknown values.
 */
export function resolveTierOption(value: string | undefined, fallback: Tier): Tier {
  if (value === undefined) {
    return fallback;
  }
  const tier = parseTier(value);
  if (!tier) {
    throw new Error(`Invalid tier "${value}". Use one of: l1, l2, l3, mem`);
  }
  return tier;
}

export function addCommand(program: Command): void {
  program
    .command("add")
    .description("Add a task")
    .argument("<title...>", "Task title")
    .option("-t, --tier <tier>", "Tier to place the task in (l1, l2, l3, mem)")
    .action(async (titleParts: string[], options: IAddOptions) => {
      await run(() =>
        withServices(({ config, engine }) => {
          const tier = resolveTierOption(options.tier, config.defaultTier);
          const title = titleParts.join(" ");
          if (title.trim().length === 0) {
            throw new Error("Task title cannot be empty");
          }

          const task = engine.addTask(title, tier);
          if (!task) {
            throw new Error("Could not save task");
          }
          success(`Added "${task.title}" to ${formatTier(task.tier)}`);
        })
      );
    });
}
