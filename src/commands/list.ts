/**
 * List command: show active or completed tasks
 */

import { Command } from "commander";

import { TIER_INFO } from "../tiers/tier.js";
import type { ITask } from "../tasks/task.js";
import { dim, header, renderTaskTable } from "../utils/ui.js";
import { resolveTierOption } from "./add.js";
import { run, withServices } from "./context.js";

export interface IListOptions {
  completed?: boolean;
  tier?: string;
}

export function listCommand(program: Command): void {
  program
    .command("list")
    .alias("ls")
    .description("List tasks grouped by tier")
    .option("--completed", "Show completed tasks instead")
    .option("-t, --tier <tier>", "Only show one tier (l1, l2, l3, mem)")
    .action(async (options: IListOptions) => {
      await run(() =>
        withServices(({ clock, engine }) => {
          const tier = options.tier === undefined ? null : resolveTierOption(options.tier, "l1");
          const now = clock.now();

          let tasks: ITask[];
          let title: string;
          if (options.completed) {
            tasks = [...engine.completedTasks];
            title = "Completed";
          } else {
            tasks = engine.groupedByTier().flatMap((group) => group.tasks);
            title = "Active";
          }
          if (tier) {
            tasks = tasks.filter((task) => task.tier === tier);
            title = `${title} · ${TIER_INFO[tier].label}`;
          }

          if (tasks.length === 0) {
            dim(options.completed ? "No completed tasks" : "No active tasks");
            return;
          }

          header(`${title} (${tasks.length})`);
          console.log(renderTaskTable(tasks, now));
        })
      );
    });
}
