/**
 * Clear command: drop completed tasks, or every task with --all
 */

import { Command } from "commander";

import { success, warn } from "../utils/ui.js";
import { confirmPrompt, run, withServices } from "./context.js";

export interface IClearOptions {
  all?: boolean;
  yes?: boolean;
}

export function clearCommand(program: Command): void {
  program
    .command("clear")
    .description("Clear completed tasks")
    .option("--all", "Delete every task, active and completed")
    .option("-y, --yes", "Skip the confirmation prompt for --all")
    .action(async (options: IClearOptions) => {
      await run(async () => {
        if (options.all && !options.yes) {
          const confirmed = await confirmPrompt("Delete ALL tasks, including active ones? [y/N] ");
          if (!confirmed) {
            warn("Aborted");
            return;
          }
        }

        await withServices(({ engine }) => {
          if (options.all) {
            if (!engine.clearAllData()) {
              throw new Error("Could not clear tasks");
            }
            success("All tasks cleared");
            return;
          }
          if (!engine.clearCompleted()) {
            throw new Error("Could not clear completed tasks");
          }
          success("Completed tasks cleared");
        });
      });
    });
}
