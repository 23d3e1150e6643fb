/**
 * Done command: complete the first active task matching a title fragment
 */

import { Command } from "commander";

import { TASK_NOT_FOUND } from "../palette/command-palette.js";
import { success } from "../utils/ui.js";
import { run, withServices } from "./context.js";

export function doneCommand(program: Command): void {
  program
    .command("done")
    .description("Complete the first active task whose title contains <match>")
    .argument("<match...>", "Part of the task title (case-insensitive)")
    .action(async (matchParts: string[]) => {
      await run(() =>
        withServices(({ engine }) => {
          const task = engine.findTask(matchParts.join(" "));
          if (!task) {
            throw new Error(TASK_NOT_FOUND);
          }
          if (!engine.completeTask(task)) {
            throw new Error(`Could not complete "${task.title}"`);
          }
          success(`Completed "${task.title}"`);
        })
      );
    });
}
