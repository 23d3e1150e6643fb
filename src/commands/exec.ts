/**
 * Exec command: run one palette slash-command, e.g. `tierstash exec /focus`
 */

import { Command } from "commander";

import { executeCommand } from "../palette/command-palette.js";
import { dim, info, renderTaskTable, success } from "../utils/ui.js";
import { run, withServices } from "./context.js";

export function execCommand(program: Command): void {
  program
    .command("exec")
    .description("Run a palette command (/list, /done, /focus, /clear, /promote, /snooze, /help)")
    .argument("<command...>", "Slash-command and its argument")
    .action(async (parts: string[]) => {
      await run(() =>
        withServices(({ clock, engine }) => {
          const result = executeCommand(engine, parts.join(" "));
          if (!result.ok) {
            throw new Error(result.message);
          }

          switch (result.kind) {
            case "list":
            case "completed":
            case "focus":
              dim(result.message);
              if (result.tasks && result.tasks.length > 0) {
                console.log(renderTaskTable(result.tasks, clock.now()));
              }
              break;
            case "help":
              console.log(result.message);
              break;
            default:
              if (result.changed) {
                success(result.message);
              } else {
                info(result.message);
              }
          }
        })
      );
    });
}
