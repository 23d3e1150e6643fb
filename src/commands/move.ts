/**
 * Promote and snooze commands: manual tier moves, one tier at a time
 */

import { Command } from "commander";

import { executeCommand } from "../palette/command-palette.js";
import { info, success } from "../utils/ui.js";
import { run, withServices } from "./context.js";

type MoveKind = "promote" | "snooze";

function registerMove(program: Command, kind: MoveKind, description: string): void {
  program
    .command(kind)
    .description(description)
    .argument("<match...>", "Part of the task title (case-insensitive)")
    .action(async (matchParts: string[]) => {
      await run(() =>
        withServices(({ engine }) => {
          const result = executeCommand(engine, `/${kind} ${matchParts.join(" ")}`);
          if (!result.ok) {
            throw new Error(result.message);
          }
          // A task already at the edge comes back ok with no tier change
          if (result.changed) {
            success(result.message);
          } else {
            info(result.message);
          }
        })
      );
    });
}

export function promoteCommand(program: Command): void {
  registerMove(program, "promote", "Move a task one tier toward L1");
}

export function snoozeCommand(program: Command): void {
  registerMove(program, "snooze", "Move a task one tier toward MEM");
}
