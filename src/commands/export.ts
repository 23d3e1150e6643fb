/**
 * Export command: JSON snapshot of every task
 */

import * as fs from "fs";
import * as path from "path";

import { Command } from "commander";

import { success } from "../utils/ui.js";
import { run, withServices } from "./context.js";

export interface IExportOptions {
  output?: string;
}

export function exportCommand(program: Command): void {
  program
    .command("export")
    .description("Export all tasks as JSON (stdout unless --output is given)")
    .option("-o, --output <file>", "Write the snapshot to a file")
    .action(async (options: IExportOptions) => {
      await run(() =>
        withServices(({ store, engine }) => {
          const json = store.exportSnapshot();
          if (!options.output) {
            console.log(json);
            return;
          }

          const target = path.resolve(options.output);
          fs.mkdirSync(path.dirname(target), { recursive: true });
          fs.writeFileSync(target, json + "\n");
          const count = engine.tasks.length + engine.completedTasks.length;
          success(`Exported ${count} task(s) to ${target}`);
        })
      );
    });
}
