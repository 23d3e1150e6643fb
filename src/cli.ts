#!/usr/bin/env node

import "reflect-metadata";

import { Command } from "commander";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { addCommand } from "./commands/add.js";
import { listCommand } from "./commands/list.js";
import { doneCommand } from "./commands/done.js";
import { promoteCommand, snoozeCommand } from "./commands/move.js";
import { clearCommand } from "./commands/clear.js";
import { exportCommand } from "./commands/export.js";
import { execCommand } from "./commands/exec.js";
import { escalateCommand } from "./commands/escalate.js";
import { watchCommand } from "./commands/watch.js";
import { configCommand } from "./commands/config.js";

// Get package.json version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, "..", "package.json");
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
const version =
  packageJson !== null &&
  typeof packageJson === "object" &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

const program = new Command();

program
  .name("tierstash")
  .description("Tiered task list where waiting work escalates toward L1")
  .version(version);

// Task commands
addCommand(program);
listCommand(program);
doneCommand(program);
promoteCommand(program);
snoozeCommand(program);
clearCommand(program);

// Palette passthrough
execCommand(program);

// Escalation
escalateCommand(program);
watchCommand(program);

// Data and settings
exportCommand(program);
configCommand(program);

await program.parseAsync();
