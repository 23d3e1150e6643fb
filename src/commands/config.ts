/**
 * Config command group: show or persist tierstash settings
 */

import * as path from "path";

import { Command } from "commander";

import { CONFIG_KEYS, loadConfig, parseConfigAssignment } from "../config.js";
import { CONFIG_FILE_NAME } from "../constants.js";
import { getDbPath, getHomeDir } from "../storage/sqlite/client.js";
import { saveConfig } from "../utils/config-writer.js";
import { header, label, success } from "../utils/ui.js";
import { run } from "./context.js";

export function configCommand(program: Command): void {
  const config = program.command("config").description("Show or change configuration");

  config
    .command("show")
    .description("Print the effective configuration")
    .action(async () => {
      await run(() => {
        const homeDir = getHomeDir();
        const effective = loadConfig(homeDir);

        header("Configuration");
        for (const key of CONFIG_KEYS) {
          label(key, String(effective[key]));
        }

        header("Paths");
        label("home", homeDir);
        label("config file", path.join(homeDir, CONFIG_FILE_NAME));
        label("database", getDbPath(homeDir));
      });
    });

  config
    .command("set")
    .description(`Persist a setting (${CONFIG_KEYS.join(", ")})`)
    .argument("<key>", "Config key")
    .argument("<value>", "New value")
    .action(async (key: string, value: string) => {
      await run(() => {
        const changes = parseConfigAssignment(key, value);
        const result = saveConfig(getHomeDir(), changes);
        if (!result.success) {
          throw new Error(`Failed to save config: ${result.error ?? "unknown error"}`);
        }
        success(`Set ${key} = ${String(Object.values(changes)[0])}`);
      });
    });
}
