/**
 * Global test setup for tierstash
 * Loads the decorator metadata polyfill and clears environment variables that
 * would leak the developer's own settings into tests.
 */

import "reflect-metadata";

import chalk from "chalk";

import { ENV_PREFIX } from "./constants.js";

// Clear every TIERSTASH_* variable (config overrides and TIERSTASH_HOME)
for (const varName of Object.keys(process.env)) {
  if (varName.startsWith(ENV_PREFIX)) {
    delete process.env[varName];
  }
}

// Plain output so assertions can match text exactly
chalk.level = 0;
process.env.NO_COLOR = "1";
