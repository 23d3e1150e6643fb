/**
 * Shared plumbing for task commands: error wrapper, confirmation prompt, and
 * the service graph opened for the duration of one command.
 */

import * as readline from "readline";

import chalk from "chalk";

import { initContainer, resolveServices } from "../di/container.js";
import type { IAppServices } from "../di/container.js";
import { getHomeDir } from "../storage/sqlite/client.js";
import { setLogLevel } from "../utils/logger.js";

/** Wrap an action body so errors surface as clean messages and exit 1. */
export async function run(fn: () => Promise<void> | void): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
}

/**
 * Prompt the user for a yes/no confirmation via readline.
 */
export async function confirmPrompt(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === "y");
    });
  });
}

/**
 * Open the services under the tierstash home, load both task lists, run
 * `fn`, and close the database afterwards.
 */
export async function withServices<T>(fn: (services: IAppServices) => Promise<T> | T): Promise<T> {
  const services = resolveServices(initContainer(getHomeDir()));
  setLogLevel(services.config.logLevel);
  services.engine.reload();
  services.engine.reloadCompleted();
  try {
    return await fn(services);
  } finally {
    services.scheduler.stop();
    services.store.close();
  }
}
