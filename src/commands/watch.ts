/**
 * Watch command: run the escalation scheduler in the foreground and print
 * every escalation until interrupted
 */

import { Command } from "commander";
import chalk from "chalk";

import type { IAppServices } from "../di/container.js";
import { dim, info, warn } from "../utils/ui.js";
import { run, withServices } from "./context.js";

export interface IWatchOptions {
  now?: boolean;
}

/**
 * Start the scheduler and resolve once SIGINT or SIGTERM arrives.
 */
export async function watchEscalations(services: IAppServices, options: IWatchOptions): Promise<void> {
  const { config, notifications, scheduler } = services;

  const unsubscribe = notifications.subscribe((notification) => {
    console.log(
      `${chalk.dim(notification.at.toISOString())} ${chalk.bold(notification.title)}: ${notification.body}`
    );
  });

  if (!config.escalationEnabled) {
    warn("Escalation is disabled; no passes will run until escalationEnabled is true");
  }
  if (!config.notificationsEnabled) {
    dim("Notifications are disabled; escalations will not be printed");
  }

  if (options.now) {
    scheduler.runPass();
  }
  scheduler.start();
  info(
    `Watching for escalations (first pass in ${config.escalationInitialDelaySeconds}s, then every ${config.escalationIntervalSeconds}s). Press Ctrl+C to stop.`
  );

  // Scheduler timers are unref'd; this handle keeps the process alive.
  const keepAlive = setInterval(() => undefined, 60_000);

  await new Promise<void>((resolve) => {
    const onSignal = (): void => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });

  clearInterval(keepAlive);
  scheduler.stop();
  unsubscribe();
  dim("Stopped");
}

export function watchCommand(program: Command): void {
  program
    .command("watch")
    .description("Run the escalation scheduler in the foreground")
    .option("--now", "Run one pass immediately before starting the timer")
    .action(async (options: IWatchOptions) => {
      await run(() => withServices((services) => watchEscalations(services, options)));
    });
}
