/**
 * Escalate command: run one escalation pass immediately
 */

import { Command } from "commander";

import { planEscalations } from "../escalation/escalation-policy.js";
import { formatEscalationBody } from "../notifications/notification-service.js";
import { formatTier, info, success, warn } from "../utils/ui.js";
import { run, withServices } from "./context.js";

export interface IEscalateOptions {
  dryRun?: boolean;
}

export function escalateCommand(program: Command): void {
  program
    .command("escalate")
    .description("Run one escalation pass now")
    .option("--dry-run", "Show what would escalate without writing")
    .action(async (options: IEscalateOptions) => {
      await run(() =>
        withServices(({ clock, config, engine, scheduler }) => {
          if (!config.escalationEnabled) {
            warn("Escalation is disabled (escalationEnabled = false)");
            return;
          }

          if (options.dryRun) {
            const plan = planEscalations(engine.tasks, clock.now(), config.admissionMode);
            if (plan.length === 0) {
              info("No tasks to escalate");
              return;
            }
            for (const item of plan) {
              info(`"${item.task.title}" would move ${formatTier(item.from)} → ${formatTier(item.to)}`);
            }
            return;
          }

          const result = scheduler.runPass(clock.now());
          for (const item of result.escalated) {
            success(formatEscalationBody(item.task.title, item.to));
          }
          for (const item of result.failed) {
            warn(`Could not escalate "${item.task.title}"`);
          }
          if (result.escalated.length === 0 && result.failed.length === 0) {
            info("No tasks to escalate");
          }
        })
      );
    });
}
