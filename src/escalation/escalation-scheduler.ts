/**
 * Escalation scheduler.
 *
 * Runs an escalation pass on a timer: first after the initial delay, then
 * every interval. A pass reads the engine snapshot, plans with
 * planEscalations, commits each move through the store, notifies, and asks
 * the engine to refresh.
 */

import { inject, injectable } from "tsyringe";

import { TieringEngine } from "../engine/tiering-engine.js";
import { NotificationService } from "../notifications/notification-service.js";
import { TaskStore } from "../storage/task-store.js";
import type { ITierstashConfig } from "../types.js";
import type { IClock } from "../utils/clock.js";
import { createLogger } from "../utils/logger.js";
import { planEscalations } from "./escalation-policy.js";
import type { IEscalation } from "./escalation-policy.js";

const log = createLogger("escalation");

export interface IEscalationPassResult {
  /** True when escalation is disabled or a pass was already running */
  skipped: boolean;
  escalated: IEscalation[];
  failed: IEscalation[];
}

@injectable()
export class EscalationScheduler {
  private initialTimer: ReturnType<typeof setTimeout> | null = null;
  private intervalTimer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(
    @inject(TieringEngine) private readonly engine: TieringEngine,
    @inject("TaskStore") private readonly store: TaskStore,
    @inject(NotificationService) private readonly notifications: NotificationService,
    @inject("Clock") private readonly clock: IClock,
    @inject("Config") private readonly config: ITierstashConfig,
  ) {}

  get isStarted(): boolean {
    return this.initialTimer !== null || this.intervalTimer !== null;
  }

  start(): void {
    if (this.isStarted) return;

    const initialDelayMs = this.config.escalationInitialDelaySeconds * 1000;
    const intervalMs = this.config.escalationIntervalSeconds * 1000;

    this.initialTimer = setTimeout(() => {
      this.initialTimer = null;
      this.tick();
      this.intervalTimer = setInterval(() => {
        this.tick();
      }, intervalMs);
      this.intervalTimer.unref?.();
    }, initialDelayMs);
    this.initialTimer.unref?.();

    log.debug("Scheduler started", {
      initialDelaySeconds: this.config.escalationInitialDelaySeconds,
      intervalSeconds: this.config.escalationIntervalSeconds,
    });
  }

  stop(): void {
    if (this.initialTimer) {
      clearTimeout(this.initialTimer);
      this.initialTimer = null;
    }
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
  }

  /**
   * Run one escalation pass at `now`.
   */
  runPass(now: Date = this.clock.now()): IEscalationPassResult {
    if (!this.config.escalationEnabled) {
      return { skipped: true, escalated: [], failed: [] };
    }
    if (this.running) {
      log.warn("Escalation pass already running, skipping");
      return { skipped: true, escalated: [], failed: [] };
    }

    this.running = true;
    try {
      const plan = planEscalations(this.engine.tasks, now, this.config.admissionMode);
      const escalated: IEscalation[] = [];
      const failed: IEscalation[] = [];

      for (const escalation of plan) {
        if (this.store.updateTier(escalation.task.id, escalation.to, now)) {
          escalated.push(escalation);
          this.notifications.notifyEscalation(escalation.task.title, escalation.to, now);
        } else {
          log.warn("Escalation write failed", { id: escalation.task.id, to: escalation.to });
          failed.push(escalation);
        }
      }

      if (escalated.length > 0) {
        this.engine.recordEscalation(now);
      }
      log.debug("Escalation pass finished", {
        planned: plan.length,
        escalated: escalated.length,
        failed: failed.length,
      });
      return { skipped: false, escalated, failed };
    } finally {
      this.running = false;
    }
  }

  /** Timer path: refresh the engine from the store, then run a pass. */
  private tick(): void {
    if (!this.config.escalationEnabled) return;
    this.engine.reload();
    this.runPass(this.clock.now());
  }
}
