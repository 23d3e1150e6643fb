/**
 * In-process escalation notifications.
 *
 * Builds the user-facing message for an automatic escalation and hands it to
 * subscribers. Delivery to an OS notification center is left to the
 * subscriber (the `watch` command prints them).
 */

import { inject, injectable } from "tsyringe";

import { TIER_INFO } from "../tiers/tier.js";
import type { Tier } from "../tiers/tier.js";
import type { ITierstashConfig } from "../types.js";
import type { IClock } from "../utils/clock.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("notify");

export const ESCALATION_NOTIFICATION_TITLE = "Task Escalated";

export interface IEscalationNotification {
  title: string;
  body: string;
  taskTitle: string;
  tier: Tier;
  at: Date;
}

export type NotificationListener = (notification: IEscalationNotification) => void;

/**
 * Body text, e.g. `"Write report" escalated to L1`.
 */
export function formatEscalationBody(taskTitle: string, tier: Tier): string {
  return `"${taskTitle}" escalated to ${TIER_INFO[tier].shortLabel}`;
}

@injectable()
export class NotificationService {
  private readonly listeners = new Set<NotificationListener>();

  constructor(
    @inject("Config") private readonly config: ITierstashConfig,
    @inject("Clock") private readonly clock: IClock
  ) {}

  subscribe(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Announce one automatic escalation, stamped with the clock's time unless
   * `at` is given. Returns null when notifications are disabled.
   */
  notifyEscalation(
    taskTitle: string,
    tier: Tier,
    at: Date = this.clock.now()
  ): IEscalationNotification | null {
    if (!this.config.notificationsEnabled) {
      return null;
    }

    const notification: IEscalationNotification = {
      title: ESCALATION_NOTIFICATION_TITLE,
      body: formatEscalationBody(taskTitle, tier),
      taskTitle,
      tier,
      at,
    };
    log.info(notification.body, { tier });

    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (err) {
        log.error("Notification listener failed", { error: err });
      }
    }
    return notification;
  }
}
