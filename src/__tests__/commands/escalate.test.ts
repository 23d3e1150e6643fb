/**
 * Tests for the escalate and watch commands
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { escalateCommand } from "../../commands/escalate.js";
import { watchEscalations } from "../../commands/watch.js";
import { getDefaultConfig } from "../../config.js";
import { initContainer, resolveServices } from "../../di/container.js";
import { openTaskStore } from "../../storage/task-store.js";
import { createTask } from "../../tasks/task.js";
import type { ITask } from "../../tasks/task.js";
import type { Tier } from "../../tiers/tier.js";
import { createCliHarness } from "../helpers/cli.js";
import type { ICliHarness } from "../helpers/cli.js";

let cli: ICliHarness;

function seed(title: string, tier: Tier, ageSeconds: number): void {
  const store = openTaskStore(cli.home);
  try {
    store.add(createTask({ title, tier, now: new Date(Date.now() - ageSeconds * 1000) }));
  } finally {
    store.close();
  }
}

function activeTasks(): ITask[] {
  const store = openTaskStore(cli.home);
  try {
    return store.fetchActive();
  } finally {
    store.close();
  }
}

beforeEach(() => {
  cli = createCliHarness([escalateCommand]);
});

afterEach(() => {
  cli.cleanup();
  delete process.env.TIERSTASH_ESCALATION_ENABLED;
});

describe("tierstash escalate", () => {
  it("escalates tasks that waited long enough", async () => {
    seed("Old task", "l2", 7300);
    seed("Fresh task", "l2", 60);

    await cli.run("escalate");

    expect(cli.stdout()).toContain('✔ "Old task" escalated to L1');
    expect(activeTasks().map((t) => [t.title, t.tier])).toEqual([
      ["Fresh task", "l2"],
      ["Old task", "l1"],
    ]);
  });

  it("reports when nothing is due", async () => {
    seed("Fresh task", "l3", 60);

    await cli.run("escalate");

    expect(cli.stdout()).toBe("ℹ No tasks to escalate");
  });

  it("shows the plan without writing on --dry-run", async () => {
    seed("Old task", "l3", 18100);

    await cli.run("escalate", "--dry-run");

    expect(cli.stdout()).toBe('ℹ "Old task" would move L3 → L2');
    expect(activeTasks()[0]?.tier).toBe("l3");
  });

  it("does nothing while escalation is disabled", async () => {
    process.env.TIERSTASH_ESCALATION_ENABLED = "false";
    seed("Old task", "l2", 7300);

    await cli.run("escalate");

    expect(cli.stdout()).toBe("⚠ Escalation is disabled (escalationEnabled = false)");
    expect(activeTasks()[0]?.tier).toBe("l2");
  });
});

describe("watchEscalations", () => {
  it("prints escalations until a signal arrives", async () => {
    seed("Old task", "l2", 7300);
    const services = resolveServices(initContainer(cli.home, { config: getDefaultConfig() }));
    services.engine.reload();

    try {
      const watching = watchEscalations(services, { now: true });
      expect(services.scheduler.isStarted).toBe(true);

      process.emit("SIGINT");
      await watching;

      expect(services.scheduler.isStarted).toBe(false);
      expect(cli.stdout()).toContain('Task Escalated: "Old task" escalated to L1');
      expect(cli.stdout()).toContain("Stopped");
    } finally {
      services.store.close();
    }
  });
});
