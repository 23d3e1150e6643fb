/**
 * Tests for the task commands: add, list, done, promote, snooze, clear
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { addCommand } from "../../commands/add.js";
import { clearCommand } from "../../commands/clear.js";
import { doneCommand } from "../../commands/done.js";
import { listCommand } from "../../commands/list.js";
import { promoteCommand, snoozeCommand } from "../../commands/move.js";
import { openTaskStore } from "../../storage/task-store.js";
import type { ITask } from "../../tasks/task.js";
import { createCliHarness } from "../helpers/cli.js";
import type { ICliHarness } from "../helpers/cli.js";

let cli: ICliHarness;

function activeTasks(): ITask[] {
  const store = openTaskStore(cli.home);
  try {
    return store.fetchActive();
  } finally {
    store.close();
  }
}

beforeEach(() => {
  cli = createCliHarness([
    addCommand,
    listCommand,
    doneCommand,
    promoteCommand,
    snoozeCommand,
    clearCommand,
  ]);
});

afterEach(() => {
  cli.cleanup();
  delete process.env.TIERSTASH_DEFAULT_TIER;
});

describe("tierstash add", () => {
  it("adds a task to the given tier", async () => {
    await cli.run("add", "Write", "report", "--tier", "L2");

    expect(cli.stdout()).toContain('✔ Added "Write report" to L2');
    expect(activeTasks().map((t) => [t.title, t.tier])).toEqual([["Write report", "l2"]]);
  });

  it("uses the configured default tier", async () => {
    process.env.TIERSTASH_DEFAULT_TIER = "l3";

    await cli.run("add", "Plan trip");

    expect(activeTasks().map((t) => t.tier)).toEqual(["l3"]);
  });

  it("rejects an unknown tier", async () => {
    await expect(cli.run("add", "x", "-t", "l9")).rejects.toThrow("process.exit(1)");
    expect(cli.stderr()).toBe('Invalid tier "l9". Use one of: l1, l2, l3, mem');
  });

  it("rejects a blank title", async () => {
    await expect(cli.run("add", "   ")).rejects.toThrow("process.exit(1)");
    expect(cli.stderr()).toBe("Task title cannot be empty");
    expect(activeTasks()).toEqual([]);
  });
});

describe("tierstash list", () => {
  it("prints active tasks in tier order", async () => {
    await cli.run("add", "Parked", "-t", "mem");
    await cli.run("add", "Urgent", "-t", "l1");

    await cli.run("list");

    const out = cli.stdout();
    expect(out).toContain("Active (2)");
    const table = out.slice(out.indexOf("Active (2)"));
    expect(table.indexOf("Urgent")).toBeGreaterThan(0);
    expect(table.indexOf("Urgent")).toBeLessThan(table.indexOf("Parked"));
  });

  it("filters by tier", async () => {
    await cli.run("add", "Parked", "-t", "mem");
    await cli.run("add", "Urgent", "-t", "l1");

    await cli.run("list", "-t", "mem");

    expect(cli.stdout()).toContain("Active · Main Memory (1)");
  });

  it("says so when there is nothing to show", async () => {
    await cli.run("list", "--completed");
    expect(cli.stdout()).toBe("No completed tasks");
  });
});

describe("tierstash done", () => {
  it("completes the first matching task", async () => {
    await cli.run("add", "Write report");

    await cli.run("done", "REPORT");

    expect(cli.stdout()).toContain('✔ Completed "Write report"');
    expect(activeTasks()).toEqual([]);
  });

  it("exits 1 when nothing matches", async () => {
    await expect(cli.run("done", "nothing")).rejects.toThrow("process.exit(1)");
    expect(cli.stderr()).toBe("Task not found");
  });
});

describe("tierstash promote / snooze", () => {
  it("moves a task one tier each way", async () => {
    await cli.run("add", "Write report", "-t", "l2");

    await cli.run("promote", "report");
    expect(cli.stdout()).toContain('✔ Promoted "Write report" to L1');
    expect(activeTasks()[0]?.tier).toBe("l1");

    await cli.run("snooze", "report");
    expect(cli.stdout()).toContain('✔ Snoozed "Write report" to L2');
    expect(activeTasks()[0]?.tier).toBe("l2");
  });

  it("reports a task already at the edge", async () => {
    await cli.run("add", "Urgent", "-t", "l1");

    await cli.run("promote", "urgent");

    expect(cli.stdout()).toContain('ℹ "Urgent" is already in L1');
  });

  it("exits 1 when nothing matches", async () => {
    await expect(cli.run("snooze", "nothing")).rejects.toThrow("process.exit(1)");
    expect(cli.stderr()).toBe("Task not found");
  });
});

describe("tierstash clear", () => {
  it("clears completed tasks", async () => {
    await cli.run("add", "Done soon");
    await cli.run("add", "Still open");
    await cli.run("done", "soon");

    await cli.run("clear");

    expect(cli.stdout()).toContain("✔ Completed tasks cleared");
    expect(activeTasks().map((t) => t.title)).toEqual(["Still open"]);
  });

  it("clears everything with --all --yes", async () => {
    await cli.run("add", "Still open");

    await cli.run("clear", "--all", "--yes");

    expect(cli.stdout()).toContain("✔ All tasks cleared");
    expect(activeTasks()).toEqual([]);
  });
});
