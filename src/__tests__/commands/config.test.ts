/**
 * Tests for the config command group
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";

import { configCommand } from "../../commands/config.js";
import { createCliHarness } from "../helpers/cli.js";
import type { ICliHarness } from "../helpers/cli.js";

let cli: ICliHarness;

beforeEach(() => {
  cli = createCliHarness([configCommand]);
});

afterEach(() => {
  cli.cleanup();
});

describe("tierstash config", () => {
  it("persists a setting", async () => {
    await cli.run("config", "set", "escalationIntervalSeconds", "90");

    expect(cli.stdout()).toBe("✔ Set escalationIntervalSeconds = 90");
    const saved: unknown = JSON.parse(
      fs.readFileSync(path.join(cli.home, "tierstash.config.json"), "utf-8")
    );
    expect(saved).toEqual({ escalationIntervalSeconds: 90 });
  });

  it("shows the effective configuration", async () => {
    await cli.run("config", "set", "defaultTier", "MEM");

    await cli.run("config", "show");

    const out = cli.stdout();
    expect(out).toContain("  escalationIntervalSeconds     300");
    expect(out).toContain("  defaultTier                   mem");
    expect(out).toContain(`  database                      ${path.join(cli.home, "tierstash.db")}`);
  });

  it("rejects an unknown key", async () => {
    await expect(cli.run("config", "set", "colour", "red")).rejects.toThrow("process.exit(1)");
    expect(cli.stderr()).toContain('Unknown config key "colour"');
  });

  it("rejects an invalid value", async () => {
    await expect(cli.run("config", "set", "admissionMode", "greedy")).rejects.toThrow(
      "process.exit(1)"
    );
    expect(cli.stderr()).toBe("admissionMode must be one of: pass-start, sequential");
  });
});
