/**
 * Tests for config writer utility
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";

import { loadConfig } from "../../config.js";
import { saveConfig } from "../../utils/config-writer.js";

describe("config-writer", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tierstash-config-writer-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function readConfigFile(dir: string): unknown {
    return JSON.parse(fs.readFileSync(path.join(dir, "tierstash.config.json"), "utf-8"));
  }

  describe("saveConfig", () => {
    it("should create config file if it does not exist", () => {
      const result = saveConfig(tempDir, { escalationEnabled: false });

      expect(result).toEqual({ success: true });
      expect(readConfigFile(tempDir)).toEqual({ escalationEnabled: false });
    });

    it("should create the home directory when missing", () => {
      const home = path.join(tempDir, "fresh-home");

      expect(saveConfig(home, { defaultTier: "l2" }).success).toBe(true);
      expect(readConfigFile(home)).toEqual({ defaultTier: "l2" });
    });

    it("should merge changes and preserve unknown keys", () => {
      fs.writeFileSync(
        path.join(tempDir, "tierstash.config.json"),
        JSON.stringify({ $schema: "./schema.json", escalationIntervalSeconds: 120, custom: "keep" })
      );

      saveConfig(tempDir, { admissionMode: "sequential" });

      expect(readConfigFile(tempDir)).toEqual({
        $schema: "./schema.json",
        escalationIntervalSeconds: 120,
        custom: "keep",
        admissionMode: "sequential",
      });
    });

    it("should write a file loadConfig reads back", () => {
      saveConfig(tempDir, { escalationIntervalSeconds: 30, logLevel: "debug" });

      const config = loadConfig(tempDir, {});
      expect(config.escalationIntervalSeconds).toBe(30);
      expect(config.logLevel).toBe("debug");
    });

    it("should end the file with a newline and two-space indentation", () => {
      saveConfig(tempDir, { notificationsEnabled: false });

      const content = fs.readFileSync(path.join(tempDir, "tierstash.config.json"), "utf-8");
      expect(content).toBe('{\n  "notificationsEnabled": false\n}\n');
    });

    it("should report a parse failure of the existing file", () => {
      fs.writeFileSync(path.join(tempDir, "tierstash.config.json"), "{ broken");

      const result = saveConfig(tempDir, { escalationEnabled: true });

      expect(result.success).toBe(false);
      expect(result.error).toBeDefined();
    });
  });
});
