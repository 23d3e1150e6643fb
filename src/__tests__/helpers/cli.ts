/**
 * In-process CLI harness: registers commands on a fresh commander program,
 * captures console output, and turns process.exit into a thrown error.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { Command } from "commander";
import { vi } from "vitest";

export interface ICliHarness {
  home: string;
  /** Parse `args` as if typed after `tierstash` */
  run(...args: string[]): Promise<void>;
  /** Every console.log call, args joined by a space, one line per call */
  stdout(): string;
  stderr(): string;
  cleanup(): void;
}

export function createCliHarness(register: Array<(program: Command) => void>): ICliHarness {
  const home = fs.mkdtempSync(path.join(os.tmpdir(), "tierstash-cli-test-"));
  process.env.TIERSTASH_HOME = home;

  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(process, "exit").mockImplementation((code?: string | number | null) => {
    throw new Error(`process.exit(${String(code)})`);
  });

  const join = (calls: unknown[][]): string => calls.map((call) => call.map(String).join(" ")).join("\n");

  return {
    home,
    async run(...args: string[]) {
      const program = new Command();
      program.exitOverride();
      program.configureOutput({ writeOut: () => {}, writeErr: () => {} });
      for (const fn of register) {
        fn(program);
      }
      await program.parseAsync(["node", "tierstash", ...args]);
    },
    stdout: () => join(logSpy.mock.calls),
    stderr: () => join(errorSpy.mock.calls),
    cleanup() {
      vi.restoreAllMocks();
      delete process.env.TIERSTASH_HOME;
      fs.rmSync(home, { recursive: true, force: true });
    },
  };
}
