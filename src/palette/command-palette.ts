/**
 * Slash-command palette over the tiering engine.
 *
 * Commands are case-insensitive and the leading "/" is optional. Only
 * /promote, /snooze and "/list completed" read the text after the command
 * word; the other commands ignore it. Every outcome, including a missing
 * task, comes back as a result value.
 */

import type { TieringEngine } from "../engine/tiering-engine.js";
import type { ITask } from "../tasks/task.js";
import { TIER_INFO, previousTier, promotedTier } from "../tiers/tier.js";

export type PaletteResultKind =
  | "list"
  | "completed"
  | "focus"
  | "clear"
  | "promote"
  | "snooze"
  | "help"
  | "unknown";

export interface IPaletteResult {
  ok: boolean;
  kind: PaletteResultKind;
  message: string;
  /** Set by commands that may mutate; false when nothing was written */
  changed?: boolean;
  tasks?: ITask[];
}

export interface IPaletteCommand {
  command: string;
  description: string;
}

export const PALETTE_COMMANDS: readonly IPaletteCommand[] = [
  { command: "/list", description: "View all tasks by tier" },
  { command: "/done", description: "View completed tasks" },
  { command: "/focus", description: "Show L1 tasks only" },
  { command: "/snooze [task]", description: "Demote task one tier" },
  { command: "/promote [task]", description: "Promote task one tier" },
  { command: "/clear", description: "Clear completed tasks" },
  { command: "/help", description: "Show all commands" },
];

export const TASK_NOT_FOUND = "Task not found";
export const UNKNOWN_COMMAND = "Unknown command";

function pluralTasks(count: number): string {
  return count === 1 ? "1 task" : `${count} tasks`;
}

/**
 * Commands whose name starts with or contains the typed text.
 * A bare "/" returns every command.
 */
export function suggestCommands(input: string): IPaletteCommand[] {
  const query = input.trim().toLowerCase();
  if (query === "" || query === "/") {
    return [...PALETTE_COMMANDS];
  }
  return PALETTE_COMMANDS.filter((cmd) => cmd.command.toLowerCase().includes(query));
}

export function formatHelp(): string {
  const width = Math.max(...PALETTE_COMMANDS.map((cmd) => cmd.command.length)) + 2;
  return PALETTE_COMMANDS.map((cmd) => `${cmd.command.padEnd(width)}${cmd.description}`).join("\n");
}

function parseInput(input: string): { name: string; argument: string } {
  const trimmed = input.trim().replace(/^\//, "");
  const match = /^(\S*)\s*(.*)$/s.exec(trimmed);
  if (!match) {
    return { name: "", argument: "" };
  }
  return { name: match[1].toLowerCase(), argument: match[2].trim() };
}

function listActive(engine: TieringEngine): IPaletteResult {
  const tasks = [...engine.tasks];
  return {
    ok: true,
    kind: "list",
    message: tasks.length === 0 ? "No active tasks" : `${pluralTasks(tasks.length)} active`,
    tasks,
  };
}

function listCompleted(engine: TieringEngine): IPaletteResult {
  engine.reloadCompleted();
  const tasks = [...engine.completedTasks];
  return {
    ok: true,
    kind: "completed",
    message: tasks.length === 0 ? "No completed tasks" : `${pluralTasks(tasks.length)} completed`,
    tasks,
  };
}

function focus(engine: TieringEngine): IPaletteResult {
  const tasks = engine.activeTasks("l1");
  return {
    ok: true,
    kind: "focus",
    message: tasks.length === 0 ? "No tasks in L1" : `${pluralTasks(tasks.length)} in L1`,
    tasks,
  };
}

function clearCompleted(engine: TieringEngine): IPaletteResult {
  const ok = engine.clearCompleted();
  return {
    ok,
    kind: "clear",
    message: ok ? "Completed tasks cleared" : "Could not clear completed tasks",
    changed: ok,
  };
}

function moveTask(engine: TieringEngine, kind: "promote" | "snooze", match: string): IPaletteResult {
  if (match === "") {
    return { ok: false, kind, message: `Usage: /${kind} [task name]` };
  }

  const task = engine.findTask(match);
  if (!task) {
    return { ok: false, kind, message: TASK_NOT_FOUND };
  }

  const target = kind === "promote" ? promotedTier(task.tier) : previousTier(task.tier);
  if (!target) {
    return {
      ok: true,
      kind,
      message: `"${task.title}" is already in ${TIER_INFO[task.tier].shortLabel}`,
      changed: false,
      tasks: [task],
    };
  }

  const changed = kind === "promote" ? engine.promoteTask(task) : engine.snoozeTask(task);
  if (!changed) {
    return { ok: false, kind, message: `Could not update "${task.title}"`, changed: false };
  }

  const verb = kind === "promote" ? "Promoted" : "Snoozed";
  const updated = engine.tasks.find((candidate) => candidate.id === task.id);
  return {
    ok: true,
    kind,
    message: `${verb} "${task.title}" to ${TIER_INFO[target].shortLabel}`,
    changed: true,
    tasks: updated ? [updated] : [],
  };
}

/**
 * Execute one palette command against the engine.
 */
export function executeCommand(engine: TieringEngine, input: string): IPaletteResult {
  const { name, argument } = parseInput(input);
  const option = argument.toLowerCase();

  switch (name) {
    case "list":
      return option === "completed" ? listCompleted(engine) : listActive(engine);
    case "done":
      return listCompleted(engine);
    case "focus":
      return focus(engine);
    case "clear":
      return clearCompleted(engine);
    case "promote":
      return moveTask(engine, "promote", argument);
    case "snooze":
      return moveTask(engine, "snooze", argument);
    case "help":
      return { ok: true, kind: "help", message: formatHelp() };
    default:
      break;
  }
  return { ok: false, kind: "unknown", message: UNKNOWN_COMMAND };
}
