/**
 * Public API of the tierstash library.
 */

import "reflect-metadata";

export * from "./types.js";
export * from "./constants.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./tiers/tier.js";
export * from "./tasks/task.js";
export * from "./storage/repositories/interfaces.js";
export { SqliteTaskRepository } from "./storage/repositories/sqlite/task-repository.js";
export { createDbForDir, getDbPath, getHomeDir } from "./storage/sqlite/client.js";
export { runMigrations, SCHEMA_VERSION } from "./storage/sqlite/migrations.js";
export * from "./storage/task-store.js";
export * from "./engine/tiering-engine.js";
export * from "./escalation/escalation-policy.js";
export * from "./escalation/escalation-scheduler.js";
export * from "./notifications/notification-service.js";
export * from "./palette/command-palette.js";
export * from "./di/container.js";
export { saveConfig } from "./utils/config-writer.js";
export type { ISaveConfigResult } from "./utils/config-writer.js";
export { ManualClock, systemClock } from "./utils/clock.js";
export type { IClock } from "./utils/clock.js";
export { createLogger, getLogLevel, Logger, setLogLevel } from "./utils/logger.js";
