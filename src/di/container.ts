/**
 * DI composition root for tierstash.
 * Bootstraps a tsyringe container with the SQLite database, the task repository,
 * the store, and the engine services built on top of it.
 *
 * The Database instance is registered via registerInstance so that
 * @inject('Database') in SqliteTaskRepository resolves it. Services take their
 * collaborators through string tokens, so nothing depends on emitted
 * constructor metadata.
 */

import "reflect-metadata";

import type Database from "better-sqlite3";
import { container, instanceCachingFactory } from "tsyringe";
import type { DependencyContainer } from "tsyringe";

import { loadConfig } from "../config.js";
import { TieringEngine } from "../engine/tiering-engine.js";
import { toStorageError } from "../errors.js";
import { EscalationScheduler } from "../escalation/escalation-scheduler.js";
import { NotificationService } from "../notifications/notification-service.js";
import type { ITaskRepository } from "../storage/repositories/interfaces.js";
import { SqliteTaskRepository } from "../storage/repositories/sqlite/task-repository.js";
import { createDbForDir } from "../storage/sqlite/client.js";
import { runMigrations } from "../storage/sqlite/migrations.js";
import { TaskStore } from "../storage/task-store.js";
import type { ITierstashConfig } from "../types.js";
import { systemClock } from "../utils/clock.js";
import type { IClock } from "../utils/clock.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("container");

/** Token used to inject the raw better-sqlite3 Database instance. */
export const DATABASE_TOKEN = "Database";
export const TASK_REPOSITORY_TOKEN = "TaskRepository";
export const TASK_STORE_TOKEN = "TaskStore";
export const CLOCK_TOKEN = "Clock";
export const CONFIG_TOKEN = "Config";

export interface IContainerOptions {
  /** Defaults to loadConfig(homeDir) */
  config?: ITierstashConfig;
  /** Defaults to the system clock */
  clock?: IClock;
}

export interface IAppServices {
  config: ITierstashConfig;
  clock: IClock;
  store: TaskStore;
  engine: TieringEngine;
  notifications: NotificationService;
  scheduler: EscalationScheduler;
}

function openDatabase(homeDir: string): Database.Database | null {
  let db: Database.Database | null = null;
  try {
    db = createDbForDir(homeDir);
    // Run migrations so the schema is ready before the repository is resolved
    runMigrations(db);
    return db;
  } catch (err) {
    db?.close();
    log.error("Failed to open task database", { homeDir, error: toStorageError(err, "unavailable") });
    return null;
  }
}

/**
 * Build a child container rooted at `homeDir`. Each call opens its own
 * database handle; close it with `resolveServices(c).store.close()`.
 *
 * When the database cannot be opened the store is registered in its
 * unavailable mode and the rest of the graph still resolves.
 */
export function initContainer(homeDir: string, options: IContainerOptions = {}): DependencyContainer {
  const child = container.createChildContainer();

  child.registerInstance<ITierstashConfig>(CONFIG_TOKEN, options.config ?? loadConfig(homeDir));
  child.registerInstance<IClock>(CLOCK_TOKEN, options.clock ?? systemClock);

  const db = openDatabase(homeDir);
  if (db) {
    child.registerInstance<Database.Database>(DATABASE_TOKEN, db);
    child.registerSingleton<ITaskRepository>(TASK_REPOSITORY_TOKEN, SqliteTaskRepository);
    child.register<TaskStore>(TASK_STORE_TOKEN, {
      useFactory: instanceCachingFactory(
        (c) => new TaskStore(c.resolve<ITaskRepository>(TASK_REPOSITORY_TOKEN), () => db.close())
      ),
    });
  } else {
    child.registerInstance<TaskStore>(TASK_STORE_TOKEN, new TaskStore(null));
  }

  child.registerSingleton(TieringEngine);
  child.registerSingleton(NotificationService);
  child.registerSingleton(EscalationScheduler);

  return child;
}

/**
 * Resolve the application services from a container built by initContainer().
 */
export function resolveServices(c: DependencyContainer): IAppServices {
  return {
    config: c.resolve<ITierstashConfig>(CONFIG_TOKEN),
    clock: c.resolve<IClock>(CLOCK_TOKEN),
    store: c.resolve<TaskStore>(TASK_STORE_TOKEN),
    engine: c.resolve(TieringEngine),
    notifications: c.resolve(NotificationService),
    scheduler: c.resolve(EscalationScheduler),
  };
}

export { container };
