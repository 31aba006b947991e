/**
 * Drop Sorter - library entry point
 *
 * Wires the category store, sort engine and scheduler for one workspace.
 * The command line front end lives in cli.ts.
 */

import { CategoryStore, CycleScheduler, SortEngine } from "./services";
import type { CycleSchedulerOptions } from "./services";
import type { AppConfig, WorkspacePaths } from "./types";
import { createLogger } from "./utils";

export * from "./types";
export * from "./config";
export * from "./services";
export * from "./utils";

export interface DropSorterApp {
  paths: WorkspacePaths;
  store: CategoryStore;
  engine: SortEngine;
  scheduler: CycleScheduler;
}

export type SchedulerHooks = Omit<CycleSchedulerOptions, "intervalMs" | "tickMs">;

/**
 * Build the services for a prepared workspace. Nothing starts until
 * `scheduler.start()` is called.
 */
export function createApp(
  paths: WorkspacePaths,
  config: Pick<AppConfig, "scanIntervalMs" | "tickMs" | "moveConcurrency" | "directoryMode">,
  hooks: SchedulerHooks = {}
): DropSorterApp {
  const store = new CategoryStore(paths, createLogger("categories"));
  const engine = new SortEngine(
    store,
    { moveConcurrency: config.moveConcurrency, directoryMode: config.directoryMode },
    createLogger("sorter")
  );
  const scheduler = new CycleScheduler(
    engine,
    { ...hooks, intervalMs: config.scanIntervalMs, tickMs: config.tickMs },
    createLogger("scheduler")
  );

  return { paths, store, engine, scheduler };
}
