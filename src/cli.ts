#!/usr/bin/env node
/**
 * Drop Sorter - command line front end
 *
 * Run: drop-sorter start [--watch]
 */

import { Command } from "commander";

import { validateConfig } from "./config";
import { createApp } from "./index";
import {
  CategoryEditor,
  CategoryStore,
  DropWatcher,
  WorkspaceService,
  createLogNotifier,
} from "./services";
import type { AppConfig, WorkspacePaths } from "./types";
import {
  DropSorterError,
  createLockManager,
  createLogger,
  describeError,
  formatCycleSummary,
  formatFailure,
  formatMapping,
  releaseLockOnExit,
} from "./utils";

const log = createLogger("main");

interface GlobalOptions {
  workspace?: string;
}

function loadConfigOrExit(program: Command): AppConfig {
  const { workspace } = program.opts<GlobalOptions>();
  const validation = validateConfig({ workspaceDir: workspace });
  if (!validation.success) {
    console.error("Configuration error:");
    for (const error of validation.errors) {
      console.error(error);
    }
    process.exit(1);
  }
  return validation.config;
}

function workspaceService(config: AppConfig): WorkspaceService {
  return new WorkspaceService(config, createLogger("workspace"));
}

async function openWorkspace(config: AppConfig): Promise<WorkspacePaths> {
  const service = workspaceService(config);
  const root = await service.resolveWorkspace(config.workspaceDir || undefined);
  return service.ensureWorkspace(root);
}

/**
 * Run a command action, turning expected errors into a message and exit code 1.
 */
function action<A extends unknown[]>(fn: (...args: A) => Promise<void>) {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (error: unknown) {
      if (error instanceof DropSorterError) {
        console.error(`Error: ${error.message}`);
      } else {
        log.error({ error: describeError(error) }, "Command failed");
      }
      process.exitCode = 1;
    }
  };
}

async function startCommand(config: AppConfig, watch: boolean): Promise<void> {
  const paths = await openWorkspace(config);

  const lock = createLockManager(paths.lockFile);
  if (!(await lock.acquire())) {
    console.error(`Another drop-sorter is already running on '${paths.root}'.`);
    process.exitCode = 1;
    return;
  }
  releaseLockOnExit(paths.lockFile);

  const schedulerLog = createLogger("scheduler");
  const { scheduler } = createApp(paths, config, {
    onCountdown: (remaining) => schedulerLog.debug({ remaining }, "Next scan countdown"),
    onProgress: (completed, total) =>
      schedulerLog.debug({ completed, total }, "Sort progress"),
    onCycle: (outcome) => {
      if (!outcome.success) return;
      for (const failure of outcome.summary.failures) {
        schedulerLog.warn({ reason: failure.reason }, formatFailure(failure));
      }
    },
    notifier: createLogNotifier(createLogger("notify")),
  });

  scheduler.start(paths.dropDir, paths.sortedDir);

  const watcher =
    watch || config.watchEvents
      ? new DropWatcher(
          paths.dropDir,
          () => scheduler.triggerNow(),
          { debounceMs: config.watchDebounceMs },
          createLogger("watcher")
        )
      : null;
  watcher?.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) {
      log.warn({ signal }, "Forced exit");
      process.exit(1);
    }
    stopping = true;
    log.info({ signal }, "Shutting down");

    const closeWatcher = watcher ? watcher.close() : Promise.resolve();
    closeWatcher
      .then(() => scheduler.stop())
      .then(() => lock.release())
      .catch((error: unknown) => {
        log.error({ error: describeError(error) }, "Shutdown failed");
        process.exitCode = 1;
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  log.info(
    { workspace: paths.root, watch: watcher !== null, intervalMs: config.scanIntervalMs },
    "Drop Sorter running"
  );
}

async function sortCommand(config: AppConfig): Promise<void> {
  const paths = await openWorkspace(config);

  const lock = createLockManager(paths.lockFile);
  if (!(await lock.acquire())) {
    console.error(`Another drop-sorter is already running on '${paths.root}'.`);
    process.exitCode = 1;
    return;
  }

  try {
    const { engine } = createApp(paths, config);
    const outcome = await engine.sortFolder(paths.dropDir, paths.sortedDir);
    if (!outcome.success) {
      console.error(`Error: ${outcome.error.message}`);
      process.exitCode = 1;
      return;
    }

    console.log(formatCycleSummary(outcome.summary));
    for (const failure of outcome.summary.failures) {
      console.log(`  ${formatFailure(failure)}`);
    }
    if (outcome.summary.failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    await lock.release();
  }
}

async function editCategories(
  config: AppConfig,
  edit: (editor: CategoryEditor) => string
): Promise<void> {
  const paths = await openWorkspace(config);
  const editor = await CategoryEditor.open(
    new CategoryStore(paths, createLogger("categories")),
    createLogger("editor")
  );
  const message = edit(editor);
  await editor.save();
  console.log(message);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("drop-sorter")
    .version("0.1.0")
    .description("Sort files dropped into a workspace's Drop folder into category folders.")
    .option("-w, --workspace <path>", "Workspace root (overrides WORKSPACE_DIR and the remembered one)");

  program
    .command("start")
    .description("Sort the Drop folder periodically until interrupted")
    .option("--watch", "Also sort as soon as new items appear")
    .action(
      action(async (options: { watch?: boolean }) => {
        await startCommand(loadConfigOrExit(program), options.watch ?? false);
      })
    );

  program
    .command("sort")
    .description("Run a single sort cycle now")
    .action(
      action(async () => {
        await sortCommand(loadConfigOrExit(program));
      })
    );

  const workspace = program.command("workspace").description("Choose and inspect workspaces");

  workspace
    .command("use <path>")
    .description("Prepare a workspace and remember it for later runs")
    .action(
      action(async (path: string) => {
        const service = workspaceService(loadConfigOrExit(program));
        const paths = await service.ensureWorkspace(path);
        await service.rememberWorkspace(paths.root);
        console.log(`Workspace set to ${paths.root}`);
        console.log(`  Drop:   ${paths.dropDir}`);
        console.log(`  Sorted: ${paths.sortedDir}`);
      })
    );

  workspace
    .command("show")
    .description("Print the current workspace")
    .action(
      action(async () => {
        const paths = await openWorkspace(loadConfigOrExit(program));
        console.log(paths.root);
      })
    );

  workspace
    .command("recent")
    .description("List recently used workspaces")
    .action(
      action(async () => {
        const recent = await workspaceService(loadConfigOrExit(program)).recentWorkspaces();
        console.log(recent.length > 0 ? recent.join("\n") : "No recent workspaces.");
      })
    );

  const categories = program.command("categories").description("Edit extension categories");

  categories
    .command("list")
    .description("Show every category and its extensions")
    .action(
      action(async () => {
        const paths = await openWorkspace(loadConfigOrExit(program));
        const store = new CategoryStore(paths, createLogger("categories"));
        console.log(formatMapping(await store.loadCategories()).join("\n"));
      })
    );

  categories
    .command("add <name>")
    .description("Create an empty category")
    .action(
      action(async (name: string) => {
        await editCategories(loadConfigOrExit(program), (editor) => {
          return `Added category: ${editor.addCategory(name)}`;
        });
      })
    );

  categories
    .command("remove <name>")
    .description("Delete a category (Other cannot be deleted)")
    .action(
      action(async (name: string) => {
        await editCategories(loadConfigOrExit(program), (editor) => {
          editor.removeCategory(name);
          return `Deleted category: ${name.trim()}`;
        });
      })
    );

  categories
    .command("add-ext <category> <extension>")
    .description("Add an extension to a category")
    .action(
      action(async (category: string, extension: string) => {
        await editCategories(loadConfigOrExit(program), (editor) => {
          const ext = editor.addExtension(category, extension);
          return `Added .${ext} to ${category.trim()}`;
        });
      })
    );

  categories
    .command("remove-ext <category> <extension>")
    .description("Remove an extension from a category")
    .action(
      action(async (category: string, extension: string) => {
        await editCategories(loadConfigOrExit(program), (editor) => {
          editor.removeExtension(category, extension);
          return `Removed ${extension.trim()} from ${category.trim()}`;
        });
      })
    );

  categories
    .command("reset")
    .description("Discard user edits and return to the built-in categories")
    .action(
      action(async () => {
        const paths = await openWorkspace(loadConfigOrExit(program));
        await new CategoryStore(paths, createLogger("categories")).resetUserCategories();
        console.log("Categories reset to built-in defaults.");
      })
    );

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      log.error({ error: describeError(error) }, "Fatal error");
      process.exit(1);
    });
}
