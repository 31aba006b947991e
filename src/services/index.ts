/**
 * Service module exports
 */

export { CategoryStore, builtInCategories, cloneMapping } from "./categoryStore";
export { classify, extensionOf, normalizeExtension } from "./classifier";
export { CategoryEditor } from "./editor";
export { createLogNotifier } from "./notifier";
export { CycleScheduler, type CycleRunner, type CycleSchedulerOptions, type TimerApi } from "./scheduler";
export { SortEngine, type SortEngineOptions, type SortPlan } from "./sorter";
export { DropWatcher, type DropWatcherOptions } from "./watcher";
export {
  WorkspaceService,
  workspacePaths,
  APP_FOLDER_NAME,
  DROP_FOLDER_NAME,
  SORTED_FOLDER_NAME,
  MAX_RECENT_WORKSPACES,
} from "./workspace";
