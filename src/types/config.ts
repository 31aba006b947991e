/**
 * Configuration types for Drop Sorter
 */

export type DirectoryMode = "wholesale" | "descend";

export interface AppConfig {
  /** Workspace root given explicitly (env or CLI); empty = use the remembered one */
  workspaceDir: string;

  /** Directory holding the workspace marker and recent-workspaces list */
  stateDir: string;

  /** Path to the workspace marker file */
  markerFile: string;

  /** Path to the recent-workspaces list */
  recentFile: string;

  /** Delay between sort cycles in milliseconds */
  scanIntervalMs: number;

  /** Countdown granularity in milliseconds */
  tickMs: number;

  /** Maximum number of parallel moves within one cycle */
  moveConcurrency: number;

  /** How top-level directories in the Drop folder are handled */
  directoryMode: DirectoryMode;

  /** Trigger a cycle as soon as something lands in the Drop folder */
  watchEvents: boolean;

  /** Quiet period before a watcher event triggers a cycle */
  watchDebounceMs: number;

  /** Environment mode */
  nodeEnv: "development" | "production" | "test";

  /** Log level */
  logLevel: "debug" | "info" | "warn" | "error";
}

/** Resolved paths of a prepared workspace */
export interface WorkspacePaths {
  root: string;
  dropDir: string;
  sortedDir: string;
  configDir: string;
  categoriesFile: string;
  userCategoriesFile: string;
  lockFile: string;
}
