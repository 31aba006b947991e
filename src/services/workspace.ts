/**
 * WorkspaceService — workspace layout, remembered workspace and recent list.
 *
 * A workspace root holds `Drop/`, `Sorted/` and `DropSorter/config/`. The
 * marker and recent list live in the state directory, outside any workspace.
 */

import { join, resolve } from "path";
import { mkdir, readFile, stat } from "fs/promises";
import type { Logger } from "pino";

import type { WorkspacePaths } from "../types";
import { writeFileAtomic } from "../utils/atomic";
import {
  ConfigReadError,
  ConfigWriteError,
  InvalidDirectory,
  NoWorkspace,
  errnoCode,
} from "../utils/errors";

export const DROP_FOLDER_NAME = "Drop";
export const SORTED_FOLDER_NAME = "Sorted";
export const APP_FOLDER_NAME = "DropSorter";
export const MAX_RECENT_WORKSPACES = 5;

export interface WorkspaceStateFiles {
  markerFile: string;
  recentFile: string;
}

/**
 * Paths of a workspace without touching the filesystem.
 */
export function workspacePaths(root: string): WorkspacePaths {
  const absolute = resolve(root);
  const configDir = join(absolute, APP_FOLDER_NAME, "config");
  return {
    root: absolute,
    dropDir: join(absolute, DROP_FOLDER_NAME),
    sortedDir: join(absolute, SORTED_FOLDER_NAME),
    configDir,
    categoriesFile: join(configDir, "categories.json"),
    userCategoriesFile: join(configDir, "user_categories.json"),
    lockFile: join(configDir, "sorter.lock"),
  };
}

export class WorkspaceService {
  private markerFile: string;
  private recentFile: string;
  private log: Logger;

  constructor(files: WorkspaceStateFiles, logger: Logger) {
    this.markerFile = files.markerFile;
    this.recentFile = files.recentFile;
    this.log = logger;
  }

  /**
   * Check the root and create Drop, Sorted and the config folder.
   * @throws NoWorkspace | InvalidDirectory
   */
  async ensureWorkspace(root: string): Promise<WorkspacePaths> {
    const paths = workspacePaths(root);

    try {
      const stats = await stat(paths.root);
      if (!stats.isDirectory()) {
        throw new InvalidDirectory(paths.root);
      }
    } catch (error: unknown) {
      if (errnoCode(error) === "ENOENT") {
        throw new NoWorkspace(`Workspace '${paths.root}' does not exist.`);
      }
      throw error instanceof InvalidDirectory
        ? error
        : new InvalidDirectory(paths.root, "is not accessible");
    }

    for (const dir of [paths.dropDir, paths.sortedDir, paths.configDir]) {
      await mkdir(dir, { recursive: true });
    }
    this.log.debug({ root: paths.root }, "Workspace ready");
    return paths;
  }

  /**
   * Explicit root wins, else the remembered one.
   * @throws NoWorkspace
   */
  async resolveWorkspace(explicit?: string): Promise<string> {
    if (explicit) return resolve(explicit);

    const remembered = await this.readMarker();
    if (!remembered) {
      throw new NoWorkspace();
    }
    return remembered;
  }

  /**
   * Remembered workspace, or null when unset or no longer a directory.
   */
  async readMarker(): Promise<string | null> {
    const content = await this.readStateFile(this.markerFile);
    const stored = content?.split("\n")[0]?.trim();
    if (!stored) return null;

    try {
      const stats = await stat(stored);
      if (stats.isDirectory()) return stored;
    } catch {
      // falls through to the warning below
    }
    this.log.warn({ stored }, "Remembered workspace is missing");
    return null;
  }

  /**
   * @throws ConfigWriteError
   */
  async writeMarker(root: string): Promise<void> {
    await this.writeStateFile(this.markerFile, resolve(root));
  }

  /**
   * Most recent first, at most five entries.
   */
  async recentWorkspaces(): Promise<string[]> {
    const content = await this.readStateFile(this.recentFile);
    if (!content) return [];

    return dedupe(
      content
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
    ).slice(0, MAX_RECENT_WORKSPACES);
  }

  /**
   * Make `root` the current workspace and move it to the front of the
   * recent list.
   * @throws ConfigWriteError
   */
  async rememberWorkspace(root: string): Promise<string[]> {
    const absolute = resolve(root);
    await this.writeMarker(absolute);

    const recent = dedupe([absolute, ...(await this.recentWorkspaces())]).slice(
      0,
      MAX_RECENT_WORKSPACES
    );
    await this.writeStateFile(this.recentFile, `${recent.join("\n")}\n`);
    this.log.info({ workspace: absolute }, "Workspace remembered");
    return recent;
  }

  private async readStateFile(filePath: string): Promise<string | null> {
    try {
      return await readFile(filePath, "utf-8");
    } catch (error: unknown) {
      if (errnoCode(error) === "ENOENT") return null;
      throw new ConfigReadError(filePath, error);
    }
  }

  private async writeStateFile(filePath: string, content: string): Promise<void> {
    try {
      await writeFileAtomic(filePath, content);
    } catch (error: unknown) {
      throw new ConfigWriteError(filePath, error);
    }
  }
}

function dedupe(paths: string[]): string[] {
  return [...new Set(paths)];
}
