/**
 * SortEngine — one enumerate → classify → move pass over the Drop folder.
 */

import { basename, dirname, join, resolve } from "path";
import { lstat, mkdir, readdir, rename, stat } from "fs/promises";
import type { Dirent } from "fs";
import type { Logger } from "pino";

import type {
  CategoryMapping,
  CycleOutcome,
  CycleSummary,
  DirectoryMode,
  MoveFailure,
  MoveFailureReason,
  PlannedItemKind,
  PlannedMove,
  ProgressCallback,
} from "../types";
import { FALLBACK_CATEGORY } from "../types";
import {
  DirectoryAccessError,
  DropSorterError,
  SortingError,
  describeError,
  errnoCode,
} from "../utils/errors";
import { TaskPool } from "../utils/pool";
import type { CategoryStore } from "./categoryStore";
import { classify, extensionOf } from "./classifier";

export interface SortEngineOptions {
  moveConcurrency: number;
  directoryMode: DirectoryMode;
}

export interface SortPlan {
  moves: PlannedMove[];
  /** Items rejected while planning because another item already claimed the target */
  conflicts: MoveFailure[];
}

interface SourceItem {
  path: string;
  name: string;
  kind: PlannedItemKind;
}

const FAILURE_REASONS: Record<string, MoveFailureReason> = {
  EEXIST: "collision",
  ENOTEMPTY: "collision",
  EXDEV: "cross-device",
  EACCES: "permission",
  EPERM: "permission",
  EBUSY: "busy",
  ENOENT: "missing",
};

export class SortEngine {
  private store: CategoryStore;
  private options: SortEngineOptions;
  private log: Logger;

  constructor(store: CategoryStore, options: SortEngineOptions, logger: Logger) {
    this.store = store;
    this.options = options;
    this.log = logger;
  }

  /**
   * Sort everything currently in `sourceDir` into `destDir/<category>/`.
   *
   * Categories are re-read on every call. A single failed move never aborts
   * the rest of the plan. Inaccessible roots yield `{ success: false }`.
   * @throws SortingError only on failures outside a single item or root
   */
  async sortFolder(
    sourceDir: string,
    destDir: string,
    onProgress?: ProgressCallback
  ): Promise<CycleOutcome> {
    const started = Date.now();
    const startedAt = new Date(started).toISOString();

    for (const dir of [sourceDir, destDir]) {
      const error = await this.checkDirectory(dir);
      if (error) {
        this.log.warn({ path: dir, error: error.message }, "Cycle skipped");
        return { success: false, error };
      }
    }

    const mapping = await this.loadMapping();

    let plan: SortPlan;
    try {
      plan = await this.buildPlan(sourceDir, destDir, mapping);
    } catch (error: unknown) {
      const accessError = new DirectoryAccessError(sourceDir, error);
      this.log.warn({ path: sourceDir, error: accessError.message }, "Cycle skipped");
      return { success: false, error: accessError };
    }

    const total = plan.moves.length + plan.conflicts.length;
    let completed = 0;
    const report = () => {
      completed++;
      this.notifyProgress(onProgress, completed, total);
    };

    const failures: MoveFailure[] = [];
    for (const conflict of plan.conflicts) {
      failures.push(conflict);
      this.log.warn({ source: conflict.source, target: conflict.target }, conflict.message);
      report();
    }

    const folderErrors = await this.ensureCategoryFolders(destDir, plan.moves);
    const pool = new TaskPool(this.options.moveConcurrency);
    const results = await pool.map(plan.moves, async (move) => {
      const folderError = folderErrors.get(move.category);
      const failure = folderError
        ? this.toFailure(move, folderError)
        : await this.moveItem(move);
      report();
      return { move, failure };
    });

    const moves: PlannedMove[] = [];
    const byCategory: Record<string, number> = {};
    for (const { move, failure } of results) {
      if (failure) {
        failures.push(failure);
      } else {
        moves.push(move);
        byCategory[move.category] = (byCategory[move.category] ?? 0) + 1;
      }
    }

    if (total === 0) {
      this.notifyProgress(onProgress, 0, 0);
    }

    const summary: CycleSummary = {
      total,
      moved: moves.length,
      failed: failures.length,
      moves,
      failures,
      byCategory,
      startedAt,
      durationMs: Date.now() - started,
    };

    if (total > 0) {
      this.log.info(
        { total, moved: summary.moved, failed: summary.failed, byCategory },
        "Sort cycle complete"
      );
    } else {
      this.log.debug("Sort cycle complete, nothing to sort");
    }
    return { success: true, summary };
  }

  /**
   * Enumerate the source and decide where each item goes. Two items aiming at
   * the same target name are resolved in enumeration order: the later one is
   * reported as a collision.
   */
  async buildPlan(
    sourceDir: string,
    destDir: string,
    mapping: CategoryMapping
  ): Promise<SortPlan> {
    const destRoot = resolve(destDir);
    const items = await this.enumerate(sourceDir, destRoot);
    const reserved = new Set<string>();
    const moves: PlannedMove[] = [];
    const conflicts: MoveFailure[] = [];

    for (const item of items) {
      const category =
        item.kind === "directory"
          ? FALLBACK_CATEGORY
          : classify(extensionOf(item.name), mapping).category;
      const target = join(destDir, category, item.name);
      const move: PlannedMove = { source: item.path, target, category, kind: item.kind };

      // a category must name a folder directly inside the destination
      if (dirname(resolve(destRoot, category)) !== destRoot) {
        conflicts.push(
          this.failure(
            move,
            "invalid-category",
            `Category '${category}' is not a folder inside '${destDir}'; '${item.path}' left in place`
          )
        );
        continue;
      }
      if (reserved.has(target)) {
        conflicts.push(
          this.failure(move, "collision", `'${item.name}' collides with another item in this cycle`)
        );
        continue;
      }
      reserved.add(target);
      moves.push(move);
    }

    return { moves, conflicts };
  }

  private async loadMapping(): Promise<CategoryMapping> {
    try {
      return await this.store.loadCategories();
    } catch (error: unknown) {
      if (
        error instanceof DropSorterError &&
        (error.code === "CONFIG_READ" || error.code === "CONFIG_WRITE")
      ) {
        this.log.warn({ error: error.message }, "Using built-in categories for this cycle");
        return this.store.defaults();
      }
      throw new SortingError(`Cannot load categories: ${describeError(error)}`, error);
    }
  }

  private async checkDirectory(dir: string): Promise<DirectoryAccessError | null> {
    try {
      const stats = await stat(dir);
      return stats.isDirectory() ? null : new DirectoryAccessError(dir, "not a directory");
    } catch (error: unknown) {
      return new DirectoryAccessError(dir, error);
    }
  }

  private async enumerate(
    sourceDir: string,
    destRoot: string
  ): Promise<SourceItem[]> {
    const entries = await readdir(sourceDir, { withFileTypes: true });
    const items: SourceItem[] = [];

    for (const entry of entries) {
      const fullPath = join(sourceDir, entry.name);
      if (resolve(fullPath) === destRoot) continue;

      if (entry.isFile()) {
        items.push({ path: fullPath, name: entry.name, kind: "file" });
      } else if (entry.isDirectory()) {
        if (this.options.directoryMode === "wholesale") {
          items.push({ path: fullPath, name: entry.name, kind: "directory" });
        } else {
          for (const file of await this.walkFiles(fullPath, destRoot)) {
            items.push({ path: file, name: basename(file), kind: "file" });
          }
        }
      } else {
        this.log.debug({ path: fullPath }, "Skipping special entry");
      }
    }

    return items;
  }

  private async walkFiles(dir: string, destRoot: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error: unknown) {
      this.log.warn({ path: dir, error: describeError(error) }, "Cannot read subdirectory");
      return [];
    }

    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isFile()) {
        files.push(fullPath);
      } else if (entry.isDirectory() && resolve(fullPath) !== destRoot) {
        files.push(...(await this.walkFiles(fullPath, destRoot)));
      }
    }
    return files;
  }

  /** Create each category folder once; failures are keyed by category. */
  private async ensureCategoryFolders(
    destDir: string,
    moves: PlannedMove[]
  ): Promise<Map<string, unknown>> {
    const categories = [...new Set(moves.map((m) => m.category))];
    const errors = new Map<string, unknown>();

    await Promise.all(
      categories.map(async (category) => {
        try {
          await mkdir(join(destDir, category), { recursive: true });
        } catch (error: unknown) {
          this.log.error({ category, error: describeError(error) }, "Cannot create category folder");
          errors.set(category, error);
        }
      })
    );
    return errors;
  }

  /** null on success */
  private async moveItem(move: PlannedMove): Promise<MoveFailure | null> {
    try {
      if (await this.exists(move.target)) {
        const failure = this.failure(
          move,
          "collision",
          `'${move.target}' already exists; '${move.source}' left in place`
        );
        this.log.warn({ source: move.source, target: move.target }, failure.message);
        return failure;
      }

      await rename(move.source, move.target);
      this.log.debug({ source: move.source, target: move.target }, "Moved");
      return null;
    } catch (error: unknown) {
      const failure = this.toFailure(move, error);
      this.log.warn({ source: move.source, reason: failure.reason }, failure.message);
      return failure;
    }
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await lstat(path);
      return true;
    } catch (error: unknown) {
      if (errnoCode(error) === "ENOENT") return false;
      throw error;
    }
  }

  private toFailure(move: PlannedMove, error: unknown): MoveFailure {
    const reason = FAILURE_REASONS[errnoCode(error) ?? ""] ?? "unknown";
    const detail =
      reason === "cross-device"
        ? "destination is on another device"
        : describeError(error);
    return this.failure(move, reason, `Cannot move '${move.source}': ${detail}`);
  }

  private failure(move: PlannedMove, reason: MoveFailureReason, message: string): MoveFailure {
    return {
      source: move.source,
      target: move.target,
      category: move.category,
      reason,
      message,
    };
  }

  private notifyProgress(
    onProgress: ProgressCallback | undefined,
    completed: number,
    total: number
  ): void {
    if (!onProgress) return;
    try {
      onProgress(completed, total);
    } catch (error: unknown) {
      this.log.warn({ error: describeError(error) }, "Progress callback failed");
    }
  }
}
