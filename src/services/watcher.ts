/**
 * DropWatcher — trigger a sort cycle when something lands in the Drop folder.
 */

import { type FSWatcher, watch } from "chokidar";
import type { Logger } from "pino";

import { describeError } from "../utils/errors";

export interface DropWatcherOptions {
  /** Quiet period after the last event before triggering */
  debounceMs: number;
  /** Wait for a file's size to stop changing before reporting it */
  stabilityThresholdMs?: number;
}

export class DropWatcher {
  private dropDir: string;
  private trigger: () => Promise<unknown>;
  private options: DropWatcherOptions;
  private log: Logger;
  private watcher: FSWatcher | null = null;
  private debounce: ReturnType<typeof setTimeout> | null = null;

  constructor(
    dropDir: string,
    trigger: () => Promise<unknown>,
    options: DropWatcherOptions,
    logger: Logger
  ) {
    this.dropDir = dropDir;
    this.trigger = trigger;
    this.options = options;
    this.log = logger;
  }

  start(): void {
    if (this.watcher) return;

    const stabilityThreshold = this.options.stabilityThresholdMs ?? 2000;
    this.watcher = watch(this.dropDir, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold,
        pollInterval: Math.min(500, stabilityThreshold),
      },
    });

    this.watcher
      .on("add", (path: string) => this.onCreated(path))
      .on("addDir", (path: string) => {
        if (path !== this.dropDir) this.onCreated(path);
      })
      .on("error", (error: unknown) => {
        this.log.error({ error: describeError(error), dropDir: this.dropDir }, "Watcher error");
      });

    this.log.info({ dropDir: this.dropDir }, "Watching drop folder");
  }

  async close(): Promise<void> {
    if (this.debounce) {
      clearTimeout(this.debounce);
      this.debounce = null;
    }
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
      this.log.debug("Watcher closed");
    }
  }

  private onCreated(path: string): void {
    this.log.debug({ path }, "New item in drop folder");
    if (this.debounce) {
      clearTimeout(this.debounce);
    }
    this.debounce = setTimeout(() => {
      this.debounce = null;
      this.trigger().catch((error: unknown) => {
        this.log.error({ error: describeError(error) }, "Triggered cycle failed");
      });
    }, this.options.debounceMs);
  }
}
