/**
 * CycleScheduler — run the sort engine on a fixed interval via setTimeout.
 *
 * idle --start--> active --countdown hits 0--> running --cycle done--> active
 * active --stop--> idle
 * running --stop--> stopping --cycle done--> idle
 *
 * Cycles never overlap and are never interrupted once started.
 */

import type { Logger } from "pino";

import type {
  CycleOutcome,
  Notifier,
  ProgressCallback,
  SchedulerState,
  SchedulerStatus,
} from "../types";
import { DropSorterError, SortingError, describeError } from "../utils/errors";
import { formatCycleSummary } from "../utils/format";

type TimerHandle = ReturnType<typeof setTimeout>;

/** Injectable clock; defaults to the global timers. */
export interface TimerApi {
  setTimeout(fn: () => void, ms: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

const globalTimers: TimerApi = {
  setTimeout: (fn, ms) => setTimeout(fn, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};

/** The part of SortEngine the scheduler drives */
export interface CycleRunner {
  sortFolder(sourceDir: string, destDir: string, onProgress?: ProgressCallback): Promise<CycleOutcome>;
}

export interface CycleSchedulerOptions {
  intervalMs: number;
  tickMs: number;
  timer?: TimerApi;
  onProgress?: ProgressCallback;
  onCountdown?: (remainingTicks: number) => void;
  onCycle?: (outcome: CycleOutcome) => void;
  notifier?: Notifier;
}

export class CycleScheduler {
  private engine: CycleRunner;
  private options: CycleSchedulerOptions;
  private timers: TimerApi;
  private log: Logger;
  private intervalTicks: number;

  private status: SchedulerStatus = "idle";
  private remainingTicks = 0;
  private timer: TimerHandle | null = null;
  private dirs: { sourceDir: string; destDir: string } | null = null;
  private inFlight: Promise<CycleOutcome> | null = null;
  private stopWaiters: Array<() => void> = [];
  private cyclesRun = 0;
  private lastOutcome: CycleOutcome | null = null;

  constructor(engine: CycleRunner, options: CycleSchedulerOptions, logger: Logger) {
    this.engine = engine;
    this.options = options;
    this.timers = options.timer ?? globalTimers;
    this.log = logger;
    this.intervalTicks = Math.max(1, Math.ceil(options.intervalMs / options.tickMs));
  }

  /**
   * Begin periodic sorting. The first cycle runs one full interval after start.
   * Returns false if the scheduler was not idle.
   */
  start(sourceDir: string, destDir: string): boolean {
    if (this.status !== "idle") {
      this.log.warn({ status: this.status }, "Scheduler already started");
      return false;
    }

    this.dirs = { sourceDir, destDir };
    this.status = "active";
    this.resetCountdown();
    this.log.info(
      { sourceDir, destDir, intervalMs: this.options.intervalMs },
      "Scheduler started"
    );
    return true;
  }

  /**
   * Prevent further cycles. A running cycle is allowed to finish; the promise
   * resolves once the scheduler is idle.
   */
  stop(): Promise<void> {
    switch (this.status) {
      case "idle":
        return Promise.resolve();
      case "active":
        this.clearTimer();
        this.becomeIdle();
        return Promise.resolve();
      default:
        this.status = "stopping";
        this.log.info("Stop requested, waiting for the current cycle to finish");
        return new Promise((resolve) => {
          this.stopWaiters.push(resolve);
        });
    }
  }

  /**
   * Advance the countdown by one tick; at zero, run a cycle. Driven by the
   * timer, callable directly.
   */
  async tick(): Promise<void> {
    this.clearTimer();
    if (this.status !== "active") return;

    this.remainingTicks--;
    if (this.remainingTicks > 0) {
      this.options.onCountdown?.(this.remainingTicks);
      this.scheduleTick();
      return;
    }

    await this.runCycle();
  }

  /**
   * Run a cycle now instead of waiting for the countdown. While a cycle is
   * already running its promise is returned; when idle, null.
   */
  triggerNow(): Promise<CycleOutcome | null> {
    if (this.inFlight) return this.inFlight;
    if (this.status !== "active") return Promise.resolve(null);

    this.clearTimer();
    return this.runCycle();
  }

  getState(): SchedulerState {
    return {
      status: this.status,
      remainingTicks: this.status === "active" ? this.remainingTicks : 0,
      cyclesRun: this.cyclesRun,
      lastOutcome: this.lastOutcome,
    };
  }

  private runCycle(): Promise<CycleOutcome> {
    const dirs = this.dirs;
    if (!dirs) {
      return Promise.reject(new SortingError("Scheduler has no directories"));
    }

    this.status = "running";
    this.remainingTicks = 0;
    const cycle = this.executeCycle(dirs.sourceDir, dirs.destDir).finally(() => {
      this.finishCycle();
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async executeCycle(sourceDir: string, destDir: string): Promise<CycleOutcome> {
    let outcome: CycleOutcome;
    try {
      outcome = await this.engine.sortFolder(sourceDir, destDir, this.options.onProgress);
    } catch (error: unknown) {
      const err =
        error instanceof DropSorterError
          ? error
          : new SortingError(`Sort cycle failed: ${describeError(error)}`, error);
      this.log.error({ error: err.message }, "Sort cycle failed");
      outcome = { success: false, error: err };
    }

    this.cyclesRun++;
    this.lastOutcome = outcome;
    if (!outcome.success) {
      this.log.warn({ error: outcome.error.message }, "Cycle did not run, retrying next interval");
    }

    try {
      this.options.onCycle?.(outcome);
    } catch (error: unknown) {
      this.log.warn({ error: describeError(error) }, "Cycle listener failed");
    }
    await this.notify(outcome);
    return outcome;
  }

  private finishCycle(): void {
    this.inFlight = null;
    if (this.status === "stopping") {
      this.becomeIdle();
    } else if (this.status === "running") {
      this.status = "active";
      this.resetCountdown();
    }
  }

  private async notify(outcome: CycleOutcome): Promise<void> {
    const notifier = this.options.notifier;
    if (!notifier || !outcome.success || outcome.summary.total === 0) return;

    try {
      await notifier(formatCycleSummary(outcome.summary));
    } catch (error: unknown) {
      this.log.warn({ error: describeError(error) }, "Notifier failed");
    }
  }

  private resetCountdown(): void {
    this.remainingTicks = this.intervalTicks;
    this.options.onCountdown?.(this.remainingTicks);
    this.scheduleTick();
  }

  private scheduleTick(): void {
    this.clearTimer();
    this.timer = this.timers.setTimeout(() => {
      this.timer = null;
      this.tick().catch((error: unknown) => {
        this.log.error({ error: describeError(error) }, "Scheduler tick failed");
      });
    }, this.options.tickMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      this.timers.clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private becomeIdle(): void {
    this.status = "idle";
    this.dirs = null;
    this.remainingTicks = 0;
    this.log.info({ cyclesRun: this.cyclesRun }, "Scheduler stopped");

    const waiters = this.stopWaiters;
    this.stopWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
