/**
 * Sort cycle types
 */

import type { DropSorterError } from "../utils/errors";

export type ProgressCallback = (completed: number, total: number) => void;

export type PlannedItemKind = "file" | "directory";

export interface PlannedMove {
  source: string;
  target: string;
  category: string;
  kind: PlannedItemKind;
}

export type MoveFailureReason =
  | "collision"
  | "cross-device"
  | "permission"
  | "busy"
  | "missing"
  | "invalid-category"
  | "unknown";

export interface MoveFailure {
  source: string;
  target: string;
  category: string;
  reason: MoveFailureReason;
  message: string;
}

export interface CycleSummary {
  total: number;
  moved: number;
  failed: number;
  moves: PlannedMove[];
  failures: MoveFailure[];
  /** Successful moves per category */
  byCategory: Record<string, number>;
  startedAt: string;
  durationMs: number;
}

export type CycleOutcome =
  | { success: true; summary: CycleSummary }
  | { success: false; error: DropSorterError };

export type SchedulerStatus = "idle" | "active" | "running" | "stopping";

export interface SchedulerState {
  status: SchedulerStatus;
  /** Ticks left before the next cycle (0 while running or idle) */
  remainingTicks: number;
  cyclesRun: number;
  lastOutcome: CycleOutcome | null;
}

/**
 * Called with a human-readable summary after a cycle that moved or failed at
 * least one item. Cycles that found nothing to sort are not reported.
 */
export type Notifier = (summary: string) => void | Promise<void>;
