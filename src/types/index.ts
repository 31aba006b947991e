/**
 * Centralized type exports
 */

export type { AppConfig, DirectoryMode, WorkspacePaths } from "./config";
export type { CategoryMapping, Classification } from "./categories";
export { FALLBACK_CATEGORY } from "./categories";
export type {
  CycleOutcome,
  CycleSummary,
  MoveFailure,
  MoveFailureReason,
  Notifier,
  PlannedItemKind,
  PlannedMove,
  ProgressCallback,
  SchedulerState,
  SchedulerStatus,
} from "./sorting";
