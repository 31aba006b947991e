/**
 * Centralized utility exports
 */

export { logger, createLogger, type LogLevel } from "./logger";
export { createLockManager, releaseLockOnExit, type LockManager } from "./lock";
export { TaskPool } from "./pool";
export { writeFileAtomic, writeJsonAtomic } from "./atomic";
export { formatCycleSummary, formatFailure, formatMapping } from "./format";
export { validateCategoryName, validateExtension } from "./validation";
export * from "./errors";
