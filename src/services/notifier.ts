/**
 * Notifier backed by the logger, used when no desktop notification backend
 * is wired in.
 */

import type { Logger } from "pino";

import type { Notifier } from "../types";

export function createLogNotifier(log: Logger): Notifier {
  return (summary) => {
    log.info({ summary }, "Sort cycle finished");
  };
}
