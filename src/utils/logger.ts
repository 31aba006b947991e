/**
 * Structured logging with Pino
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const level: LogLevel = LOG_LEVELS.find((l) => l === process.env["LOG_LEVEL"]) ?? "info";

export const logger = pino({
  level,
  transport:
    process.env["NODE_ENV"] === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  base: {
    service: "drop-sorter",
  },
});

/**
 * Create a child logger with additional context
 */
export function createLogger(name: string) {
  return logger.child({ module: name });
}
