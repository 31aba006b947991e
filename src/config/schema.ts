/**
 * Configuration schema validation with Zod
 */

import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

const defaultStateDir = join(homedir(), ".drop-sorter");

/** Env flags are strings; only "true" and "1" enable them. */
const envFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === "boolean" ? value : value === "true" || value === "1"));

export const configSchema = z.object({
  workspaceDir: z.string().default("").describe("Workspace root; empty uses the remembered one"),

  stateDir: z
    .string()
    .default(defaultStateDir)
    .describe("Directory for the workspace marker and recent list"),

  scanIntervalMs: z
    .number()
    .int()
    .positive()
    .default(5000)
    .describe("Delay between sort cycles in milliseconds (default 5s)"),

  tickMs: z
    .number()
    .int()
    .positive()
    .default(1000)
    .describe("Countdown granularity in milliseconds"),

  moveConcurrency: z
    .number()
    .int()
    .min(1)
    .max(64)
    .default(4)
    .describe("Parallel moves within one cycle"),

  directoryMode: z
    .string()
    .pipe(z.enum(["wholesale", "descend"]))
    .default("wholesale")
    .describe("Move top-level folders as a unit, or sort the files inside them"),

  watchEvents: envFlag.default(false).describe("Trigger a cycle on filesystem events"),

  watchDebounceMs: z
    .number()
    .int()
    .nonnegative()
    .default(500)
    .describe("Quiet period before a watcher event triggers a cycle"),

  nodeEnv: z
    .string()
    .pipe(z.enum(["development", "production", "test"]))
    .default("development")
    .describe("Environment mode"),

  logLevel: z
    .string()
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .default("info")
    .describe("Log level"),
});

export type ConfigInput = z.input<typeof configSchema>;
export type ConfigOutput = z.output<typeof configSchema>;

/**
 * Parse environment variables into config input.
 * Unset variables stay undefined so the schema defaults apply.
 */
export function parseEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigInput {
  return {
    workspaceDir: env["WORKSPACE_DIR"] || undefined,
    stateDir: env["DROP_SORTER_STATE_DIR"] || undefined,
    scanIntervalMs: parseInteger(env["SCAN_INTERVAL_MS"]),
    tickMs: parseInteger(env["TICK_MS"]),
    moveConcurrency: parseInteger(env["MOVE_CONCURRENCY"]),
    directoryMode: env["DIRECTORY_MODE"] || undefined,
    watchEvents: env["WATCH_EVENTS"] || undefined,
    watchDebounceMs: parseInteger(env["WATCH_DEBOUNCE_MS"]),
    nodeEnv: env["NODE_ENV"] || undefined,
    logLevel: env["LOG_LEVEL"] || undefined,
  };
}

function parseInteger(value: string | undefined): number | undefined {
  return value ? Number.parseInt(value, 10) : undefined;
}
