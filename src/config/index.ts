/**
 * Configuration loader with validation
 */

import { join, resolve } from "path";
import { ZodError } from "zod";
import type { AppConfig } from "../types/config";
import { type ConfigInput, configSchema, parseEnvVars } from "./schema";

export { configSchema, parseEnvVars } from "./schema";

/**
 * Load and validate configuration from environment variables,
 * with optional overrides (e.g. from CLI flags) taking precedence.
 * @throws Error if a value is invalid
 */
export function loadConfig(overrides: Partial<ConfigInput> = {}): AppConfig {
  const input: ConfigInput = { ...parseEnvVars() };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(input, { [key]: value });
    }
  }

  try {
    const validated = configSchema.parse(input);
    const stateDir = resolve(validated.stateDir);

    return {
      ...validated,
      workspaceDir: validated.workspaceDir ? resolve(validated.workspaceDir) : "",
      stateDir,
      markerFile: join(stateDir, "workspace.txt"),
      recentFile: join(stateDir, "recent_workspaces.txt"),
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);
      throw new Error(`Configuration validation failed:\n${issues.join("\n")}`);
    }
    throw error;
  }
}

/**
 * Validate configuration without throwing
 * Returns validation result with errors if any
 */
export function validateConfig(
  overrides: Partial<ConfigInput> = {}
): { success: true; config: AppConfig } | { success: false; errors: string[] } {
  try {
    const config = loadConfig(overrides);
    return { success: true, config };
  } catch (error) {
    if (error instanceof Error) {
      return { success: false, errors: [error.message] };
    }
    return { success: false, errors: ["Unknown configuration error"] };
  }
}
