/**
 * CategoryStore — built-in and user-defined extension mappings.
 *
 * Sole writer of the category files. `categories.json` holds the built-in set
 * and is created from the bundled defaults when missing; `user_categories.json`
 * is an optional overlay that replaces built-in categories by name.
 */

import { readFile, unlink } from "fs/promises";
import type { Logger } from "pino";
import { z } from "zod";

import defaultCategories from "../data/default-categories.json";
import type { CategoryMapping } from "../types";
import { FALLBACK_CATEGORY } from "../types";
import { writeJsonAtomic } from "../utils/atomic";
import { ConfigReadError, ConfigWriteError, errnoCode } from "../utils/errors";
import { normalizeExtension } from "./classifier";

const mappingSchema = z.record(
  z.string().min(1),
  z
    .array(z.string())
    .transform((extensions) => extensions.map(normalizeExtension).filter((ext) => ext.length > 0))
);

export function builtInCategories(): CategoryMapping {
  return cloneMapping(mappingSchema.parse(defaultCategories));
}

export function cloneMapping(mapping: CategoryMapping): CategoryMapping {
  const copy: CategoryMapping = {};
  for (const [category, extensions] of Object.entries(mapping)) {
    copy[category] = [...extensions];
  }
  return copy;
}

export interface CategoryStorePaths {
  categoriesFile: string;
  userCategoriesFile: string;
}

export class CategoryStore {
  private categoriesFile: string;
  private userCategoriesFile: string;
  private log: Logger;

  constructor(paths: CategoryStorePaths, logger: Logger) {
    this.categoriesFile = paths.categoriesFile;
    this.userCategoriesFile = paths.userCategoriesFile;
    this.log = logger;
  }

  /**
   * Built-in mapping with user overlay applied. Always contains the fallback
   * category.
   * @throws ConfigReadError if either file is unreadable or malformed
   * @throws ConfigWriteError if the missing built-in file cannot be created
   */
  async loadCategories(): Promise<CategoryMapping> {
    const builtIn = await this.loadBuiltIn();
    const overlay = await this.loadUserCategories();

    const merged: CategoryMapping = { ...builtIn };
    for (const [category, extensions] of Object.entries(overlay)) {
      merged[category] = [...extensions];
    }
    if (!merged[FALLBACK_CATEGORY]) {
      merged[FALLBACK_CATEGORY] = [];
    }

    this.log.debug(
      { categories: Object.keys(merged).length, overrides: Object.keys(overlay).length },
      "Categories loaded"
    );
    return merged;
  }

  /**
   * The user overlay alone; empty when no overlay file exists.
   * @throws ConfigReadError
   */
  async loadUserCategories(): Promise<CategoryMapping> {
    return (await this.readMapping(this.userCategoriesFile)) ?? {};
  }

  /**
   * Persist the overlay atomically.
   * @throws ConfigWriteError
   */
  async saveUserCategories(mapping: CategoryMapping): Promise<void> {
    try {
      await writeJsonAtomic(this.userCategoriesFile, mapping);
    } catch (error: unknown) {
      throw new ConfigWriteError(this.userCategoriesFile, error);
    }
    this.log.info({ categories: Object.keys(mapping).length }, "User categories saved");
  }

  /**
   * Drop the overlay so only built-in categories remain.
   * @throws ConfigWriteError
   */
  async resetUserCategories(): Promise<void> {
    try {
      await unlink(this.userCategoriesFile);
      this.log.info("User categories reset");
    } catch (error: unknown) {
      if (errnoCode(error) !== "ENOENT") {
        throw new ConfigWriteError(this.userCategoriesFile, error);
      }
    }
  }

  defaults(): CategoryMapping {
    return builtInCategories();
  }

  private async loadBuiltIn(): Promise<CategoryMapping> {
    const existing = await this.readMapping(this.categoriesFile);
    if (existing) return existing;

    const defaults = builtInCategories();
    try {
      await writeJsonAtomic(this.categoriesFile, defaults);
    } catch (error: unknown) {
      throw new ConfigWriteError(this.categoriesFile, error);
    }
    this.log.info({ file: this.categoriesFile }, "Default categories file created");
    return defaults;
  }

  /** null when the file does not exist */
  private async readMapping(filePath: string): Promise<CategoryMapping | null> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (error: unknown) {
      if (errnoCode(error) === "ENOENT") return null;
      throw new ConfigReadError(filePath, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error: unknown) {
      throw new ConfigReadError(filePath, error);
    }

    const parsed = mappingSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new ConfigReadError(filePath, `${issue?.message ?? "invalid shape"}${where}`);
    }
    return parsed.data;
  }
}
