/**
 * CategoryEditor — validated edits to the category mapping.
 *
 * Edits apply to an in-memory copy of the merged mapping; `save()` writes the
 * whole copy as the user overlay. A failed save keeps the edits for a retry.
 */

import type { Logger } from "pino";

import type { CategoryMapping } from "../types";
import { FALLBACK_CATEGORY } from "../types";
import {
  DuplicateCategory,
  DuplicateExtension,
  ProtectedCategory,
  UnknownCategory,
  UnknownExtension,
} from "../utils/errors";
import { validateCategoryName, validateExtension } from "../utils/validation";
import { type CategoryStore, cloneMapping } from "./categoryStore";
import { normalizeExtension } from "./classifier";

export class CategoryEditor {
  private store: CategoryStore;
  private log: Logger;
  private categories: CategoryMapping;
  private dirty = false;

  private constructor(store: CategoryStore, categories: CategoryMapping, logger: Logger) {
    this.store = store;
    this.categories = categories;
    this.log = logger;
  }

  /**
   * Open an editor on the store's current merged mapping.
   * @throws ConfigReadError
   */
  static async open(store: CategoryStore, logger: Logger): Promise<CategoryEditor> {
    return new CategoryEditor(store, await store.loadCategories(), logger);
  }

  mapping(): CategoryMapping {
    return cloneMapping(this.categories);
  }

  hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  /**
   * @returns the normalized name
   * @throws EmptyCategoryName | DuplicateCategory
   */
  addCategory(raw: string): string {
    const name = validateCategoryName(raw);
    if (this.categories[name]) {
      throw new DuplicateCategory(name);
    }

    this.categories[name] = [];
    this.markChanged({ category: name }, "Category added");
    return name;
  }

  /**
   * Built-in categories stay in the overlay with no extensions, so they do
   * not come back from the built-in file on the next load.
   * @throws ProtectedCategory | UnknownCategory
   */
  removeCategory(raw: string): void {
    const name = validateCategoryName(raw);
    if (name === FALLBACK_CATEGORY) {
      throw new ProtectedCategory(name);
    }
    if (!this.categories[name]) {
      throw new UnknownCategory(name);
    }

    if (this.store.defaults()[name]) {
      this.categories[name] = [];
    } else {
      delete this.categories[name];
    }
    this.markChanged({ category: name }, "Category removed");
  }

  /**
   * An extension may belong to one category only.
   * @returns the normalized extension
   * @throws EmptyExtension | InvalidExtensionFormat | UnknownCategory | DuplicateExtension
   */
  addExtension(rawCategory: string, rawExtension: string): string {
    const category = validateCategoryName(rawCategory);
    const extension = validateExtension(rawExtension);
    const extensions = this.categories[category];
    if (!extensions) {
      throw new UnknownCategory(category);
    }

    const owner = this.ownerOf(extension);
    if (owner) {
      throw new DuplicateExtension(extension, owner);
    }

    extensions.push(extension);
    this.markChanged({ category, extension }, "Extension added");
    return extension;
  }

  /**
   * @throws EmptyExtension | InvalidExtensionFormat | UnknownCategory | UnknownExtension
   */
  removeExtension(rawCategory: string, rawExtension: string): void {
    const category = validateCategoryName(rawCategory);
    const extension = validateExtension(rawExtension);
    const extensions = this.categories[category];
    if (!extensions) {
      throw new UnknownCategory(category);
    }

    const index = extensions.findIndex((ext) => normalizeExtension(ext) === extension);
    if (index === -1) {
      throw new UnknownExtension(extension, category);
    }

    extensions.splice(index, 1);
    this.markChanged({ category, extension }, "Extension removed");
  }

  /**
   * @throws ConfigWriteError, leaving the edits in place
   */
  async save(): Promise<void> {
    await this.store.saveUserCategories(this.mapping());
    this.dirty = false;
  }

  private ownerOf(extension: string): string | null {
    for (const [category, extensions] of Object.entries(this.categories)) {
      if (extensions.some((ext) => normalizeExtension(ext) === extension)) {
        return category;
      }
    }
    return null;
  }

  private markChanged(details: Record<string, string>, message: string): void {
    this.dirty = true;
    this.log.debug(details, message);
  }
}
