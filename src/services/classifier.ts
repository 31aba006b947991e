/**
 * Classifier — map a file extension to its category.
 */

import { extname } from "path";

import type { CategoryMapping, Classification } from "../types";
import { FALLBACK_CATEGORY } from "../types";

export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\.+/, "").toLowerCase();
}

/**
 * Extension of a base name without its dot, or "" when there is none.
 * Dotfiles such as `.bashrc` have no extension.
 */
export function extensionOf(fileName: string): string {
  return extname(fileName).slice(1);
}

/**
 * Case-insensitive lookup. Categories are scanned in the mapping's key order
 * and the first one listing the extension wins.
 */
export function classify(extension: string, mapping: CategoryMapping): Classification {
  const wanted = normalizeExtension(extension);
  if (wanted) {
    for (const [category, extensions] of Object.entries(mapping)) {
      if (extensions.some((ext) => normalizeExtension(ext) === wanted)) {
        return { category, found: true };
      }
    }
  }
  return { category: FALLBACK_CATEGORY, found: false };
}
