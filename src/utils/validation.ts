/**
 * Format rules for user-supplied category names and extensions.
 *
 * Uniqueness is not checked here; that needs the full mapping and belongs to
 * the category editor.
 */

import { EmptyCategoryName, EmptyExtension, InvalidExtensionFormat } from "./errors";

const EXTENSION_PATTERN = /^[a-z0-9]+$/;

/**
 * Normalize an extension: trim, drop one leading dot, lower-case.
 * @throws EmptyExtension | InvalidExtensionFormat
 */
export function validateExtension(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new EmptyExtension();
  }

  const normalized = (trimmed.startsWith(".") ? trimmed.slice(1) : trimmed).toLowerCase();
  if (!EXTENSION_PATTERN.test(normalized)) {
    throw new InvalidExtensionFormat(normalized);
  }
  return normalized;
}

/**
 * @throws EmptyCategoryName
 */
export function validateCategoryName(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new EmptyCategoryName();
  }
  return trimmed;
}
