/**
 * Category mapping types
 */

/** Category name → lower-case extensions without a leading dot */
export type CategoryMapping = Record<string, string[]>;

/** Catch-all category for items no other category claims */
export const FALLBACK_CATEGORY = "Other";

export interface Classification {
  category: string;
  /** false when the extension matched no category and the fallback was used */
  found: boolean;
}
