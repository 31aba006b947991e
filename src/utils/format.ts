/**
 * Human-readable renderings of cycle results
 */

import type { CategoryMapping, CycleSummary, MoveFailure } from "../types";

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/**
 * One-line summary, e.g. "Sorted 3 items into 2 categories, 1 failed"
 */
export function formatCycleSummary(summary: CycleSummary): string {
  if (summary.total === 0) {
    return "Nothing to sort";
  }

  const categories = Object.keys(summary.byCategory).length;
  const base = `Sorted ${plural(summary.moved, "item")} into ${plural(categories, "category", "categories")}`;
  return summary.failed > 0 ? `${base}, ${summary.failed} failed` : base;
}

export function formatFailure(failure: MoveFailure): string {
  return `[${failure.reason}] ${failure.message}`;
}

/**
 * Category listing, one line per category: "Docs: .pdf, .txt"
 */
export function formatMapping(mapping: CategoryMapping): string[] {
  return Object.entries(mapping).map(([category, extensions]) =>
    extensions.length > 0
      ? `${category}: ${extensions.map((ext) => `.${ext}`).join(", ")}`
      : `${category}: (none)`
  );
}
