import { describe, expect, test } from "vitest";
import type { CycleSummary } from "../../../src/types";
import { formatCycleSummary, formatFailure, formatMapping } from "../../../src/utils/format";

function summary(overrides: Partial<CycleSummary>): CycleSummary {
  return {
    total: 0,
    moved: 0,
    failed: 0,
    moves: [],
    failures: [],
    byCategory: {},
    startedAt: "2026-02-07T06:00:00.000Z",
    durationMs: 3,
    ...overrides,
  };
}

describe("formatCycleSummary", () => {
  test("reports an empty cycle", () => {
    expect(formatCycleSummary(summary({}))).toBe("Nothing to sort");
  });

  test("uses singular forms for one item in one category", () => {
    expect(formatCycleSummary(summary({ total: 1, moved: 1, byCategory: { Docs: 1 } }))).toBe(
      "Sorted 1 item into 1 category"
    );
  });

  test("appends the failure count", () => {
    const text = formatCycleSummary(
      summary({ total: 4, moved: 3, failed: 1, byCategory: { Docs: 2, Images: 1 } })
    );

    expect(text).toBe("Sorted 3 items into 2 categories, 1 failed");
  });
});

describe("formatFailure", () => {
  test("prefixes the reason", () => {
    expect(
      formatFailure({
        source: "/drop/a.pdf",
        target: "/sorted/Docs/a.pdf",
        category: "Docs",
        reason: "collision",
        message: "'/sorted/Docs/a.pdf' already exists; '/drop/a.pdf' left in place",
      })
    ).toBe("[collision] '/sorted/Docs/a.pdf' already exists; '/drop/a.pdf' left in place");
  });
});

describe("formatMapping", () => {
  test("lists each category with dotted extensions", () => {
    expect(formatMapping({ Docs: ["pdf", "txt"], Other: [] })).toEqual([
      "Docs: .pdf, .txt",
      "Other: (none)",
    ]);
  });
});
