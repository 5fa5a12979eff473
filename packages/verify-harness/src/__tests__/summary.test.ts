import { describe, expect, it } from "vitest";
import { formatOutcomeLine, formatTotals, tally } from "../matrix/summary";
import type { CaseOutcome } from "../matrix/types";

const base = {
  kind: "direction",
  direction: "write",
  checksum: "md5",
  artifactDirectory: "/runs/ddir_write_csum_md5/0001",
  durationMs: 0,
} as const;

const outcomes: CaseOutcome[] = [
  { ...base, testId: 1, status: "passed" },
  { ...base, testId: 2, status: "failed", failure: "ExitCodeMismatch", detail: "exit status 1, expected 0" },
  { ...base, testId: 5, status: "skipped", reason: "EnvironmentUnmet", detail: "2 or more CPUs required" },
  { ...base, testId: 3, status: "passed" },
];

describe("run summary", () => {
  it("formats one line per outcome", () => {
    expect(outcomes.map(formatOutcomeLine)).toEqual([
      "Test 1 PASSED",
      "Test 2 FAILED (ExitCodeMismatch: exit status 1, expected 0)",
      "Test 5 SKIPPED (2 or more CPUs required)",
      "Test 3 PASSED",
    ]);
  });

  it("tallies outcomes by status", () => {
    expect(tally(outcomes)).toEqual({ passed: 2, failed: 1, skipped: 1 });
  });

  it("formats totals", () => {
    expect(formatTotals({ passed: 2, failed: 1, skipped: 1 })).toBe(
      "2 test(s) passed, 1 failed, 1 skipped"
    );
  });
});
