import { writeFile } from "node:fs/promises";
import path from "node:path";
import type { CaseOutcome, RunSummary, RunTotals } from "./types";

export const SUMMARY_FILE = "summary.json";

export function formatOutcomeLine(outcome: CaseOutcome): string {
  switch (outcome.status) {
    case "passed":
      return `Test ${outcome.testId} PASSED`;
    case "failed":
      return `Test ${outcome.testId} FAILED (${outcome.failure}: ${outcome.detail})`;
    case "skipped":
      return `Test ${outcome.testId} SKIPPED (${outcome.detail})`;
  }
}

export function formatTotals(totals: RunTotals): string {
  return `${totals.passed} test(s) passed, ${totals.failed} failed, ${totals.skipped} skipped`;
}

export function tally(outcomes: readonly CaseOutcome[]): RunTotals {
  const totals: RunTotals = { passed: 0, failed: 0, skipped: 0 };
  for (const outcome of outcomes) {
    totals[outcome.status] += 1;
  }
  return totals;
}

/**
 * Write the run summary next to the case directories.
 */
export async function saveRunSummary(summary: RunSummary): Promise<string> {
  const file = path.join(summary.artifactRoot, SUMMARY_FILE);
  await writeFile(file, `${JSON.stringify(summary, null, 2)}\n`, "utf8");
  return file;
}
