import { readFile } from "node:fs/promises";
import { ReportParseError } from "../errors";
import { SutReportSchema } from "./schema";

export type PhaseResult = {
  /** Job stanza name */
  name: string;
  errorCode: number;
  ok: boolean;
};

/** Per-stanza results of one SUT invocation, in report order */
export type RunReport = {
  phases: readonly PhaseResult[];
};

/** The SUT may print informational lines ahead of the JSON document */
const MAX_LEADING_LINES = 4;

export function parseRunReport(text: string, source: string): RunReport {
  const lines = text.split(/\r?\n/);
  for (let skip = 0; skip <= MAX_LEADING_LINES && skip < lines.length; skip++) {
    let document: unknown;
    try {
      document = JSON.parse(lines.slice(skip).join("\n"));
    } catch {
      continue;
    }

    const parsed = SutReportSchema.safeParse(document);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
      );
      throw new ReportParseError(source, `unexpected report shape (${issues.join("; ")})`);
    }

    return {
      phases: parsed.data.jobs.map((job) => ({
        name: job.jobname,
        errorCode: job.error,
        ok: job.error === 0,
      })),
    };
  }
  throw new ReportParseError(source, "no JSON document found");
}

export async function readRunReport(reportPath: string): Promise<RunReport> {
  let text: string;
  try {
    text = await readFile(reportPath, "utf8");
  } catch (error) {
    throw new ReportParseError(reportPath, "report not readable", { cause: error });
  }
  return parseRunReport(text, reportPath);
}
