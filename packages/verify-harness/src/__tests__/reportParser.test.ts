import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ReportParseError } from "../errors";
import { parseRunReport, readRunReport } from "../report/parser";

const REPORT = JSON.stringify({
  "fio version": "fio-3.36",
  jobs: [
    { jobname: "layout", error: 0, read: {} },
    { jobname: "failure", error: 84 },
  ],
});

describe("parseRunReport", () => {
  it("extracts per-job error codes in report order", () => {
    expect(parseRunReport(REPORT, "report.json")).toEqual({
      phases: [
        { name: "layout", errorCode: 0, ok: true },
        { name: "failure", errorCode: 84, ok: false },
      ],
    });
  });

  it("skips informational lines ahead of the document", () => {
    const text = ["note: both iodepth >= 1 and synchronous I/O engine", "note: another line", REPORT].join(
      "\n"
    );
    expect(parseRunReport(text, "report.json").phases).toHaveLength(2);
  });

  it("tolerates four leading lines", () => {
    const text = ["one", "two", "three", "four", REPORT].join("\n");
    expect(parseRunReport(text, "report.json").phases).toHaveLength(2);
  });

  it("gives up after four leading lines", () => {
    const text = ["one", "two", "three", "four", "five", REPORT].join("\n");
    expect(() => parseRunReport(text, "report.json")).toThrow(
      "report.json: no JSON document found"
    );
  });

  it("rejects a document without jobs", () => {
    expect(() => parseRunReport(JSON.stringify({ jobs: "none" }), "r.json")).toThrow(
      ReportParseError
    );
  });

  it("rejects a job without an integer error", () => {
    const text = JSON.stringify({ jobs: [{ jobname: "verify", error: "EIO" }] });
    expect(() => parseRunReport(text, "r.json")).toThrow(/unexpected report shape \(jobs\.0\.error: /);
  });

  it("rejects empty output", () => {
    expect(() => parseRunReport("", "r.json")).toThrow("r.json: no JSON document found");
  });
});

describe("readRunReport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "blkverify-report-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and parses a report file", async () => {
    const file = path.join(dir, "verify.json");
    await writeFile(file, REPORT, "utf8");
    const result = await readRunReport(file);
    expect(result.phases.map((p) => p.name)).toEqual(["layout", "failure"]);
  });

  it("wraps a missing file in ReportParseError", async () => {
    const file = path.join(dir, "missing.json");
    await expect(readRunReport(file)).rejects.toThrow(`${file}: report not readable`);
  });
});
