/**
 * Matrix Orchestrator
 *
 * Drives the direction × checksum matrix, then the mangle mode × checksum
 * matrix, one SUT invocation at a time. Every case is classified on its own;
 * only an abort between cases ends the run early.
 */

import { mkdir } from "node:fs/promises";
import path from "node:path";
import { buildDirectionArgs, DIRECTION_JOB_NAME } from "../cases/args";
import { firstUnmetRequirement } from "../cases/requirements";
import { DIRECTION_ORDER } from "../cases/templates";
import {
  type CaseCoordinate,
  type CaseTemplate,
  deriveTestCase,
  isReadDirection,
  isWriteDirection,
  type MangleMode,
  mangleLabel,
  type TestCase,
} from "../cases/types";
import { InvalidManglePlanError, MissingFixtureError, ReportParseError } from "../errors";
import { FixtureRegistry } from "../fixtures/registry";
import {
  caseDirectoryName,
  combinationDirectoryName,
  resolveFixtureDirectory,
} from "../fixtures/resolver";
import {
  cryptoRandom,
  type ManglePlan,
  planMangle,
  type RandomSource,
} from "../injector/corruption";
import { judgeFaultInjection } from "../phases/stateMachine";
import { buildFaultInjectionArgs } from "../phases/stanzas";
import { asyncIoEngine, illegalByteSequenceCode } from "../platform/errorTaxonomy";
import type { HostEnvironment } from "../platform/host";
import { type RunReport, readRunReport } from "../report/parser";
import type { SutRunner, SutRunResult } from "../runner/types";
import { createNoopLogger, type IStructuredLogger } from "../telemetry/structuredLogger";
import { formatOutcomeLine, formatTotals, saveRunSummary, tally } from "./summary";
import {
  type CaseFailureKind,
  type CaseOutcome,
  DEFAULT_MATRIX_CONFIG,
  type MatrixConfig,
  type RunSummary,
} from "./types";

const FAULT_JOB_BASENAME = "faultinject";

export type MatrixDependencies = {
  runner: SutRunner;
  host: HostEnvironment;
  logger?: IStructuredLogger;
  /** Checked between cases; an aborted signal ends the run */
  signal?: AbortSignal;
  /** Offset source for corruption plans */
  random?: RandomSource;
  /** Sink for outcome lines (default: stdout) */
  writeLine?: (line: string) => void;
};

type Combination = {
  coordinate: CaseCoordinate;
  templates: readonly CaseTemplate[];
  header: string;
};

type Verdict =
  | { status: "passed" }
  | { status: "failed"; failure: CaseFailureKind; detail: string };

function writeStdoutLine(line: string): void {
  process.stdout.write(line.endsWith("\n") ? line : `${line}\n`);
}

function fail(failure: CaseFailureKind, detail: string): Verdict {
  return { status: "failed", failure, detail };
}

export class VerifyMatrixRunner {
  private readonly config: MatrixConfig;
  private readonly runner: SutRunner;
  private readonly host: HostEnvironment;
  private readonly logger: IStructuredLogger;
  private readonly signal?: AbortSignal;
  private readonly random: RandomSource;
  private readonly writeLine: (line: string) => void;
  private readonly registry = new FixtureRegistry();

  constructor(
    deps: MatrixDependencies,
    config: Partial<MatrixConfig> & Pick<MatrixConfig, "artifactRoot">
  ) {
    // Every SUT invocation runs inside its case directory.
    this.config = {
      ...DEFAULT_MATRIX_CONFIG,
      ...config,
      artifactRoot: path.resolve(config.artifactRoot),
    };
    this.runner = deps.runner;
    this.host = deps.host;
    this.logger = deps.logger ?? createNoopLogger();
    this.signal = deps.signal;
    this.random = deps.random ?? cryptoRandom;
    this.writeLine = deps.writeLine ?? writeStdoutLine;
  }

  async run(): Promise<RunSummary> {
    const startTime = Date.now();
    const outcomes: CaseOutcome[] = [];
    let interrupted = false;

    await mkdir(this.config.artifactRoot, { recursive: true });
    this.writeLine(`Artifact directory is ${this.config.artifactRoot}`);

    matrix: for (const combination of this.combinations()) {
      if (this.signal?.aborted) {
        interrupted = true;
        break;
      }
      this.writeLine("");
      this.writeLine(combination.header);

      const combinationDir = path.join(
        this.config.artifactRoot,
        combinationDirectoryName(combination.coordinate)
      );
      await mkdir(combinationDir, { recursive: true });

      for (const template of combination.templates) {
        if (this.signal?.aborted) {
          interrupted = true;
          break matrix;
        }
        const outcome = await this.runCase(template, combination.coordinate, combinationDir);
        outcomes.push(outcome);
        this.writeLine(formatOutcomeLine(outcome));
      }
    }

    const summary: RunSummary = {
      artifactRoot: this.config.artifactRoot,
      totals: tally(outcomes),
      interrupted,
      durationMs: Date.now() - startTime,
      outcomes,
    };

    if (interrupted) {
      this.logger.warn("Run interrupted; remaining cases were not executed", {
        executed: outcomes.length,
      });
    }
    const summaryPath = await saveRunSummary(summary);
    this.logger.debug("Run summary written", { path: summaryPath });

    this.writeLine("");
    this.writeLine("");
    this.writeLine(formatTotals(summary.totals));
    return summary;
  }

  /**
   * Matrix order: all direction combinations, then all fault-injection ones.
   */
  private *combinations(): Generator<Combination> {
    for (const direction of DIRECTION_ORDER) {
      for (const checksum of this.config.checksums) {
        yield {
          coordinate: { direction, checksum },
          templates: this.config.directionTemplates,
          header: `ddir: ${direction}, checksum: ${checksum}`,
        };
      }
    }
    for (const mangle of this.config.mangleModes) {
      for (const checksum of this.config.checksums) {
        yield {
          coordinate: { direction: "randwrite", checksum, mangle },
          templates: this.config.faultInjectionTemplates,
          header: `mangle: ${mangleLabel(mangle)}, checksum: ${checksum}`,
        };
      }
    }
  }

  private isSelected(testId: number): boolean {
    if (this.config.skip.includes(testId)) {
      return false;
    }
    return this.config.runOnly.length === 0 || this.config.runOnly.includes(testId);
  }

  private async runCase(
    template: CaseTemplate,
    coordinate: CaseCoordinate,
    combinationDir: string
  ): Promise<CaseOutcome> {
    const startTime = Date.now();
    const artifactDirectory = path.join(combinationDir, caseDirectoryName(template.id));
    const fixtureDirectory =
      template.kind === "direction" && isReadDirection(coordinate.direction)
        ? resolveFixtureDirectory(combinationDir, coordinate.direction, template.id)
        : undefined;
    const testCase = deriveTestCase(template, coordinate, {
      artifactDirectory,
      fixtureDirectory,
      ioEngine: asyncIoEngine(this.host.os),
    });

    const base = {
      testId: testCase.id,
      kind: testCase.kind,
      direction: testCase.direction,
      checksum: testCase.checksum,
      mangle: testCase.mangle ? mangleLabel(testCase.mangle) : undefined,
      artifactDirectory,
    };
    const logger = this.logger.child({
      testId: base.testId,
      direction: base.direction,
      checksum: base.checksum,
      mangle: base.mangle,
    });

    if (!this.isSelected(testCase.id)) {
      return {
        ...base,
        durationMs: 0,
        status: "skipped",
        reason: "UserRequest",
        detail: "User request",
      };
    }
    if (!this.config.skipRequirements) {
      const unmet = firstUnmetRequirement(testCase.requirements, this.host);
      if (unmet) {
        logger.debug("Requirement not met", { requirement: unmet.name });
        return {
          ...base,
          durationMs: 0,
          status: "skipped",
          reason: "EnvironmentUnmet",
          detail: unmet.name,
        };
      }
    }

    let verdict: Verdict;
    try {
      await mkdir(artifactDirectory, { recursive: true });
      verdict =
        testCase.kind === "faultInjection"
          ? await this.runFaultInjectionCase(testCase, logger)
          : await this.runDirectionCase(testCase, logger);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("Case aborted by unexpected error", err);
      verdict = fail("LaunchFailure", err.message);
    }

    if (verdict.status === "failed") {
      logger.info("Case failed", { failure: verdict.failure, detail: verdict.detail });
    }
    return { ...base, durationMs: Date.now() - startTime, ...verdict };
  }

  private async runDirectionCase(testCase: TestCase, logger: IStructuredLogger): Promise<Verdict> {
    if (testCase.fixtureDirectory) {
      try {
        const fixture = this.registry.require(testCase.id, testCase.fixtureDirectory);
        logger.debug("Using fixture", { directory: fixture.directory, producer: fixture.direction });
      } catch (error) {
        if (error instanceof MissingFixtureError) {
          return fail("MissingFixture", error.message);
        }
        throw error;
      }
    }

    const outputFile = `${DIRECTION_JOB_NAME}.json`;
    const result = await this.runner.run({
      args: buildDirectionArgs(testCase, outputFile),
      cwd: testCase.artifactDirectory,
      basename: DIRECTION_JOB_NAME,
      timeoutMs: this.config.timeoutMs,
    });

    const processVerdict = this.checkProcess(testCase, result);
    if (processVerdict) {
      return processVerdict;
    }
    const report = await this.loadReport(path.join(testCase.artifactDirectory, outputFile));
    if (!("phases" in report)) {
      return report;
    }
    if (report.phases.length === 0) {
      return fail("ResultParseFailure", "report lists no jobs");
    }
    const failedJob = report.phases.find((phase) => !phase.ok);
    if (failedJob) {
      return fail("JobErrorReported", `job ${failedJob.name} reported error ${failedJob.errorCode}`);
    }

    if (isWriteDirection(testCase.direction)) {
      this.registry.record({
        testId: testCase.id,
        directory: testCase.artifactDirectory,
        direction: testCase.direction,
        checksum: testCase.checksum,
      });
    }
    return { status: "passed" };
  }

  private async runFaultInjectionCase(
    testCase: TestCase,
    logger: IStructuredLogger
  ): Promise<Verdict> {
    if (!testCase.mangle) {
      return fail("CorruptionInjectionFailure", "fault-injection case has no mangle mode");
    }
    const plan = this.planCorruption(testCase, testCase.mangle);
    if (!("offset" in plan)) {
      return plan;
    }
    logger.debug("Planned corruption", { offset: plan.offset, length: plan.length });

    const outputFile = `${FAULT_JOB_BASENAME}.json`;
    const result = await this.runner.run({
      args: buildFaultInjectionArgs(testCase, plan, outputFile),
      cwd: testCase.artifactDirectory,
      basename: FAULT_JOB_BASENAME,
      timeoutMs: this.config.timeoutMs,
    });

    const processVerdict = this.checkProcess(testCase, result);
    if (processVerdict) {
      return processVerdict;
    }
    const report = await this.loadReport(path.join(testCase.artifactDirectory, outputFile));
    if (!("phases" in report)) {
      return report;
    }

    const judgement = judgeFaultInjection(report, {
      checksum: testCase.checksum,
      illegalByteSequence: illegalByteSequenceCode(this.host.os),
    });
    if (!judgement.passed) {
      return fail(judgement.kind, judgement.detail);
    }
    return { status: "passed" };
  }

  private planCorruption(testCase: TestCase, mangle: MangleMode): ManglePlan | Verdict {
    try {
      return planMangle(
        { fileSize: testCase.io.fileSize, recordSize: testCase.io.blockSize },
        mangle,
        this.random
      );
    } catch (error) {
      if (error instanceof InvalidManglePlanError) {
        return fail("CorruptionInjectionFailure", error.message);
      }
      throw error;
    }
  }

  private checkProcess(testCase: TestCase, result: SutRunResult): Verdict | null {
    if (result.launchError) {
      return fail("LaunchFailure", result.launchError);
    }
    if (result.timedOut) {
      return fail("SubprocessTimeout", `killed after ${this.config.timeoutMs} ms`);
    }
    if (testCase.success === "exactZero" && result.exitCode !== 0) {
      const status = result.exitCode ?? result.signal ?? "none";
      return fail("ExitCodeMismatch", `exit status ${status}, expected 0`);
    }
    return null;
  }

  private async loadReport(reportPath: string): Promise<RunReport | Verdict> {
    try {
      return await readRunReport(reportPath);
    } catch (error) {
      if (error instanceof ReportParseError) {
        return fail("ResultParseFailure", error.message);
      }
      throw error;
    }
  }
}

/**
 * Quick run helper
 */
export async function runVerifyMatrix(
  deps: MatrixDependencies,
  config: Partial<MatrixConfig> & Pick<MatrixConfig, "artifactRoot">
): Promise<RunSummary> {
  return new VerifyMatrixRunner(deps, config).run();
}
