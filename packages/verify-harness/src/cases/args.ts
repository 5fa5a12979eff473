import type { IoParameters, TestCase } from "./types";

/** Job name of direction cases; also names the SUT's data file (`verify.0.0`) */
export const DIRECTION_JOB_NAME = "verify";

export function ioOptionArgs(io: Readonly<IoParameters>): string[] {
  const args = [
    `--direct=${io.direct ? 1 : 0}`,
    `--iodepth=${io.ioDepth}`,
    `--filesize=${io.fileSize}`,
    `--bs=${io.blockSize}`,
  ];
  if (io.norandommap) {
    args.push("--norandommap=1");
  }
  if (io.verifyInterval !== undefined) {
    args.push(`--verify_interval=${io.verifyInterval}`);
  }
  if (io.verifyBacklog !== undefined) {
    args.push(`--verify_backlog=${io.verifyBacklog}`);
  }
  if (io.verifyBacklogBatch !== undefined) {
    args.push(`--verify_backlog_batch=${io.verifyBacklogBatch}`);
  }
  if (io.verifyAsync !== undefined) {
    args.push(`--verify_async=${io.verifyAsync}`);
  }
  if (io.verifyAsyncCpus !== undefined) {
    args.push(`--verify_async_cpus=${io.verifyAsyncCpus}`);
  }
  return args;
}

export function outputArgs(outputFile: string): string[] {
  return ["--output-format=json", `--output=${outputFile}`];
}

/**
 * Argument vector of a single-stanza direction case. Read-class cases point
 * the SUT at the directory holding their fixture.
 */
export function buildDirectionArgs(testCase: TestCase, outputFile: string): string[] {
  const args = [
    ...outputArgs(outputFile),
    `--name=${DIRECTION_JOB_NAME}`,
    `--ioengine=${testCase.ioEngine}`,
    `--rw=${testCase.direction}`,
    `--verify=${testCase.checksum}`,
    ...ioOptionArgs(testCase.io),
  ];
  if (testCase.fixtureDirectory) {
    args.push(`--directory=${testCase.fixtureDirectory}`);
  }
  return args;
}
