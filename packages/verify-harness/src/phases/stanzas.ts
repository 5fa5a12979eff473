import { ioOptionArgs, outputArgs } from "../cases/args";
import type { TestCase } from "../cases/types";
import { type ManglePlan, mangleJobArgs } from "../injector/corruption";
import type { FaultPhase } from "./stateMachine";

/** Data file shared by all four stanzas, relative to the case directory */
export const FAULT_DATA_FILE = "verify.bin";

function verifyStanza(name: FaultPhase, testCase: TestCase): string[] {
  return [
    `--name=${name}`,
    "--stonewall",
    "--rw=randread",
    `--ioengine=${testCase.ioEngine}`,
    `--verify=${testCase.checksum}`,
    ...ioOptionArgs(testCase.io),
  ];
}

/**
 * Argument vector for one fault-injection invocation:
 * layout (write) -> success (verify) -> mangle (corrupt) -> failure (verify).
 */
export function buildFaultInjectionArgs(
  testCase: TestCase,
  plan: ManglePlan,
  outputFile: string
): string[] {
  return [
    ...outputArgs(outputFile),
    `--filename=${FAULT_DATA_FILE}`,
    `--filesize=${testCase.io.fileSize}`,
    "--name=layout",
    "--rw=randwrite",
    `--ioengine=${testCase.ioEngine}`,
    `--verify=${testCase.checksum}`,
    "--do_verify=0",
    ...ioOptionArgs(testCase.io),
    ...verifyStanza("success", testCase),
    "--name=mangle",
    "--stonewall",
    ...mangleJobArgs(plan),
    ...verifyStanza("failure", testCase),
  ];
}
