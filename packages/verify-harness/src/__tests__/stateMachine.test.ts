/**
 * @file stateMachine.test.ts
 * @description Tests for the fault-injection phase state machine and its judgement
 */

import { describe, expect, it } from "vitest";
import {
  type FailureExpectation,
  InvalidTransitionError,
  judgeFaultInjection,
  PhaseStateMachine,
} from "../phases/stateMachine";
import type { RunReport } from "../report/parser";

function report(codes: Array<[string, number]>): RunReport {
  return {
    phases: codes.map(([name, errorCode]) => ({ name, errorCode, ok: errorCode === 0 })),
  };
}

const LINUX_CRC32C: FailureExpectation = { checksum: "crc32c", illegalByteSequence: 84 };

describe("PhaseStateMachine", () => {
  it("starts in LAYOUT expecting the layout phase", () => {
    const machine = new PhaseStateMachine();
    expect(machine.getState()).toBe("LAYOUT");
    expect(machine.expectedPhase()).toBe("layout");
    expect(machine.isDone()).toBe(false);
  });

  it("walks all four phases in order", () => {
    const machine = new PhaseStateMachine();
    expect(machine.advance("layout")).toBe("SUCCESS");
    expect(machine.advance("success")).toBe("MANGLE");
    expect(machine.advance("mangle")).toBe("FAILURE");
    expect(machine.advance("failure")).toBe("DONE");
    expect(machine.isDone()).toBe(true);
    expect(machine.expectedPhase()).toBeNull();
  });

  it("records transition history", () => {
    const machine = new PhaseStateMachine();
    machine.advance("layout");
    machine.advance("success");
    expect(machine.getHistory()).toEqual([
      { from: "LAYOUT", to: "SUCCESS", phase: "layout" },
      { from: "SUCCESS", to: "MANGLE", phase: "success" },
    ]);
  });

  it("rejects an out-of-order phase", () => {
    const machine = new PhaseStateMachine();
    expect(() => machine.advance("mangle")).toThrow(InvalidTransitionError);
    expect(machine.getState()).toBe("LAYOUT");
  });

  it("rejects any phase once done", () => {
    const machine = new PhaseStateMachine();
    for (const phase of ["layout", "success", "mangle", "failure"] as const) {
      machine.advance(phase);
    }
    expect(() => machine.advance("layout")).toThrow(
      'Invalid phase transition: cannot complete "layout" from state "DONE"'
    );
  });
});

describe("judgeFaultInjection", () => {
  it("passes when the failure phase reports the platform code", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 0],
        ["success", 0],
        ["mangle", 0],
        ["failure", 84],
      ]),
      LINUX_CRC32C
    );
    expect(judgement.passed).toBe(true);
  });

  it("accepts a clean failure phase when the checksum is null", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 0],
        ["success", 0],
        ["mangle", 0],
        ["failure", 0],
      ]),
      { checksum: "null", illegalByteSequence: 84 }
    );
    expect(judgement.passed).toBe(true);
  });

  it("flags a nonzero layout phase as a fixture setup failure", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 5],
        ["success", 0],
        ["mangle", 0],
        ["failure", 84],
      ]),
      LINUX_CRC32C
    );
    expect(judgement).toEqual({
      passed: false,
      kind: "FixtureSetupFailure",
      phase: "layout",
      detail: "layout phase reported error 5",
    });
  });

  it("flags a nonzero success phase as a fixture setup failure", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 0],
        ["success", 84],
        ["mangle", 0],
        ["failure", 84],
      ]),
      LINUX_CRC32C
    );
    expect(judgement).toMatchObject({ passed: false, kind: "FixtureSetupFailure", phase: "success" });
  });

  it("flags a nonzero mangle phase as a corruption injection failure", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 0],
        ["success", 0],
        ["mangle", 28],
        ["failure", 84],
      ]),
      LINUX_CRC32C
    );
    expect(judgement).toEqual({
      passed: false,
      kind: "CorruptionInjectionFailure",
      phase: "mangle",
      detail: "mangle phase reported error 28",
    });
  });

  it("flags an undetected corruption as a detection mismatch", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 0],
        ["success", 0],
        ["mangle", 0],
        ["failure", 0],
      ]),
      LINUX_CRC32C
    );
    expect(judgement).toEqual({
      passed: false,
      kind: "DetectionMismatch",
      phase: "failure",
      detail: "failure phase reported error 0, expected 84",
    });
  });

  it("flags another platform's code as a detection mismatch", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 0],
        ["success", 0],
        ["mangle", 0],
        ["failure", 92],
      ]),
      LINUX_CRC32C
    );
    expect(judgement).toMatchObject({ passed: false, kind: "DetectionMismatch" });
  });

  it("reports the earliest failing phase", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 0],
        ["success", 5],
        ["mangle", 28],
        ["failure", 0],
      ]),
      LINUX_CRC32C
    );
    expect(judgement).toMatchObject({ kind: "FixtureSetupFailure", phase: "success" });
  });

  it("judges phases by name regardless of report order", () => {
    const judgement = judgeFaultInjection(
      report([
        ["failure", 84],
        ["mangle", 0],
        ["success", 0],
        ["layout", 0],
      ]),
      LINUX_CRC32C
    );
    expect(judgement.passed).toBe(true);
  });

  it("flags a report with three phases as a phase count mismatch", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 0],
        ["success", 0],
        ["mangle", 0],
      ]),
      LINUX_CRC32C
    );
    expect(judgement).toEqual({
      passed: false,
      kind: "PhaseCountMismatch",
      detail: "expected phases layout, success, mangle, failure; got layout, success, mangle",
    });
  });

  it("flags a duplicated phase as a phase count mismatch", () => {
    const judgement = judgeFaultInjection(
      report([
        ["layout", 0],
        ["success", 0],
        ["success", 0],
        ["failure", 84],
      ]),
      LINUX_CRC32C
    );
    expect(judgement).toMatchObject({ passed: false, kind: "PhaseCountMismatch" });
  });

  it("flags an empty report as a phase count mismatch", () => {
    const judgement = judgeFaultInjection({ phases: [] }, LINUX_CRC32C);
    expect(judgement).toEqual({
      passed: false,
      kind: "PhaseCountMismatch",
      detail: "expected phases layout, success, mangle, failure; got none",
    });
  });
});
