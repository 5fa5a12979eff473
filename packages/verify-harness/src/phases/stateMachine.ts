/**
 * Fault-Injection Phase State Machine
 *
 * One SUT invocation carries four stonewalled stanzas. The machine walks them
 * in order and stops at the first phase whose error code breaks its rule:
 *
 *   LAYOUT -> SUCCESS -> MANGLE -> FAILURE -> DONE
 *
 * @module phases/stateMachine
 */

import type { ChecksumAlgorithm } from "../cases/types";
import { HarnessError } from "../errors";
import type { PhaseResult, RunReport } from "../report/parser";

// ============================================================================
// Types
// ============================================================================

export type FaultPhase = "layout" | "success" | "mangle" | "failure";

/** Stanza order within the invocation */
export const FAULT_PHASES: readonly FaultPhase[] = ["layout", "success", "mangle", "failure"];

export type PhaseState = "LAYOUT" | "SUCCESS" | "MANGLE" | "FAILURE" | "DONE";

export interface PhaseStateTransition {
  readonly from: PhaseState;
  readonly to: PhaseState;
  readonly phase: FaultPhase;
}

export type FaultInjectionFailureKind =
  | "FixtureSetupFailure"
  | "CorruptionInjectionFailure"
  | "DetectionMismatch"
  | "PhaseCountMismatch";

export type PhaseJudgement =
  | { passed: true; phases: readonly PhaseResult[] }
  | { passed: false; kind: FaultInjectionFailureKind; phase?: FaultPhase; detail: string };

export type FailureExpectation = {
  checksum: ChecksumAlgorithm;
  /** Platform code for a detected integrity violation */
  illegalByteSequence: number;
};

// ============================================================================
// Constants
// ============================================================================

type ActiveState = Exclude<PhaseState, "DONE">;

const STATE_PHASE: Readonly<Record<ActiveState, FaultPhase>> = {
  LAYOUT: "layout",
  SUCCESS: "success",
  MANGLE: "mangle",
  FAILURE: "failure",
};

const NEXT_STATE: Readonly<Record<ActiveState, PhaseState>> = {
  LAYOUT: "SUCCESS",
  SUCCESS: "MANGLE",
  MANGLE: "FAILURE",
  FAILURE: "DONE",
};

// ============================================================================
// State Machine
// ============================================================================

export class PhaseStateMachine {
  private state: PhaseState = "LAYOUT";
  private readonly history: PhaseStateTransition[] = [];

  getState(): PhaseState {
    return this.state;
  }

  /** Phase the machine is waiting on, or null once done */
  expectedPhase(): FaultPhase | null {
    return this.state === "DONE" ? null : STATE_PHASE[this.state];
  }

  isDone(): boolean {
    return this.state === "DONE";
  }

  /**
   * Mark `phase` complete and move on.
   *
   * @throws InvalidTransitionError if `phase` is not the one expected next
   */
  advance(phase: FaultPhase): PhaseState {
    const from = this.state;
    if (from === "DONE" || STATE_PHASE[from] !== phase) {
      throw new InvalidTransitionError(from, phase);
    }
    const to = NEXT_STATE[from];
    this.history.push({ from, to, phase });
    this.state = to;
    return to;
  }

  getHistory(): readonly PhaseStateTransition[] {
    return [...this.history];
  }
}

// ============================================================================
// Judgement
// ============================================================================

function judgePhase(
  phase: FaultPhase,
  result: PhaseResult,
  expectation: FailureExpectation
): Extract<PhaseJudgement, { passed: false }> | null {
  switch (phase) {
    case "layout":
    case "success":
      if (result.errorCode !== 0) {
        return {
          passed: false,
          kind: "FixtureSetupFailure",
          phase,
          detail: `${phase} phase reported error ${result.errorCode}`,
        };
      }
      return null;
    case "mangle":
      if (result.errorCode !== 0) {
        return {
          passed: false,
          kind: "CorruptionInjectionFailure",
          phase,
          detail: `mangle phase reported error ${result.errorCode}`,
        };
      }
      return null;
    case "failure":
      // A disabled checksum cannot be expected to notice anything.
      if (expectation.checksum === "null") {
        return null;
      }
      if (result.errorCode !== expectation.illegalByteSequence) {
        return {
          passed: false,
          kind: "DetectionMismatch",
          phase,
          detail: `failure phase reported error ${result.errorCode}, expected ${expectation.illegalByteSequence}`,
        };
      }
      return null;
  }
}

function phaseCountMismatch(report: RunReport): PhaseJudgement {
  const names = report.phases.map((p) => p.name);
  return {
    passed: false,
    kind: "PhaseCountMismatch",
    detail: `expected phases ${FAULT_PHASES.join(", ")}; got ${names.length > 0 ? names.join(", ") : "none"}`,
  };
}

export function judgeFaultInjection(
  report: RunReport,
  expectation: FailureExpectation
): PhaseJudgement {
  const byName = new Map<string, PhaseResult>();
  for (const result of report.phases) {
    byName.set(result.name, result);
  }
  if (
    report.phases.length !== FAULT_PHASES.length ||
    byName.size !== FAULT_PHASES.length ||
    !FAULT_PHASES.every((phase) => byName.has(phase))
  ) {
    return phaseCountMismatch(report);
  }

  const machine = new PhaseStateMachine();
  for (let phase = machine.expectedPhase(); phase !== null; phase = machine.expectedPhase()) {
    const result = byName.get(phase);
    if (!result) {
      return phaseCountMismatch(report);
    }
    const failure = judgePhase(phase, result, expectation);
    if (failure) {
      return failure;
    }
    machine.advance(phase);
  }
  return { passed: true, phases: report.phases };
}

// ============================================================================
// Errors
// ============================================================================

export class InvalidTransitionError extends HarnessError {
  readonly state: PhaseState;
  readonly phase: FaultPhase;

  constructor(state: PhaseState, phase: FaultPhase) {
    super(`Invalid phase transition: cannot complete "${phase}" from state "${state}"`);
    this.name = "InvalidTransitionError";
    this.state = state;
    this.phase = phase;
  }
}
