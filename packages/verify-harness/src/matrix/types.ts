/**
 * Matrix Orchestrator Types
 */

import { DIRECTION_TEMPLATES, FAULT_INJECTION_TEMPLATES } from "../cases/templates";
import {
  type CaseKind,
  type CaseTemplate,
  type ChecksumAlgorithm,
  type DataDirection,
  DEFAULT_CHECKSUMS,
  DEFAULT_PARTIAL_MANGLE_BYTES,
  type MangleMode,
} from "../cases/types";
import type { FaultInjectionFailureKind } from "../phases/stateMachine";
import { DEFAULT_SUT_TIMEOUT_MS } from "../runner/types";

export type CaseFailureKind =
  | FaultInjectionFailureKind
  | "SubprocessTimeout"
  | "ResultParseFailure"
  | "MissingFixture"
  | "ExitCodeMismatch"
  | "JobErrorReported"
  | "LaunchFailure";

export type SkipReason = "UserRequest" | "EnvironmentUnmet";

type OutcomeBase = {
  testId: number;
  kind: CaseKind;
  direction: DataDirection;
  checksum: ChecksumAlgorithm;
  /** Mangle label for fault-injection cases */
  mangle?: string;
  artifactDirectory: string;
  durationMs: number;
};

export type CaseOutcome = OutcomeBase &
  (
    | { status: "passed" }
    | { status: "failed"; failure: CaseFailureKind; detail: string }
    | { status: "skipped"; reason: SkipReason; detail: string }
  );

export type RunTotals = {
  passed: number;
  failed: number;
  skipped: number;
};

export type RunSummary = {
  artifactRoot: string;
  totals: RunTotals;
  /** True when an operator interrupt cut the run short */
  interrupted: boolean;
  durationMs: number;
  outcomes: CaseOutcome[];
};

export type MatrixConfig = {
  artifactRoot: string;
  checksums: readonly ChecksumAlgorithm[];
  mangleModes: readonly MangleMode[];
  /** Case ids never run */
  skip: readonly number[];
  /** When non-empty, only these case ids run */
  runOnly: readonly number[];
  /** Run cases even when the host misses their requirements */
  skipRequirements: boolean;
  timeoutMs: number;
  directionTemplates: readonly CaseTemplate[];
  faultInjectionTemplates: readonly CaseTemplate[];
};

export const DEFAULT_MANGLE_MODES: readonly MangleMode[] = [
  { kind: "wholeBlock" },
  { kind: "partial", bytes: DEFAULT_PARTIAL_MANGLE_BYTES },
];

export const DEFAULT_MATRIX_CONFIG: Omit<MatrixConfig, "artifactRoot"> = {
  checksums: DEFAULT_CHECKSUMS,
  mangleModes: DEFAULT_MANGLE_MODES,
  skip: [],
  runOnly: [],
  skipRequirements: false,
  timeoutMs: DEFAULT_SUT_TIMEOUT_MS,
  directionTemplates: DIRECTION_TEMPLATES,
  faultInjectionTemplates: FAULT_INJECTION_TEMPLATES,
};
