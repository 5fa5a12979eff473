/**
 * SUT Runner Types
 *
 * The runner is the only component that touches the SUT process. Tests swap
 * in an in-process fake behind the same interface.
 */

export type SutInvocation = {
  args: readonly string[];
  /** Working directory; the case's artifact directory */
  cwd: string;
  /** Base name for the captured .command/.stdout/.stderr/.exitcode files */
  basename: string;
  timeoutMs: number;
};

export type SutRunResult = {
  /** null when the process was killed or never started */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** Set when the process could not be started */
  launchError?: string;
};

export interface SutRunner {
  run(invocation: SutInvocation): Promise<SutRunResult>;
}

/** Wall-clock bound of a single invocation */
export const DEFAULT_SUT_TIMEOUT_MS = 600_000;
