import { type ChildProcess, spawn } from "node:child_process";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { createNoopLogger, type IStructuredLogger } from "../telemetry/structuredLogger";
import type { SutInvocation, SutRunner, SutRunResult } from "./types";

type ExecResult = Omit<SutRunResult, "durationMs">;

/**
 * A SUT given as a path is pinned to the harness's working directory, since
 * every invocation runs inside its own case directory. Bare names are left
 * to the PATH lookup.
 */
export function resolveSutPath(sut: string, cwd: string = process.cwd()): string {
  if (sut.includes("/") || sut.includes(path.sep)) {
    return path.resolve(cwd, sut);
  }
  return sut;
}

/**
 * Runs the SUT binary as a child process, one invocation at a time.
 *
 * Each invocation gets its own process group: a terminal interrupt reaches
 * only the harness, and a timeout kills the whole group with SIGKILL.
 * Submitters that left the group may outlive it; the harness stops waiting
 * for them once the SUT itself has exited.
 */
export class ProcessSutRunner implements SutRunner {
  private readonly sutPath: string;
  private readonly logger: IStructuredLogger;

  constructor(sutPath: string, logger: IStructuredLogger = createNoopLogger()) {
    this.sutPath = resolveSutPath(sutPath);
    this.logger = logger;
  }

  async run(invocation: SutInvocation): Promise<SutRunResult> {
    const base = path.join(invocation.cwd, invocation.basename);
    const command = [this.sutPath, ...invocation.args];
    await writeFile(`${base}.command`, `${command.join(" ")}\n`, "utf8");
    this.logger.debug("Invoking SUT", { cwd: invocation.cwd, command });

    const start = Date.now();
    const result = await execWithTimeout(
      this.sutPath,
      invocation.args,
      invocation.cwd,
      invocation.timeoutMs,
      (error) =>
        this.logger.warn("Process group kill failed; killing the SUT alone", {
          error: error instanceof Error ? error.message : String(error),
        })
    );
    const durationMs = Date.now() - start;

    await writeFile(`${base}.stdout`, result.stdout, "utf8");
    await writeFile(`${base}.stderr`, result.stderr, "utf8");
    await writeFile(
      `${base}.exitcode`,
      `${result.exitCode ?? result.signal ?? "none"}\n`,
      "utf8"
    );

    if (result.timedOut) {
      this.logger.warn("SUT killed after timeout", { timeoutMs: invocation.timeoutMs });
    }
    return { ...result, durationMs };
  }
}

type KillFailureHandler = (error: unknown) => void;

function killProcessGroup(child: ChildProcess, onKillFailure: KillFailureHandler): void {
  if (child.pid !== undefined && process.platform !== "win32") {
    try {
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch (error) {
      onKillFailure(error);
    }
  }
  child.kill("SIGKILL");
}

function execWithTimeout(
  command: string,
  args: readonly string[],
  cwd: string,
  timeoutMs: number,
  onKillFailure: KillFailureHandler
): Promise<ExecResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
      detached: process.platform !== "win32",
    });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let exited: { code: number | null; signal: NodeJS.Signals | null } | null = null;

    const finish = (result: ExecResult) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeout);
      resolve(result);
    };

    // Orphans holding the pipes would delay "close" indefinitely.
    const abandonPipes = (code: number | null, signal: NodeJS.Signals | null) => {
      child.stdout?.destroy();
      child.stderr?.destroy();
      finish({ exitCode: code, signal, timedOut, stdout, stderr });
    };

    const timeout = setTimeout(() => {
      timedOut = true;
      killProcessGroup(child, onKillFailure);
      if (exited) {
        abandonPipes(exited.code, exited.signal);
      }
    }, timeoutMs);

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      finish({
        exitCode: null,
        signal: null,
        timedOut,
        stdout,
        stderr,
        launchError: error.message,
      });
    });

    child.on("exit", (code, signal) => {
      exited = { code, signal };
      if (timedOut) {
        abandonPipes(code, signal);
      }
    });

    child.on("close", (code, signal) => {
      finish({ exitCode: code, signal, timedOut, stdout, stderr });
    });
  });
}
