import {
  consoleHandler,
  createStructuredLogger,
  detectHostEnvironment,
  jsonHandler,
  ProcessSutRunner,
  type RunSummary,
  runVerifyMatrix,
} from "@blkverify/harness";
import { Command } from "commander";
import {
  loadRunConfigFile,
  parseByteCount,
  parseChecksumList,
  parseIdList,
  parseLogFormat,
  parseTimeout,
  type RunFlags,
  resolveRunOptions,
} from "../utils/runOptions";
import { writeStderr, writeStdout } from "../utils/terminal";

/** Highest status a process can report */
const MAX_EXIT_CODE = 255;

export function runCommand(): Command {
  return new Command("run")
    .description("Run the verification matrix against the workload generator")
    .option("--sut <path>", "Workload generator binary (default: fio)")
    .option("-a, --artifact-root <dir>", "Directory for per-case artifacts")
    .option("-s, --skip <ids...>", "Test ids to skip", parseIdList)
    .option("-o, --run-only <ids...>", "Only run these test ids", parseIdList)
    .option("--complete", "Run every checksum algorithm")
    .option("--csum <names...>", "Checksum algorithms to run", parseChecksumList)
    .option("--skip-req", "Run cases even when the host misses their requirements")
    .option("--mangle-bytes <n>", "Bytes overwritten by partial corruption", parseByteCount)
    .option("--timeout <ms>", "Wall-clock limit of one invocation", parseTimeout)
    .option("--config <file>", "JSON config file")
    .option("--log-format <format>", "Log format: text, json", parseLogFormat)
    .option("-d, --debug", "Enable debug logging")
    .action(async (options: RunFlags) => {
      const summary = await runMatrixCommand(options);
      process.exitCode = exitCodeFor(summary);
    });
}

/** Number of failed cases, saturated at the largest exit status */
export function exitCodeFor(summary: RunSummary): number {
  return Math.min(summary.totals.failed, MAX_EXIT_CODE);
}

async function runMatrixCommand(options: RunFlags): Promise<RunSummary> {
  const fileConfig = options.config ? await loadRunConfigFile(options.config) : {};
  const resolved = resolveRunOptions(options, fileConfig);
  const logger = createStructuredLogger({
    level: resolved.debug ? "debug" : "info",
    handler: resolved.logFormat === "json" ? jsonHandler : consoleHandler,
  });
  const host = detectHostEnvironment();
  logger.debug("Resolved run options", {
    sut: resolved.sut,
    os: host.os,
    cpus: host.cpuCount,
    timeoutMs: resolved.matrix.timeoutMs,
  });

  const controller = new AbortController();
  const onInterrupt = () => {
    writeStderr("Interrupted; stopping after the current case");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    return await runVerifyMatrix(
      {
        runner: new ProcessSutRunner(resolved.sut, logger),
        host,
        logger,
        signal: controller.signal,
        writeLine: writeStdout,
      },
      resolved.matrix
    );
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
