import { readFile } from "node:fs/promises";
import {
  CHECKSUM_ALGORITHMS,
  type ChecksumAlgorithm,
  ConfigError,
  DEFAULT_CHECKSUMS,
  DEFAULT_PARTIAL_MANGLE_BYTES,
  DEFAULT_SUT_TIMEOUT_MS,
  isChecksumAlgorithm,
  type MangleMode,
  type MatrixConfig,
} from "@blkverify/harness";
import { InvalidArgumentError } from "commander";
import { z } from "zod";

export const SUT_ENV = "BLKVERIFY_SUT";
export const TIMEOUT_ENV = "BLKVERIFY_TIMEOUT_MS";
export const ARTIFACT_ROOT_ENV = "BLKVERIFY_ARTIFACT_ROOT";

export const DEFAULT_SUT = "fio";

export type LogFormat = "text" | "json";

/** Options as commander hands them to the run action */
export type RunFlags = {
  sut?: string;
  artifactRoot?: string;
  skip?: number[];
  runOnly?: number[];
  complete?: boolean;
  csum?: string[];
  skipReq?: boolean;
  mangleBytes?: number;
  timeout?: number;
  config?: string;
  logFormat?: LogFormat;
  debug?: boolean;
};

const positiveInt = z.number().int().positive();

export const RunConfigFileSchema = z
  .object({
    sut: z.string().min(1).optional(),
    artifactRoot: z.string().min(1).optional(),
    timeoutMs: positiveInt.optional(),
    checksums: z.array(z.enum(CHECKSUM_ALGORITHMS)).min(1).optional(),
    complete: z.boolean().optional(),
    mangleBytes: positiveInt.optional(),
    skip: z.array(positiveInt).optional(),
    runOnly: z.array(positiveInt).optional(),
    skipRequirements: z.boolean().optional(),
    logFormat: z.enum(["text", "json"]).optional(),
    debug: z.boolean().optional(),
  })
  .strict();

export type RunConfigFile = z.infer<typeof RunConfigFileSchema>;

export type ResolvedRunOptions = {
  sut: string;
  logFormat: LogFormat;
  debug: boolean;
  matrix: Partial<MatrixConfig> & Pick<MatrixConfig, "artifactRoot">;
};

// ============================================================================
// Commander argument parsers
// ============================================================================

function parsePositiveInt(value: string, what: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) <= 0) {
    throw new InvalidArgumentError(`${what} must be a positive integer, got "${value}"`);
  }
  return Number(trimmed);
}

/** Accepts `-s 3 4`, `-s 3,4` and repeated flags alike */
export function parseIdList(value: string, previous: number[] = []): number[] {
  const ids = value
    .split(",")
    .filter((part) => part.trim() !== "")
    .map((part) => parsePositiveInt(part, "test id"));
  return [...previous, ...ids];
}

export function parseChecksumList(value: string, previous: string[] = []): string[] {
  const names = value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "");
  for (const name of names) {
    if (!isChecksumAlgorithm(name)) {
      throw new InvalidArgumentError(
        `unknown checksum "${name}" (expected one of ${CHECKSUM_ALGORITHMS.join(", ")})`
      );
    }
  }
  return [...previous, ...names];
}

export function parseByteCount(value: string): number {
  return parsePositiveInt(value, "byte count");
}

export function parseTimeout(value: string): number {
  return parsePositiveInt(value, "timeout");
}

export function parseLogFormat(value: string): LogFormat {
  if (value === "text" || value === "json") {
    return value;
  }
  throw new InvalidArgumentError(`log format must be text or json, got "${value}"`);
}

// ============================================================================
// Config file
// ============================================================================

export async function loadRunConfigFile(filePath: string): Promise<RunConfigFile> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: error });
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
  }

  const parsed = RunConfigFileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid config file ${filePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

// ============================================================================
// Resolution
// ============================================================================

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** `verify-test-YYYYMMDD-HHMMSS` in local time */
export function defaultArtifactRoot(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `verify-test-${date}-${time}`;
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envTimeout(env: NodeJS.ProcessEnv): number | undefined {
  const raw = envValue(env, TIMEOUT_ENV);
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(`${TIMEOUT_ENV} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

function resolveChecksums(flags: RunFlags, file: RunConfigFile): readonly ChecksumAlgorithm[] {
  if (flags.csum && flags.csum.length > 0) {
    const selected: ChecksumAlgorithm[] = [];
    for (const name of flags.csum) {
      if (!isChecksumAlgorithm(name)) {
        throw new ConfigError(`Unknown checksum "${name}"`);
      }
      if (!selected.includes(name)) {
        selected.push(name);
      }
    }
    return selected;
  }
  if (flags.complete ?? file.complete) {
    return CHECKSUM_ALGORITHMS;
  }
  return file.checksums ?? DEFAULT_CHECKSUMS;
}

/**
 * Merge flag, environment, config file and defaults, in that order of
 * precedence.
 */
export function resolveRunOptions(
  flags: RunFlags,
  file: RunConfigFile = {},
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): ResolvedRunOptions {
  const mangleBytes = flags.mangleBytes ?? file.mangleBytes ?? DEFAULT_PARTIAL_MANGLE_BYTES;
  const mangleModes: MangleMode[] = [
    { kind: "wholeBlock" },
    { kind: "partial", bytes: mangleBytes },
  ];

  return {
    sut: flags.sut ?? envValue(env, SUT_ENV) ?? file.sut ?? DEFAULT_SUT,
    logFormat: flags.logFormat ?? file.logFormat ?? "text",
    debug: flags.debug ?? file.debug ?? false,
    matrix: {
      artifactRoot:
        flags.artifactRoot ??
        envValue(env, ARTIFACT_ROOT_ENV) ??
        file.artifactRoot ??
        defaultArtifactRoot(now),
      checksums: resolveChecksums(flags, file),
      mangleModes,
      skip: flags.skip ?? file.skip ?? [],
      runOnly: flags.runOnly ?? file.runOnly ?? [],
      skipRequirements: flags.skipReq ?? file.skipRequirements ?? false,
      timeoutMs: flags.timeout ?? envTimeout(env) ?? file.timeoutMs ?? DEFAULT_SUT_TIMEOUT_MS,
    },
  };
}
