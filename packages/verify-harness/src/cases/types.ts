/**
 * Test Case Types
 *
 * A TestCase is one frozen matrix coordinate: a template plus the direction,
 * checksum and (for fault injection) mangle mode it runs under.
 */

import type { HostEnvironment } from "../platform/host";

export const DATA_DIRECTIONS = [
  "write",
  "randwrite",
  "read",
  "randread",
  "readwrite",
  "randrw",
] as const;

export type DataDirection = (typeof DATA_DIRECTIONS)[number];

/** Directions that only read data laid down by an earlier write-class case */
export type ReadDirection = "read" | "randread";

/** Directions whose artifacts can serve as fixtures */
export type WriteDirection = "write" | "randwrite";

export const FIXTURE_PRODUCERS: Readonly<Record<ReadDirection, WriteDirection>> = {
  read: "write",
  randread: "randwrite",
};

export function isReadDirection(direction: DataDirection): direction is ReadDirection {
  return direction === "read" || direction === "randread";
}

export function isWriteDirection(direction: DataDirection): direction is WriteDirection {
  return direction === "write" || direction === "randwrite";
}

export const CHECKSUM_ALGORITHMS = [
  "md5",
  "crc64",
  "crc32c",
  "crc32c-intel",
  "crc16",
  "crc7",
  "xxhash",
  "sha512",
  "sha256",
  "sha1",
  "sha3-224",
  "sha3-384",
  "sha3-512",
  "null",
] as const;

export type ChecksumAlgorithm = (typeof CHECKSUM_ALGORITHMS)[number];

/** Checksums exercised unless a complete run is requested */
export const DEFAULT_CHECKSUMS: readonly ChecksumAlgorithm[] = ["md5", "crc64", "crc32c", "null"];

export function isChecksumAlgorithm(value: string): value is ChecksumAlgorithm {
  return CHECKSUM_ALGORITHMS.some((name) => name === value);
}

export const DEFAULT_PARTIAL_MANGLE_BYTES = 4;

export type MangleMode = { kind: "wholeBlock" } | { kind: "partial"; bytes: number };

export function mangleLabel(mode: MangleMode): string {
  return mode.kind === "wholeBlock" ? "block" : `partial${mode.bytes}`;
}

/** Whether the SUT must exit 0, or may exit with any status */
export type SuccessCriterion = "exactZero" | "nonzeroAllowed";

export type Requirement = {
  /** Shown as the skip reason when unmet */
  name: string;
  check(host: HostEnvironment): boolean;
};

export type IoParameters = {
  blockSize: number;
  fileSize: number;
  ioDepth: number;
  direct: boolean;
  norandommap?: boolean;
  verifyInterval?: number;
  verifyBacklog?: number;
  verifyBacklogBatch?: number;
  verifyAsync?: number;
  verifyAsyncCpus?: string;
};

export type CaseKind = "direction" | "faultInjection";

/** Coordinate-free description of a case */
export type CaseTemplate = {
  id: number;
  kind: CaseKind;
  description: string;
  io: IoParameters;
  success: SuccessCriterion;
  requirements: readonly Requirement[];
};

export type TestCase = Readonly<{
  id: number;
  kind: CaseKind;
  description: string;
  direction: DataDirection;
  checksum: ChecksumAlgorithm;
  mangle?: MangleMode;
  io: Readonly<IoParameters>;
  ioEngine: string;
  success: SuccessCriterion;
  requirements: readonly Requirement[];
  /** Dedicated working directory of this case */
  artifactDirectory: string;
  /** Directory holding the write-class fixture a read-class case consumes */
  fixtureDirectory?: string;
}>;

export type CaseCoordinate = {
  direction: DataDirection;
  checksum: ChecksumAlgorithm;
  mangle?: MangleMode;
};

export function deriveTestCase(
  template: CaseTemplate,
  coordinate: CaseCoordinate,
  placement: { artifactDirectory: string; fixtureDirectory?: string; ioEngine: string }
): TestCase {
  return Object.freeze({
    id: template.id,
    kind: template.kind,
    description: template.description,
    direction: coordinate.direction,
    checksum: coordinate.checksum,
    mangle: coordinate.mangle ? Object.freeze({ ...coordinate.mangle }) : undefined,
    io: Object.freeze({ ...template.io }),
    ioEngine: placement.ioEngine,
    success: template.success,
    requirements: [...template.requirements],
    artifactDirectory: placement.artifactDirectory,
    fixtureDirectory: placement.fixtureDirectory,
  });
}
