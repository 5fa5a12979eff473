/**
 * Case Templates
 *
 * Direction templates run once per (direction, checksum) pair; fault-injection
 * templates once per (mangle mode, checksum) pair.
 */

import { cpuAffinity, cpuCount } from "./requirements";
import type { CaseTemplate, DataDirection, IoParameters } from "./types";

const KiB = 1024;
const MiB = 1024 * KiB;

const BASIC_IO: IoParameters = {
  blockSize: 512,
  fileSize: 2 * MiB,
  ioDepth: 32,
  direct: true,
};

export const DIRECTION_TEMPLATES: readonly CaseTemplate[] = [
  {
    id: 1,
    kind: "direction",
    description: "basic",
    io: BASIC_IO,
    success: "exactZero",
    requirements: [],
  },
  {
    id: 2,
    kind: "direction",
    description: "norandommap",
    io: { ...BASIC_IO, norandommap: true },
    success: "exactZero",
    requirements: [],
  },
  {
    id: 3,
    kind: "direction",
    description: "verify_interval smaller than block size",
    io: { ...BASIC_IO, blockSize: 4 * KiB, verifyInterval: 512 },
    success: "exactZero",
    requirements: [],
  },
  {
    id: 4,
    kind: "direction",
    description: "verify_backlog",
    io: { ...BASIC_IO, verifyBacklog: 64, verifyBacklogBatch: 32 },
    success: "exactZero",
    requirements: [],
  },
  {
    id: 5,
    kind: "direction",
    description: "verify_async with pinned verifier threads",
    io: { ...BASIC_IO, verifyAsync: 2, verifyAsyncCpus: "0-1" },
    success: "exactZero",
    requirements: [cpuCount(2), cpuAffinity],
  },
];

export const FAULT_INJECTION_TEMPLATES: readonly CaseTemplate[] = [
  {
    id: 101,
    kind: "faultInjection",
    description: "4 KiB records",
    io: { blockSize: 4 * KiB, fileSize: 1 * MiB, ioDepth: 16, direct: true },
    success: "nonzeroAllowed",
    requirements: [],
  },
  {
    id: 102,
    kind: "faultInjection",
    description: "512 byte records",
    io: { blockSize: 512, fileSize: 256 * KiB, ioDepth: 16, direct: true },
    success: "nonzeroAllowed",
    requirements: [],
  },
];

/**
 * Every write-class direction precedes its read-class counterpart:
 * read cases consume the files the matching write cases leave behind.
 */
export const DIRECTION_ORDER: readonly DataDirection[] = [
  "write",
  "readwrite",
  "read",
  "randwrite",
  "randrw",
  "randread",
];
