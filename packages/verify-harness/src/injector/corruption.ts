/**
 * Corruption Injector
 *
 * Plans the single overwrite that damages a verified data file. The harness
 * picks where to write; the SUT writes unseeded random buffer content there.
 */

import { randomInt } from "node:crypto";
import type { MangleMode } from "../cases/types";
import { InvalidManglePlanError } from "../errors";

/** Returns an integer in [min, max) */
export type RandomSource = (min: number, max: number) => number;

export const cryptoRandom: RandomSource = (min, max) => randomInt(min, max);

export type ManglePlan = {
  mode: MangleMode;
  /** Byte offset of the overwrite */
  offset: number;
  /** Bytes overwritten */
  length: number;
};

export type MangleTarget = {
  fileSize: number;
  /** Record size the file was written with */
  recordSize: number;
};

export function planMangle(
  target: MangleTarget,
  mode: MangleMode,
  random: RandomSource = cryptoRandom
): ManglePlan {
  const { fileSize, recordSize } = target;
  if (!Number.isInteger(recordSize) || recordSize <= 0) {
    throw new InvalidManglePlanError(`record size must be a positive integer, got ${recordSize}`);
  }
  if (!Number.isInteger(fileSize) || fileSize < recordSize) {
    throw new InvalidManglePlanError(
      `file of ${fileSize} bytes cannot hold a ${recordSize} byte record`
    );
  }

  if (mode.kind === "wholeBlock") {
    const records = Math.floor(fileSize / recordSize);
    return { mode, offset: random(0, records) * recordSize, length: recordSize };
  }

  if (!Number.isInteger(mode.bytes) || mode.bytes <= 0) {
    throw new InvalidManglePlanError(`partial mangle size must be positive, got ${mode.bytes}`);
  }
  if (mode.bytes > fileSize) {
    throw new InvalidManglePlanError(
      `partial mangle of ${mode.bytes} bytes exceeds file size ${fileSize}`
    );
  }
  return { mode, offset: random(0, fileSize - mode.bytes + 1), length: mode.bytes };
}

/**
 * Job options for the corrupting write: one buffered I/O of exactly
 * `plan.length` bytes at `plan.offset`, with fresh random buffer content.
 */
export function mangleJobArgs(plan: ManglePlan): string[] {
  return [
    "--rw=write",
    "--ioengine=psync",
    "--direct=0",
    `--offset=${plan.offset}`,
    `--bs=${plan.length}`,
    `--io_size=${plan.length}`,
    "--number_ios=1",
    "--randrepeat=0",
    "--refill_buffers=1",
    "--end_fsync=1",
  ];
}
