import { describe, expect, it } from "vitest";
import { InvalidManglePlanError } from "../errors";
import { mangleJobArgs, planMangle, type RandomSource } from "../injector/corruption";

/** Always picks the largest value in range */
const highest: RandomSource = (_min, max) => max - 1;
const lowest: RandomSource = (min) => min;

describe("planMangle", () => {
  it("aligns whole-block corruption to a record boundary", () => {
    const plan = planMangle({ fileSize: 1024 * 1024, recordSize: 4096 }, { kind: "wholeBlock" }, highest);
    expect(plan).toEqual({
      mode: { kind: "wholeBlock" },
      offset: 255 * 4096,
      length: 4096,
    });
  });

  it("passes the record count as the exclusive bound", () => {
    const calls: Array<[number, number]> = [];
    const recording: RandomSource = (min, max) => {
      calls.push([min, max]);
      return min;
    };
    planMangle({ fileSize: 256 * 1024, recordSize: 512 }, { kind: "wholeBlock" }, recording);
    expect(calls).toEqual([[0, 512]]);
  });

  it("keeps a partial overwrite inside the file", () => {
    const plan = planMangle(
      { fileSize: 256 * 1024, recordSize: 512 },
      { kind: "partial", bytes: 4 },
      highest
    );
    expect(plan.offset).toBe(256 * 1024 - 4);
    expect(plan.length).toBe(4);
  });

  it("lets a partial overwrite start at offset zero", () => {
    const plan = planMangle(
      { fileSize: 4096, recordSize: 512 },
      { kind: "partial", bytes: 4 },
      lowest
    );
    expect(plan.offset).toBe(0);
  });

  it("rejects a partial overwrite larger than the file", () => {
    expect(() =>
      planMangle({ fileSize: 4096, recordSize: 512 }, { kind: "partial", bytes: 8192 }, lowest)
    ).toThrow(InvalidManglePlanError);
  });

  it("rejects a non-positive partial size", () => {
    expect(() =>
      planMangle({ fileSize: 4096, recordSize: 512 }, { kind: "partial", bytes: 0 }, lowest)
    ).toThrow("partial mangle size must be positive, got 0");
  });

  it("rejects a file smaller than one record", () => {
    expect(() =>
      planMangle({ fileSize: 256, recordSize: 512 }, { kind: "wholeBlock" }, lowest)
    ).toThrow("file of 256 bytes cannot hold a 512 byte record");
  });

  it("rejects a zero record size", () => {
    expect(() => planMangle({ fileSize: 4096, recordSize: 0 }, { kind: "wholeBlock" }, lowest)).toThrow(
      InvalidManglePlanError
    );
  });
});

describe("mangleJobArgs", () => {
  it("issues exactly one buffered write of the planned length", () => {
    const args = mangleJobArgs({ mode: { kind: "partial", bytes: 4 }, offset: 1000, length: 4 });
    expect(args).toEqual([
      "--rw=write",
      "--ioengine=psync",
      "--direct=0",
      "--offset=1000",
      "--bs=4",
      "--io_size=4",
      "--number_ios=1",
      "--randrepeat=0",
      "--refill_buffers=1",
      "--end_fsync=1",
    ]);
  });
});
