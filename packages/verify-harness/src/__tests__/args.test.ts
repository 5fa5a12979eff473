import { describe, expect, it } from "vitest";
import { buildDirectionArgs, ioOptionArgs } from "../cases/args";
import { DIRECTION_ORDER, DIRECTION_TEMPLATES, FAULT_INJECTION_TEMPLATES } from "../cases/templates";
import { type CaseTemplate, deriveTestCase } from "../cases/types";
import { buildFaultInjectionArgs } from "../phases/stanzas";

function template(templates: readonly CaseTemplate[], id: number): CaseTemplate {
  const found = templates.find((t) => t.id === id);
  if (!found) {
    throw new Error(`no template ${id}`);
  }
  return found;
}

describe("case templates", () => {
  it("numbers direction and fault-injection templates apart", () => {
    expect(DIRECTION_TEMPLATES.map((t) => t.id)).toEqual([1, 2, 3, 4, 5]);
    expect(FAULT_INJECTION_TEMPLATES.map((t) => t.id)).toEqual([101, 102]);
  });

  it("orders directions so writes precede their reads", () => {
    expect(DIRECTION_ORDER.indexOf("write")).toBeLessThan(DIRECTION_ORDER.indexOf("read"));
    expect(DIRECTION_ORDER.indexOf("randwrite")).toBeLessThan(DIRECTION_ORDER.indexOf("randread"));
  });

  it("lets fault-injection cases exit nonzero", () => {
    expect(FAULT_INJECTION_TEMPLATES.every((t) => t.success === "nonzeroAllowed")).toBe(true);
    expect(DIRECTION_TEMPLATES.every((t) => t.success === "exactZero")).toBe(true);
  });
});

describe("deriveTestCase", () => {
  it("freezes the derived case", () => {
    const testCase = deriveTestCase(
      template(DIRECTION_TEMPLATES, 1),
      { direction: "write", checksum: "md5" },
      { artifactDirectory: "/runs/ddir_write_csum_md5/0001", ioEngine: "libaio" }
    );
    expect(Object.isFrozen(testCase)).toBe(true);
    expect(Object.isFrozen(testCase.io)).toBe(true);
  });
});

describe("buildDirectionArgs", () => {
  it("builds a basic write case", () => {
    const testCase = deriveTestCase(
      template(DIRECTION_TEMPLATES, 1),
      { direction: "write", checksum: "md5" },
      { artifactDirectory: "/runs/ddir_write_csum_md5/0001", ioEngine: "libaio" }
    );
    expect(buildDirectionArgs(testCase, "verify.json")).toEqual([
      "--output-format=json",
      "--output=verify.json",
      "--name=verify",
      "--ioengine=libaio",
      "--rw=write",
      "--verify=md5",
      "--direct=1",
      "--iodepth=32",
      "--filesize=2097152",
      "--bs=512",
    ]);
  });

  it("points a read case at its fixture", () => {
    const testCase = deriveTestCase(
      template(DIRECTION_TEMPLATES, 2),
      { direction: "read", checksum: "crc64" },
      {
        artifactDirectory: "/runs/ddir_read_csum_crc64/0002",
        fixtureDirectory: "/runs/ddir_write_csum_crc64/0002",
        ioEngine: "posixaio",
      }
    );
    const args = buildDirectionArgs(testCase, "verify.json");
    expect(args).toContain("--norandommap=1");
    expect(args[args.length - 1]).toBe("--directory=/runs/ddir_write_csum_crc64/0002");
  });

  it("emits the async verify tunables", () => {
    expect(ioOptionArgs(template(DIRECTION_TEMPLATES, 5).io)).toEqual([
      "--direct=1",
      "--iodepth=32",
      "--filesize=2097152",
      "--bs=512",
      "--verify_async=2",
      "--verify_async_cpus=0-1",
    ]);
  });
});

describe("buildFaultInjectionArgs", () => {
  it("lays out four stonewalled stanzas around one data file", () => {
    const testCase = deriveTestCase(
      template(FAULT_INJECTION_TEMPLATES, 102),
      { direction: "randwrite", checksum: "crc32c", mangle: { kind: "partial", bytes: 4 } },
      { artifactDirectory: "/runs/mangle_partial4_csum_crc32c/0102", ioEngine: "libaio" }
    );
    const args = buildFaultInjectionArgs(
      testCase,
      { mode: { kind: "partial", bytes: 4 }, offset: 2048, length: 4 },
      "faultinject.json"
    );

    expect(args.filter((arg) => arg.startsWith("--name="))).toEqual([
      "--name=layout",
      "--name=success",
      "--name=mangle",
      "--name=failure",
    ]);
    expect(args.filter((arg) => arg === "--stonewall")).toHaveLength(3);
    expect(args.slice(0, 4)).toEqual([
      "--output-format=json",
      "--output=faultinject.json",
      "--filename=verify.bin",
      "--filesize=262144",
    ]);

    const layout = args.slice(args.indexOf("--name=layout"), args.indexOf("--name=success"));
    expect(layout).toEqual([
      "--name=layout",
      "--rw=randwrite",
      "--ioengine=libaio",
      "--verify=crc32c",
      "--do_verify=0",
      "--direct=1",
      "--iodepth=16",
      "--filesize=262144",
      "--bs=512",
    ]);

    const mangle = args.slice(args.indexOf("--name=mangle"), args.indexOf("--name=failure"));
    expect(mangle).toContain("--offset=2048");
    expect(mangle).toContain("--bs=4");
  });
});
