/**
 * Platform Error Taxonomy
 *
 * Maps a host OS to the numeric code the SUT reports when verification
 * detects corrupted data (EILSEQ, "illegal byte sequence").
 */

import { UnsupportedPlatformError } from "../errors";

export type HostOs = "linux" | "darwin" | "windows";

const ILLEGAL_BYTE_SEQUENCE_CODES: Readonly<Record<HostOs, number>> = Object.freeze({
  linux: 84,
  darwin: 92,
  windows: 42,
});

/** Asynchronous I/O engine native to each host */
const ASYNC_IO_ENGINES: Readonly<Record<HostOs, string>> = Object.freeze({
  linux: "libaio",
  darwin: "posixaio",
  windows: "windowsaio",
});

export function illegalByteSequenceCode(os: HostOs): number {
  return ILLEGAL_BYTE_SEQUENCE_CODES[os];
}

export function asyncIoEngine(os: HostOs): string {
  return ASYNC_IO_ENGINES[os];
}

export function hostOsFromPlatform(platform: string): HostOs {
  switch (platform) {
    case "linux":
      return "linux";
    case "darwin":
      return "darwin";
    case "win32":
    case "windows":
      return "windows";
    default:
      throw new UnsupportedPlatformError(platform);
  }
}
