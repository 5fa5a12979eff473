import type { HostEnvironment } from "../platform/host";
import type { Requirement } from "./types";

export function cpuCount(minimum: number): Requirement {
  return {
    name: `${minimum} or more CPUs required`,
    check: (host) => host.cpuCount >= minimum,
  };
}

/** macOS offers no way to pin threads to CPUs */
export const cpuAffinity: Requirement = {
  name: "CPU affinity not supported",
  check: (host) => host.os !== "darwin",
};

/**
 * Returns the first requirement the host fails, or null when all hold.
 */
export function firstUnmetRequirement(
  requirements: readonly Requirement[],
  host: HostEnvironment
): Requirement | null {
  for (const requirement of requirements) {
    if (!requirement.check(host)) {
      return requirement;
    }
  }
  return null;
}
