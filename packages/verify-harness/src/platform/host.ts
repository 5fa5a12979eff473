import { cpus } from "node:os";
import { type HostOs, hostOsFromPlatform } from "./errorTaxonomy";

/** Facts about the machine the harness runs on, consulted by case requirements */
export type HostEnvironment = {
  os: HostOs;
  cpuCount: number;
};

export function detectHostEnvironment(platform: string = process.platform): HostEnvironment {
  return {
    os: hostOsFromPlatform(platform),
    cpuCount: cpus().length,
  };
}
