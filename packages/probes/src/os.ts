import os from "node:os";
import type { OsProbe } from "@vkplat/core";

/**
 * Map `os.type()` onto the family names the platform model uses.
 * Node reports Windows as "Windows_NT"; everything else passes through
 * unchanged and is matched exactly by the detection policy.
 */
export function normalizeOsType(type: string): string {
  return type === "Windows_NT" ? "Windows" : type;
}

export function createOsProbe(readType: () => string = os.type): OsProbe {
  return {
    name: "node-os",
    operatingSystem: () => normalizeOsType(readType()),
  };
}

export const nodeOsProbe: OsProbe = createOsProbe();
