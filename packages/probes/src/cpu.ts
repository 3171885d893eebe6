/**
 * cpu.ts — primary CPU vendor and brand string.
 *
 *   linux  → /proc/cpuinfo (first processor block)
 *   darwin → sysctl machdep.cpu.vendor / machdep.cpu.brand_string
 *   other  → os.cpus() model, no vendor
 */
import { readFileSync } from "node:fs";
import os from "node:os";
import type { CpuProbe, RawCpuInfo } from "@vkplat/core";
import { execRunner, type CommandRunner } from "./exec.js";

export interface CpuProbeOptions {
  readonly platform?: NodeJS.Platform;
  readonly timeoutMs?: number;
  readonly run?: CommandRunner;
  readonly readCpuInfo?: () => string;
  readonly cpuModel?: () => string;
}

export function parseProcCpuInfo(text: string): RawCpuInfo {
  let vendorIdRaw = "";
  let brandRaw = "";
  for (const line of text.split("\n")) {
    const colon = line.indexOf(":");
    if (colon < 0) {
      // blank line ends the first processor block
      if (line.trim() === "" && (vendorIdRaw || brandRaw)) break;
      continue;
    }
    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    if (key === "vendor_id" && !vendorIdRaw) vendorIdRaw = value;
    else if (key === "model name" && !brandRaw) brandRaw = value;
  }
  return { vendorIdRaw, brandRaw };
}

/** Output of `sysctl -n machdep.cpu.vendor machdep.cpu.brand_string`. */
export function parseSysctlCpu(output: string): RawCpuInfo {
  const [vendor = "", brand = ""] = output.split("\n").map((l) => l.trim());
  return { vendorIdRaw: vendor, brandRaw: brand };
}

function firstCpuModel(): string {
  const [first] = os.cpus();
  return first === undefined ? "" : first.model;
}

export function createCpuProbe(options: CpuProbeOptions = {}): CpuProbe {
  const platform = options.platform ?? process.platform;
  const timeoutMs = options.timeoutMs ?? 2000;
  const run = options.run ?? execRunner;
  const readCpuInfo = options.readCpuInfo ?? (() => readFileSync("/proc/cpuinfo", "utf-8"));
  const cpuModel = options.cpuModel ?? firstCpuModel;

  return {
    name: `cpu-${platform}`,
    cpu: () => {
      switch (platform) {
        case "linux":
          return parseProcCpuInfo(readCpuInfo());
        case "darwin":
          return parseSysctlCpu(
            run("sysctl", ["-n", "machdep.cpu.vendor", "machdep.cpu.brand_string"], timeoutMs),
          );
        default:
          return { vendorIdRaw: "", brandRaw: cpuModel().trim() };
      }
    },
  };
}
