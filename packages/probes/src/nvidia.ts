/**
 * nvidia.ts — NVIDIA GPU discovery through `nvidia-smi`.
 *
 * A host without the binary (or without a working driver) simply has no
 * NVIDIA GPUs: the probe returns an empty list and reports the cause to
 * `onUnavailable`.
 */
import type { GpuProbe, RawGpuInfo } from "@vkplat/core";
import { execRunner, type CommandRunner } from "./exec.js";

export const NVIDIA_SMI_ARGS: readonly string[] = [
  "--query-gpu=name,driver_version",
  "--format=csv,noheader,nounits",
];

export interface NvidiaSmiProbeOptions {
  readonly command?: string;
  readonly timeoutMs?: number;
  readonly run?: CommandRunner;
  readonly onUnavailable?: (cause: unknown) => void;
}

/**
 * Parse `name, driver_version` rows. GPU names can contain commas, so each
 * row is split at its last comma.
 */
export function parseNvidiaSmiCsv(output: string): RawGpuInfo[] {
  const gpus: RawGpuInfo[] = [];
  for (const line of output.split("\n")) {
    const row = line.trim();
    if (!row) continue;
    const comma = row.lastIndexOf(",");
    if (comma < 0) {
      gpus.push({ name: row, driverVersion: "N/A" });
    } else {
      gpus.push({
        name: row.slice(0, comma).trim(),
        driverVersion: row.slice(comma + 1).trim(),
      });
    }
  }
  return gpus;
}

export function createNvidiaSmiProbe(options: NvidiaSmiProbeOptions = {}): GpuProbe {
  const command = options.command ?? "nvidia-smi";
  const timeoutMs = options.timeoutMs ?? 2000;
  const run = options.run ?? execRunner;
  return {
    name: "nvidia-smi",
    gpus: () => {
      let output: string;
      try {
        output = run(command, NVIDIA_SMI_ARGS, timeoutMs);
      } catch (cause) {
        options.onUnavailable?.(cause);
        return [];
      }
      return parseNvidiaSmiCsv(output);
    },
  };
}
