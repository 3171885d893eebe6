/**
 * Human-readable summary of a detected platform, one string per line.
 */
import { Effect } from "effect";
import type { HardwareInformation, NoHardwareDetected } from "@vkplat/core";
import { noHardwareDetected, type ExecutionPlatform } from "./platform.js";

function formatGpu(gpu: HardwareInformation): string {
  return `${gpu.hardwareModel} (driver ${gpu.driverVersion})`;
}

export function formatSummary(platform: ExecutionPlatform): Effect.Effect<string[], NoHardwareDetected> {
  if (platform.cpus.length === 0) return Effect.fail(noHardwareDetected());
  const [cpu] = platform.cpus;
  const gpus = platform.gpus;

  const lines = [
    `Detected OS     -> ${platform.operatingSystem}`,
    `Detected GPUs   -> ${gpus.length > 0 ? gpus.map(formatGpu).join(", ") : "none"}`,
    `Detected CPU    -> ${cpu.hardwareModel}`,
    `Vulkan backend  -> ${platform.vulkanBackend}`,
  ];
  if (gpus.length > 0) {
    lines.push(`Shaders will most likely be executed on ${gpus[0].hardwareModel}`);
  } else {
    lines.push("No GPU detected, shaders will be executed on CPU");
  }
  return Effect.succeed(lines);
}
