/**
 * Detection policy: turns raw probe facts into an ExecutionPlatform.
 *
 * Steps run in a fixed order (OS, GPUs, CPU) and the first failure aborts
 * the whole pass. There is no partially detected platform.
 */
import { Effect } from "effect";
import {
  HardwareType, HardwareVendor, NO_DRIVER, OperatingSystem, VulkanBackend,
  OsProbeService, GpuProbeService, CpuProbeService, ProbeError,
  type OsProbe, type GpuProbe, type CpuProbe, type DetectionError,
} from "@vkplat/core";
import { makeHardwareInformation, parseCpuVendor, parseOperatingSystem } from "./hardware.js";
import { ExecutionPlatform } from "./platform.js";

export interface DetectOptions {
  /** Replaces the backend inferred from the operating system. */
  readonly vulkanBackend?: VulkanBackend;
}

/**
 * Backend implied by the operating system.
 *
 * Starts at `Vulkan` and only changes on a matching case. Windows has no
 * case and keeps the default.
 */
export function inferVulkanBackend(os: OperatingSystem): VulkanBackend {
  let backend: VulkanBackend = VulkanBackend.Vulkan;
  // TODO: pick SwiftShader (or lavapipe/llvmpipe) when no hardware ICD is installed.
  if (os === OperatingSystem.Darwin) {
    backend = VulkanBackend.MoltenVK;
  } else if (os === OperatingSystem.Linux) {
    backend = VulkanBackend.Vulkan;
  }
  return backend;
}

function readProbe<A>(probe: string, read: () => A): Effect.Effect<A, ProbeError> {
  return Effect.try({
    try: read,
    catch: (cause) => new ProbeError({
      message: `Probe "${probe}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      probe,
      cause,
    }),
  });
}

export function autoDetect(
  osProbe: OsProbe,
  gpuProbe: GpuProbe,
  cpuProbe: CpuProbe,
  options: DetectOptions = {},
): Effect.Effect<ExecutionPlatform, DetectionError> {
  return Effect.gen(function* () {
    const rawOs = yield* readProbe(osProbe.name, () => osProbe.operatingSystem());
    const operatingSystem = yield* parseOperatingSystem(rawOs);
    yield* Effect.logDebug(`${osProbe.name}: operating system ${operatingSystem}`);

    // Only discrete NVIDIA GPUs are modelled.
    const rawGpus = yield* readProbe(gpuProbe.name, () => gpuProbe.gpus());
    const gpus = rawGpus.map((gpu) => makeHardwareInformation({
      hardwareType: HardwareType.GPU,
      hardwareVendor: HardwareVendor.Nvidia,
      hardwareModel: gpu.name,
      driverVersion: gpu.driverVersion,
    }));
    yield* Effect.logDebug(`${gpuProbe.name}: ${gpus.length} GPU(s)`);

    const rawCpu = yield* readProbe(cpuProbe.name, () => cpuProbe.cpu());
    const cpuVendor = yield* parseCpuVendor(rawCpu.vendorIdRaw);
    const cpu = makeHardwareInformation({
      hardwareType: HardwareType.CPU,
      hardwareVendor: cpuVendor,
      hardwareModel: rawCpu.brandRaw,
      driverVersion: NO_DRIVER,
    });
    yield* Effect.logDebug(`${cpuProbe.name}: ${cpu.hardwareVendor} ${cpu.hardwareModel}`);

    const platform = new ExecutionPlatform({
      vulkanBackend: options.vulkanBackend ?? inferVulkanBackend(operatingSystem),
      operatingSystem,
      availableHardware: {
        [HardwareType.GPU]: gpus,
        [HardwareType.CPU]: [cpu],
      },
    });
    yield* Effect.logInfo(`Detected platform ${platform.toString()}`);
    return platform;
  }).pipe(Effect.withSpan("platform.autoDetect"));
}

/** `autoDetect` with the probes taken from the Effect context. */
export function detectPlatform(
  options: DetectOptions = {},
): Effect.Effect<ExecutionPlatform, DetectionError, OsProbeService | GpuProbeService | CpuProbeService> {
  return Effect.gen(function* () {
    const osProbe = yield* OsProbeService;
    const gpuProbe = yield* GpuProbeService;
    const cpuProbe = yield* CpuProbeService;
    return yield* autoDetect(osProbe, gpuProbe, cpuProbe, options);
  });
}
