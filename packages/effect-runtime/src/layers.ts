/**
 * Effect layers for dependency injection.
 *
 * Each probe gets a Layer; `ProbesLive` wires the Node.js implementations
 * from a resolved DetectConfig.
 */
import { Layer } from "effect";
import {
  OsProbeService, GpuProbeService, CpuProbeService,
  type OsProbe, type GpuProbe, type CpuProbe, type DetectConfig,
} from "@vkplat/core";
import { nodeOsProbe, createNvidiaSmiProbe, createCpuProbe } from "@vkplat/probes";

export interface Probes {
  readonly os: OsProbe;
  readonly gpu: GpuProbe;
  readonly cpu: CpuProbe;
}

export const ProbesFrom = (probes: Probes) =>
  Layer.mergeAll(
    Layer.succeed(OsProbeService, probes.os),
    Layer.succeed(GpuProbeService, probes.gpu),
    Layer.succeed(CpuProbeService, probes.cpu),
  );

export const ProbesLive = (config: DetectConfig, onGpuUnavailable?: (cause: unknown) => void) =>
  ProbesFrom({
    os: nodeOsProbe,
    gpu: createNvidiaSmiProbe({
      command: config.nvidiaSmi,
      timeoutMs: config.timeoutMs,
      onUnavailable: onGpuUnavailable,
    }),
    cpu: createCpuProbe({ timeoutMs: config.timeoutMs }),
  });
