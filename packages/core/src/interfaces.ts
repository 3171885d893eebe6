/**
 * Probe interfaces (ports). Platform-specific code implements these; the
 * detection policy only ever sees the raw facts they return.
 */
import { Context } from "effect";

// ── OS ─────────────────────────────────────────────────────────────────────
export interface OsProbe {
  readonly name: string;
  /** Operating system family, e.g. "Linux". */
  operatingSystem(): string;
}

export class OsProbeService extends Context.Tag("OsProbeService")<
  OsProbeService,
  OsProbe
>() {}

// ── GPU ────────────────────────────────────────────────────────────────────
export interface RawGpuInfo {
  readonly name: string;
  readonly driverVersion: string;
}

export interface GpuProbe {
  readonly name: string;
  /** Discrete GPUs in discovery order; empty when none are visible. */
  gpus(): readonly RawGpuInfo[];
}

export class GpuProbeService extends Context.Tag("GpuProbeService")<
  GpuProbeService,
  GpuProbe
>() {}

// ── CPU ────────────────────────────────────────────────────────────────────
export interface RawCpuInfo {
  readonly vendorIdRaw: string;
  readonly brandRaw: string;
}

export interface CpuProbe {
  readonly name: string;
  cpu(): RawCpuInfo;
}

export class CpuProbeService extends Context.Tag("CpuProbeService")<
  CpuProbeService,
  CpuProbe
>() {}
