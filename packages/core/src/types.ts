/**
 * Core types for the vkplat system.
 *
 * Every enumeration is a frozen object whose values equal their names, plus a
 * union type of the same name.
 */

// ── Operating system ───────────────────────────────────────────────────────
export const OperatingSystem = {
  Linux: "Linux",
  Darwin: "Darwin",
  Windows: "Windows",
} as const;
export type OperatingSystem = (typeof OperatingSystem)[keyof typeof OperatingSystem];

// ── Hardware ───────────────────────────────────────────────────────────────
export const HardwareType = {
  CPU: "CPU",
  GPU: "GPU",
} as const;
export type HardwareType = (typeof HardwareType)[keyof typeof HardwareType];

export const HardwareVendor = {
  GenuineIntel: "GenuineIntel",
  Nvidia: "Nvidia",
} as const;
export type HardwareVendor = (typeof HardwareVendor)[keyof typeof HardwareVendor];

// ── Vulkan backend ─────────────────────────────────────────────────────────
export const VulkanBackend = {
  MoltenVK: "MoltenVK",
  SwiftShader: "SwiftShader",
  Vulkan: "Vulkan",
} as const;
export type VulkanBackend = (typeof VulkanBackend)[keyof typeof VulkanBackend];

/** Placeholder driver version for devices without a driver (CPUs). */
export const NO_DRIVER = "N/A";

// ── Records ────────────────────────────────────────────────────────────────
export interface HardwareInformation {
  readonly hardwareType: HardwareType;
  readonly hardwareVendor: HardwareVendor;
  readonly hardwareModel: string;
  readonly driverVersion: string;
}

export type AvailableHardware = Readonly<Record<HardwareType, readonly HardwareInformation[]>>;

// ── Detection config ───────────────────────────────────────────────────────
export interface DetectConfig {
  /** Forces this backend instead of the one implied by the OS. */
  readonly backend: VulkanBackend | undefined;
  /** Path or name of the nvidia-smi binary. */
  readonly nvidiaSmi: string;
  /** Timeout for each external probe command. */
  readonly timeoutMs: number;
  readonly logLevel: "debug" | "info" | "warn" | "error";
  readonly json: boolean;
}

export const defaultDetectConfig: DetectConfig = {
  backend: undefined,
  nvidiaSmi: "nvidia-smi",
  timeoutMs: 2000,
  logLevel: "info",
  json: false,
};

export function isVulkanBackend(value: string): value is VulkanBackend {
  return Object.values<string>(VulkanBackend).includes(value);
}
