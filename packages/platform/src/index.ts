/**
 * @vkplat/platform — platform model and detection policy.
 *
 *   src/hardware.ts  → raw string → enumeration classification
 *   src/platform.ts  → ExecutionPlatform value, active hardware selection
 *   src/detect.ts    → autoDetect / detectPlatform, backend inference
 *   src/summary.ts   → terminal summary lines
 */
export { ExecutionPlatform, noHardwareDetected } from "./platform.js";
export type { ExecutionPlatformInit, ExecutionPlatformJson } from "./platform.js";
export { autoDetect, detectPlatform, inferVulkanBackend } from "./detect.js";
export type { DetectOptions } from "./detect.js";
export { makeHardwareInformation, parseCpuVendor, parseOperatingSystem } from "./hardware.js";
export { formatSummary } from "./summary.js";

// Re-export types from core
export type { HardwareInformation, AvailableHardware, DetectionError } from "@vkplat/core";
