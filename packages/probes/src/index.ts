/**
 * @vkplat/probes — Node.js implementations of the hardware probes.
 */
export { createOsProbe, nodeOsProbe, normalizeOsType } from "./os.js";
export { createNvidiaSmiProbe, parseNvidiaSmiCsv, NVIDIA_SMI_ARGS } from "./nvidia.js";
export type { NvidiaSmiProbeOptions } from "./nvidia.js";
export { createCpuProbe, parseProcCpuInfo, parseSysctlCpu } from "./cpu.js";
export type { CpuProbeOptions } from "./cpu.js";
export { execRunner } from "./exec.js";
export type { CommandRunner } from "./exec.js";
