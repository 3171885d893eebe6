/**
 * Resolve a DetectConfig from `--key=value` arguments and the environment.
 *
 * Precedence: CLI args, then VKPLAT_NVIDIA_SMI, then `defaultDetectConfig`.
 */
import { Effect } from "effect";
import {
  ConfigError, VulkanBackend, defaultDetectConfig, isVulkanBackend,
  type DetectConfig,
} from "@vkplat/core";
import { normalizeLogLevel } from "./logging.js";

export type ArgMap = Readonly<Partial<Record<string, string>>>;

export function resolveDetectConfig(
  kv: ArgMap,
  env: ArgMap = {},
): Effect.Effect<DetectConfig, ConfigError> {
  return Effect.gen(function* () {
    let backend = defaultDetectConfig.backend;
    if (kv.backend !== undefined) {
      if (!isVulkanBackend(kv.backend)) {
        return yield* Effect.fail(new ConfigError({
          message: `Unknown Vulkan backend "${kv.backend}". Expected one of: ${Object.values(VulkanBackend).join(", ")}`,
        }));
      }
      backend = kv.backend;
    }

    let timeoutMs = defaultDetectConfig.timeoutMs;
    if (kv.timeoutMs !== undefined) {
      timeoutMs = Number(kv.timeoutMs);
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        return yield* Effect.fail(new ConfigError({
          message: `--timeoutMs must be a positive integer, got "${kv.timeoutMs}"`,
        }));
      }
    }

    return {
      backend,
      timeoutMs,
      nvidiaSmi: kv.nvidiaSmi ?? env.VKPLAT_NVIDIA_SMI ?? defaultDetectConfig.nvidiaSmi,
      logLevel: kv.logLevel === undefined ? defaultDetectConfig.logLevel : normalizeLogLevel(kv.logLevel),
      json: kv.json === undefined ? defaultDetectConfig.json : kv.json === "true" || kv.json === "1",
    } satisfies DetectConfig;
  });
}
