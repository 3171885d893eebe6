/**
 * Command: vkplat detect
 *
 * Probes the host, prints the summary (or JSON) and the platform id.
 */
import { Effect, Either, Layer } from "effect";
import { detectPlatform, formatSummary } from "@vkplat/platform";
import { LoggerLive, ProbesLive, resolveDetectConfig } from "@vkplat/effect-runtime";
import { parseKV, loadConfig } from "../parse.js";

interface TaggedFailure {
  readonly _tag: string;
  readonly message: string;
}

async function runOrExit<A, E extends TaggedFailure>(effect: Effect.Effect<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isLeft(result)) {
    console.error(`Fatal: [${result.left._tag}] ${result.left.message}`);
    process.exit(1);
  }
  return result.right;
}

export async function detectCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const config = await runOrExit(resolveDetectConfig(kv, process.env));

  const gpuUnavailable: unknown[] = [];
  const program = Effect.gen(function* () {
    const platform = yield* detectPlatform({ vulkanBackend: config.backend });
    for (const cause of gpuUnavailable) {
      yield* Effect.logDebug(`nvidia-smi unavailable: ${cause instanceof Error ? cause.message : String(cause)}`);
    }

    if (config.json) {
      console.log(JSON.stringify(platform, null, 2));
      return;
    }
    const lines = yield* formatSummary(platform);
    for (const line of lines) console.log(line);
    console.log(`Platform        -> ${platform.toString()}`);
  }).pipe(
    Effect.provide(Layer.merge(
      ProbesLive(config, (cause) => gpuUnavailable.push(cause)),
      LoggerLive(config.logLevel),
    )),
  );

  await runOrExit(program);
}
