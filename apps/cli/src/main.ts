#!/usr/bin/env -S npx tsx
/**
 * vkplat CLI — the main entry point.
 *
 * Commands: detect
 */
import { detectCmd } from "./commands/detect.js";

const USAGE = `
vkplat — Vulkan execution platform detection

Commands:
  detect           Detect the OS, GPUs and CPU and pick a Vulkan backend

Options:
  --backend=NAME   Force MoltenVK, SwiftShader or Vulkan
  --json           Print the detected platform as JSON
  --logLevel=LVL   debug, info, warn or error (default: info)
  --nvidiaSmi=PATH nvidia-smi binary (default: $VKPLAT_NVIDIA_SMI or nvidia-smi)
  --timeoutMs=N    Timeout for each probe command (default: 2000)
  --config=FILE    JSON file with any of the options above
  --help, -h       Show this help

Examples:
  vkplat detect
  vkplat detect --json --logLevel=debug
  vkplat detect --backend=SwiftShader
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "detect") {
    await detectCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
