import { execFileSync } from "node:child_process";

/** Runs a command synchronously and returns its stdout; throws on failure. */
export type CommandRunner = (file: string, args: readonly string[], timeoutMs: number) => string;

export const execRunner: CommandRunner = (file, args, timeoutMs) =>
  execFileSync(file, args, {
    encoding: "utf-8",
    timeout: timeoutMs,
    stdio: ["ignore", "pipe", "pipe"],
  });
