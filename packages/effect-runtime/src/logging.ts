/**
 * Structured logging for the CLI.
 *
 * Log lines go to stderr so `--json` output on stdout stays parseable.
 */
import { Layer, Logger, LogLevel } from "effect";
import type { DetectConfig } from "@vkplat/core";

// ── Message rendering ──────────────────────────────────────────────────────

export function renderMessage(message: unknown): string {
  if (typeof message === "string") return message;
  if (Array.isArray(message)) return message.map(renderMessage).join(" ");
  return JSON.stringify(message);
}

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  console.error(`[${ts}] ${lvl} ${renderMessage(message)}`);
});

// ── Log level from string ──────────────────────────────────────────────────

export function normalizeLogLevel(level: string | undefined): DetectConfig["logLevel"] {
  switch (level?.toLowerCase()) {
    case "debug": return "debug";
    case "warn":
    case "warning": return "warn";
    case "error": return "error";
    default: return "info";
  }
}

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (normalizeLogLevel(level)) {
    case "debug": return LogLevel.Debug;
    case "warn": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "info": return LogLevel.Info;
  }
}

/** Pretty logger installed as the default, filtered at `level`. */
export const LoggerLive = (level: string) =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(parseLogLevel(level)),
  );
