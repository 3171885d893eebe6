/**
 * Typed error classes for every failure the detection pipeline can report.
 */
import { Data } from "effect";

export class UnrecognizedOperatingSystem extends Data.TaggedError("UnrecognizedOperatingSystem")<{
  readonly message: string;
  readonly value: string;
}> {}

export class UnrecognizedVendor extends Data.TaggedError("UnrecognizedVendor")<{
  readonly message: string;
  readonly value: string;
}> {}

export class NoHardwareDetected extends Data.TaggedError("NoHardwareDetected")<{
  readonly message: string;
}> {}

export class ProbeError extends Data.TaggedError("ProbeError")<{
  readonly message: string;
  readonly probe: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Everything `autoDetect` can fail with. */
export type DetectionError = UnrecognizedOperatingSystem | UnrecognizedVendor | ProbeError;
