/**
 * Classification of raw probe strings into the closed platform enumerations.
 *
 * Lookups are exact: anything not in a table fails instead of falling back to
 * a default value.
 */
import { Data, Effect } from "effect";
import {
  HardwareVendor, OperatingSystem,
  UnrecognizedOperatingSystem, UnrecognizedVendor,
  type HardwareInformation,
} from "@vkplat/core";

const OPERATING_SYSTEMS: ReadonlyMap<string, OperatingSystem> = new Map<string, OperatingSystem>(
  Object.values(OperatingSystem).map((os) => [os, os]),
);

// Raw CPUID vendor strings. Only Intel parts are modelled so far.
const CPU_VENDORS: ReadonlyMap<string, HardwareVendor> = new Map<string, HardwareVendor>([
  ["GenuineIntel", HardwareVendor.GenuineIntel],
]);

export function parseOperatingSystem(
  raw: string,
): Effect.Effect<OperatingSystem, UnrecognizedOperatingSystem> {
  const os = OPERATING_SYSTEMS.get(raw);
  if (os === undefined) {
    return Effect.fail(new UnrecognizedOperatingSystem({
      message: `Unrecognized operating system "${raw}". Expected one of: ${[...OPERATING_SYSTEMS.keys()].join(", ")}`,
      value: raw,
    }));
  }
  return Effect.succeed(os);
}

export function parseCpuVendor(raw: string): Effect.Effect<HardwareVendor, UnrecognizedVendor> {
  const vendor = CPU_VENDORS.get(raw);
  if (vendor === undefined) {
    return Effect.fail(new UnrecognizedVendor({
      message: `Unrecognized CPU vendor "${raw}". Expected one of: ${[...CPU_VENDORS.keys()].join(", ")}`,
      value: raw,
    }));
  }
  return Effect.succeed(vendor);
}

/** Immutable hardware record with structural equality (`Equal.equals`). */
export function makeHardwareInformation(info: HardwareInformation): HardwareInformation {
  return Data.struct({
    hardwareType: info.hardwareType,
    hardwareVendor: info.hardwareVendor,
    hardwareModel: info.hardwareModel,
    driverVersion: info.driverVersion,
  });
}
