/**
 * ExecutionPlatform — the detected environment as a read-only value.
 */
import { Effect, Option } from "effect";
import {
  HardwareType, NoHardwareDetected,
  type AvailableHardware, type HardwareInformation,
  type OperatingSystem, type VulkanBackend,
} from "@vkplat/core";

export interface ExecutionPlatformInit {
  readonly vulkanBackend: VulkanBackend;
  readonly operatingSystem: OperatingSystem;
  /** Lists left out are treated as empty. */
  readonly availableHardware?: Partial<AvailableHardware>;
}

export interface ExecutionPlatformJson {
  readonly operatingSystem: OperatingSystem;
  readonly vulkanBackend: VulkanBackend;
  readonly availableHardware: AvailableHardware;
  readonly activeHardware: HardwareInformation | null;
  readonly id: string | null;
}

export function noHardwareDetected(): NoHardwareDetected {
  return new NoHardwareDetected({ message: "No CPU or GPU was detected on this platform" });
}

export class ExecutionPlatform {
  readonly vulkanBackend: VulkanBackend;
  readonly operatingSystem: OperatingSystem;
  readonly availableHardware: AvailableHardware;

  constructor(init: ExecutionPlatformInit) {
    this.vulkanBackend = init.vulkanBackend;
    this.operatingSystem = init.operatingSystem;
    this.availableHardware = Object.freeze({
      [HardwareType.CPU]: Object.freeze([...(init.availableHardware?.CPU ?? [])]),
      [HardwareType.GPU]: Object.freeze([...(init.availableHardware?.GPU ?? [])]),
    });
  }

  get gpus(): readonly HardwareInformation[] {
    return this.availableHardware[HardwareType.GPU];
  }

  get cpus(): readonly HardwareInformation[] {
    return this.availableHardware[HardwareType.CPU];
  }

  /** The device that executes shaders: the primary GPU, else the primary CPU. */
  getActiveHardware(): Effect.Effect<HardwareInformation, NoHardwareDetected> {
    return Option.match(this.findActiveHardware(), {
      onNone: () => Effect.fail(noHardwareDetected()),
      onSome: (hardware) => Effect.succeed(hardware),
    });
  }

  /** `"{os}/{activeVendor}/{backend}"`, as an Effect. */
  identify(): Effect.Effect<string, NoHardwareDetected> {
    return Effect.map(this.getActiveHardware(), (active) => this.render(active));
  }

  /** Throws `NoHardwareDetected` when there is nothing to render. */
  toString(): string {
    return this.render(Option.getOrThrowWith(this.findActiveHardware(), noHardwareDetected));
  }

  toJSON(): ExecutionPlatformJson {
    const active = Option.getOrNull(this.findActiveHardware());
    return {
      operatingSystem: this.operatingSystem,
      vulkanBackend: this.vulkanBackend,
      availableHardware: this.availableHardware,
      activeHardware: active,
      id: active === null ? null : this.render(active),
    };
  }

  private findActiveHardware(): Option.Option<HardwareInformation> {
    return Option.fromNullable(this.gpus[0]).pipe(
      Option.orElse(() => Option.fromNullable(this.cpus[0])),
    );
  }

  private render(active: HardwareInformation): string {
    return `${this.operatingSystem}/${active.hardwareVendor}/${this.vulkanBackend}`;
  }
}
