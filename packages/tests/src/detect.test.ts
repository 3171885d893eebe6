import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { OperatingSystem, VulkanBackend } from "@vkplat/core";
import { autoDetect, detectPlatform, inferVulkanBackend } from "@vkplat/platform";
import { ProbesFrom } from "@vkplat/effect-runtime";
import { fakeCpu, fakeGpus, fakeOs, throwingProbe } from "./fakes.js";

const intel = fakeCpu("GenuineIntel", "Intel Core i9");

describe("inferVulkanBackend", () => {
  it("maps each operating system to its backend", () => {
    expect(inferVulkanBackend(OperatingSystem.Darwin)).toBe(VulkanBackend.MoltenVK);
    expect(inferVulkanBackend(OperatingSystem.Linux)).toBe(VulkanBackend.Vulkan);
    expect(inferVulkanBackend(OperatingSystem.Windows)).toBe(VulkanBackend.Vulkan);
  });
});

describe("autoDetect", () => {
  it.each([
    ["Darwin", "MoltenVK"],
    ["Linux", "Vulkan"],
    ["Windows", "Vulkan"],
  ])("%s selects the %s backend", (os, backend) => {
    const platform = Effect.runSync(autoDetect(fakeOs(os), fakeGpus([]), intel));
    expect(platform.vulkanBackend).toBe(backend);
    expect(platform.operatingSystem).toBe(os);
  });

  it("Darwin with a GPU runs on that GPU through MoltenVK", () => {
    const platform = Effect.runSync(autoDetect(
      fakeOs("Darwin"),
      fakeGpus([{ name: "Apple M2", driverVersion: "N/A" }]),
      fakeCpu("GenuineIntel", "Intel Core i9"),
    ));
    expect(platform.vulkanBackend).toBe("MoltenVK");
    expect(Effect.runSync(platform.getActiveHardware())).toEqual({
      hardwareType: "GPU",
      hardwareVendor: "Nvidia",
      hardwareModel: "Apple M2",
      driverVersion: "N/A",
    });
    expect(platform.toString()).toBe("Darwin/Nvidia/MoltenVK");
  });

  it("Linux without a GPU runs on the CPU through Vulkan", () => {
    const platform = Effect.runSync(autoDetect(
      fakeOs("Linux"),
      fakeGpus([]),
      fakeCpu("GenuineIntel", "Intel Xeon"),
    ));
    expect(platform.vulkanBackend).toBe("Vulkan");
    const active = Effect.runSync(platform.getActiveHardware());
    expect(active.hardwareType).toBe("CPU");
    expect(active.hardwareModel).toBe("Intel Xeon");
    expect(platform.toString()).toBe("Linux/GenuineIntel/Vulkan");
  });

  it("records the CPU once with driver N/A", () => {
    const platform = Effect.runSync(autoDetect(fakeOs("Linux"), fakeGpus([]), intel));
    expect(platform.cpus).toEqual([{
      hardwareType: "CPU",
      hardwareVendor: "GenuineIntel",
      hardwareModel: "Intel Core i9",
      driverVersion: "N/A",
    }]);
  });

  it("keeps GPUs in probe order as Nvidia devices", () => {
    const platform = Effect.runSync(autoDetect(
      fakeOs("Linux"),
      fakeGpus([
        { name: "NVIDIA A100", driverVersion: "535.104" },
        { name: "NVIDIA T4", driverVersion: "535.104" },
      ]),
      intel,
    ));
    expect(platform.gpus.map((g) => g.hardwareModel)).toEqual(["NVIDIA A100", "NVIDIA T4"]);
    expect(platform.gpus.every((g) => g.hardwareVendor === "Nvidia")).toBe(true);
    expect(platform.gpus[0].driverVersion).toBe("535.104");
    expect(Effect.runSync(platform.getActiveHardware()).hardwareModel).toBe("NVIDIA A100");
  });

  it("applies an explicit backend override", () => {
    const platform = Effect.runSync(autoDetect(
      fakeOs("Linux"), fakeGpus([]), intel, { vulkanBackend: VulkanBackend.SwiftShader },
    ));
    expect(platform.vulkanBackend).toBe("SwiftShader");
  });

  it("fails on an unrecognized operating system", () => {
    const error = Effect.runSync(Effect.flip(autoDetect(fakeOs("Windows_NT"), fakeGpus([]), intel)));
    expect(error._tag).toBe("UnrecognizedOperatingSystem");
  });

  it("fails on an unrecognized CPU vendor", () => {
    const error = Effect.runSync(Effect.flip(autoDetect(
      fakeOs("Linux"),
      fakeGpus([{ name: "NVIDIA T4", driverVersion: "535.104" }]),
      fakeCpu("AuthenticAMD", "AMD Ryzen 9"),
    )));
    expect(error._tag).toBe("UnrecognizedVendor");
    expect(error.message).toBe('Unrecognized CPU vendor "AuthenticAMD". Expected one of: GenuineIntel');
  });

  it("wraps a throwing probe in ProbeError", () => {
    const error = Effect.runSync(Effect.flip(autoDetect(
      fakeOs("Linux"), throwingProbe("broken-gpu", "driver crashed"), intel,
    )));
    expect(error._tag).toBe("ProbeError");
    if (error._tag === "ProbeError") {
      expect(error.probe).toBe("broken-gpu");
      expect(error.message).toBe('Probe "broken-gpu" failed: driver crashed');
    }
  });

  it("does not read later probes after a failure", () => {
    let cpuReads = 0;
    const cpu = { name: "counting-cpu", cpu: () => { cpuReads++; return { vendorIdRaw: "GenuineIntel", brandRaw: "x" }; } };
    Effect.runSync(Effect.either(autoDetect(fakeOs("Plan9"), fakeGpus([]), cpu)));
    expect(cpuReads).toBe(0);
  });
});

describe("detectPlatform", () => {
  it("reads probes from the provided layer", () => {
    const program = detectPlatform().pipe(
      Effect.provide(ProbesFrom({
        os: fakeOs("Darwin"),
        gpu: fakeGpus([]),
        cpu: intel,
      })),
    );
    const platform = Effect.runSync(program);
    expect(platform.toString()).toBe("Darwin/GenuineIntel/MoltenVK");
  });
});
