import { describe, it, expect } from "vitest";
import { type PortDescriptor, detectDevicePort, listPorts, matchesKnownBridge } from "./ports.ts";

describe("matchesKnownBridge", () => {
  it.each([
    ["10c4", "ea60"],
    ["1a86", "7523"],
    ["0403", "6001"],
    ["10C4", "EA60"],
  ])("matches USB ID %s:%s", (vendorId, productId) => {
    expect(matchesKnownBridge({ path: "/dev/ttyUSB0", vendorId, productId })).toBe(true);
  });

  it("matches by manufacturer or description", () => {
    expect(matchesKnownBridge({ path: "/dev/ttyACM0", manufacturer: "Espressif ESP32-S3" })).toBe(true);
    expect(matchesKnownBridge({ path: "COM3", description: "FT232R USB UART" })).toBe(true);
  });

  it("rejects other ports", () => {
    expect(matchesKnownBridge({ path: "/dev/ttyS0" })).toBe(false);
    expect(
      matchesKnownBridge({ path: "/dev/ttyUSB1", manufacturer: "Silicon Labs", vendorId: "10c4", productId: "0000" }),
    ).toBe(false);
  });
});

describe("port discovery", () => {
  const ports: PortDescriptor[] = [
    { path: "/dev/ttyS0" },
    { path: "/dev/ttyUSB0", vendorId: "1a86", productId: "7523" },
    { path: "/dev/ttyUSB1", vendorId: "10c4", productId: "ea60" },
  ];

  it("lists port paths", async () => {
    await expect(listPorts(async () => ports)).resolves.toEqual(["/dev/ttyS0", "/dev/ttyUSB0", "/dev/ttyUSB1"]);
  });

  it("detects the first matching port", async () => {
    await expect(detectDevicePort(async () => ports)).resolves.toBe("/dev/ttyUSB0");
  });

  it("returns null when nothing matches", async () => {
    await expect(detectDevicePort(async () => [{ path: "/dev/ttyS0" }])).resolves.toBeNull();
  });

  it("returns null when listing fails", async () => {
    const lister = async (): Promise<PortDescriptor[]> => {
      throw new Error("permission denied");
    };
    await expect(detectDevicePort(lister)).resolves.toBeNull();
  });
});
