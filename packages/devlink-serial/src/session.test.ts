import { describe, it, expect, vi } from "vitest";
import {
  type CommandEnvelope,
  ResponseKind,
  createEventMessage,
  createResponse,
  decode,
  validateCommand,
} from "@devlink/wire";
import { createSerialSession } from "./session.ts";
import { type FakeLink, fakeLinkFactory } from "./testing/fake-link.ts";

/** Make a fake link answer like a small firmware would. */
function emulateDevice(link: FakeLink): void {
  link.onWrite = (text) => {
    const command: unknown = decode(text);
    validateCommand(command);
    link.feed(JSON.stringify(reply(command)) + "\n");
  };
}

function reply(command: CommandEnvelope) {
  switch (command.cmd) {
    case "get_info":
      return createResponse(ResponseKind.Data, command.id, { name: "bench-unit", firmware: "0.9.1" });
    case "ping":
      return createResponse(ResponseKind.Data, command.id, { pong: true });
    default:
      return createResponse(ResponseKind.Error, command.id, "unknown command", 1);
  }
}

describe("createSerialSession", () => {
  it("connects over a serial link and talks to the device", async () => {
    const { links, factory } = fakeLinkFactory(emulateDevice);
    const session = createSerialSession({ port: "/dev/ttyUSB0" }, { linkFactory: factory });

    await expect(session.connect()).resolves.toBe(true);
    expect(links[0]?.options).toEqual({ path: "/dev/ttyUSB0", baudRate: 115200 });
    expect(session.getDeviceInfo()).toEqual({ name: "bench-unit", firmware: "0.9.1" });

    await expect(session.call("ping")).resolves.toEqual({ pong: true });
    expect(links[0]?.written).toEqual([
      '{"cmd":"get_info","id":1,"params":{}}\n',
      '{"cmd":"ping","id":2,"params":{}}\n',
    ]);

    await session.disconnect();
    expect(session.isConnected()).toBe(false);
  });

  it("delivers device events to subscribers", async () => {
    const { links, factory } = fakeLinkFactory(emulateDevice);
    const session = createSerialSession({ port: "/dev/ttyUSB0" }, { linkFactory: factory });
    await session.connect();

    const onButton = vi.fn();
    session.registerEventCallback("button", onButton);
    links[0]?.feed("I (4512) main: button task started\n");
    links[0]?.feed(JSON.stringify(createEventMessage("button", { pressed: true }, 4512)) + "\n");

    expect(onButton).toHaveBeenCalledWith({
      event: true,
      type: "button",
      data: { pressed: true },
      timestamp: 4512,
    });
  });

  it("auto-detects the port when none is configured", async () => {
    const { links, factory } = fakeLinkFactory(emulateDevice);
    const session = createSerialSession(
      {},
      { linkFactory: factory, detectPort: async () => "/dev/ttyACM0" },
    );

    await expect(session.connect()).resolves.toBe(true);
    expect(links[0]?.options.path).toBe("/dev/ttyACM0");
  });

  it("reports false when no port can be found", async () => {
    const { factory } = fakeLinkFactory(emulateDevice);
    const session = createSerialSession({}, { linkFactory: factory, detectPort: async () => null });

    await expect(session.connect()).resolves.toBe(false);
  });

  it("reports false when the link cannot be created", async () => {
    const session = createSerialSession(
      { port: "/dev/ttyUSB0" },
      {
        linkFactory: () => {
          throw new TypeError("bad options");
        },
      },
    );

    await expect(session.connect()).resolves.toBe(false);
    expect(session.getState()).toBe("disconnected");
  });

  it("releases waiters when the cable is pulled", async () => {
    const { links, factory } = fakeLinkFactory(emulateDevice);
    const session = createSerialSession({ port: "/dev/ttyUSB0" }, { linkFactory: factory });
    await session.connect();
    const link = links[0];
    if (link) link.onWrite = null;

    const waiting = session.sendCommand("slow_op", {}, 60_000).catch((e: unknown) => e);
    await vi.waitFor(() => expect(link?.written).toHaveLength(2));
    link?.unplug();

    await expect(waiting).resolves.toMatchObject({
      name: "DeviceDisconnectedError",
      message: "link closed while waiting for response",
    });
    expect(session.pendingCount()).toBe(0);
  });
});
