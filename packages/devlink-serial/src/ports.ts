// Serial port discovery.

import { SerialPort } from "serialport";
import { createLogger } from "@devlink/core";

const log = createLogger("serial");

/** What discovery knows about one port. IDs are lowercase hex, e.g. "10c4". */
export interface PortDescriptor {
  path: string;
  manufacturer?: string;
  vendorId?: string;
  productId?: string;
  /** Free-form description from the OS (the PnP ID on most platforms). */
  description?: string;
}

export type PortLister = () => Promise<PortDescriptor[]>;

/** USB-UART bridges found on common development boards. */
export const KNOWN_BRIDGES: ReadonlyArray<{ vendorId: string; productId: string; name: string }> = [
  { vendorId: "10c4", productId: "ea60", name: "Silicon Labs CP210x" },
  { vendorId: "1a86", productId: "7523", name: "QinHeng CH340" },
  { vendorId: "0403", productId: "6001", name: "FTDI FT232" },
];

const KNOWN_NAMES = ["esp32", "cp210x", "ch340", "ft232"];

/** Whether a port looks like one of the known bridges, by USB ID or by name. */
export function matchesKnownBridge(port: PortDescriptor): boolean {
  const vendorId = port.vendorId?.toLowerCase();
  const productId = port.productId?.toLowerCase();
  if (KNOWN_BRIDGES.some((b) => b.vendorId === vendorId && b.productId === productId)) {
    return true;
  }
  const text = `${port.manufacturer ?? ""} ${port.description ?? ""}`.toLowerCase();
  return KNOWN_NAMES.some((name) => text.includes(name));
}

/** Enumerate ports through `serialport`. */
export async function listSerialPorts(): Promise<PortDescriptor[]> {
  const ports = await SerialPort.list();
  return ports.map((info) => ({
    path: info.path,
    manufacturer: info.manufacturer,
    vendorId: info.vendorId,
    productId: info.productId,
    description: info.pnpId,
  }));
}

/** Paths of the serial ports present on this machine. */
export async function listPorts(lister: PortLister = listSerialPorts): Promise<string[]> {
  const ports = await lister();
  return ports.map((port) => port.path);
}

/**
 * Find the first port that looks like a development board.
 *
 * Returns null when nothing matches or the ports cannot be listed.
 */
export async function detectDevicePort(lister: PortLister = listSerialPorts): Promise<string | null> {
  let ports: PortDescriptor[];
  try {
    ports = await lister();
  } catch (e) {
    log.warn("error listing serial ports: %s", e instanceof Error ? e.message : String(e));
    return null;
  }

  const match = ports.find(matchesKnownBridge);
  if (!match) {
    log.debug("no known device among %d ports", ports.length);
    return null;
  }
  log.info("auto-detected device on %s", match.path);
  return match.path;
}
