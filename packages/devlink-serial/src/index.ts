// Devlink serial transport (Node.js only)
//
// Provides serial-specific I/O: line framing, the serialport-backed link,
// port discovery and the connection state machine.

export { LineFramer } from "./framing.ts";
export {
  NodeSerialLink,
  nodeLinkFactory,
  type SerialLink,
  type LinkListener,
  type LinkOptions,
  type LinkFactory,
} from "./link.ts";
export {
  KNOWN_BRIDGES,
  matchesKnownBridge,
  listSerialPorts,
  listPorts,
  detectDevicePort,
  type PortDescriptor,
  type PortLister,
} from "./ports.ts";
export { SerialTransport, type SerialTransportOptions } from "./transport.ts";
export { createSerialSession, type SerialSessionOptions } from "./session.ts";

// Re-export the session and its types from core
export {
  DeviceSession,
  type DeviceInfo,
  type SessionOptions,
  type SessionConfig,
  DEFAULT_CONFIG,
  resolveConfig,
  configFromEnv,
  CommunicationError,
  CommandTimeoutError,
  InvalidResponseError,
  DeviceDisconnectedError,
  ProtocolError,
  loggingMiddleware,
  enableLogging,
} from "@devlink/core";
