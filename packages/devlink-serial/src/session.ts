// Serial device sessions.

import {
  type CommandMiddleware,
  type SessionConfig,
  DeviceSession,
  configFromEnv,
  resolveConfig,
} from "@devlink/core";
import type { LinkFactory } from "./link.ts";
import { SerialTransport } from "./transport.ts";

export interface SerialSessionOptions {
  middleware?: CommandMiddleware[];
  linkFactory?: LinkFactory;
  detectPort?: () => Promise<string | null>;
}

/**
 * Build a SerialTransport and a DeviceSession sharing one configuration.
 *
 * With no configuration given, DEVLINK_* environment variables are read.
 *
 * @example
 * ```typescript
 * const session = createSerialSession({ port: "/dev/ttyUSB0" });
 * if (await session.connect()) {
 *   console.log(session.getDeviceInfo());
 * }
 * ```
 */
export function createSerialSession(
  config: Partial<SessionConfig> = configFromEnv(),
  options: SerialSessionOptions = {},
): DeviceSession {
  const resolved = resolveConfig(config);
  const transport = new SerialTransport({
    config: resolved,
    linkFactory: options.linkFactory,
    detectPort: options.detectPort,
  });
  return new DeviceSession(transport, { config: resolved, middleware: options.middleware });
}
