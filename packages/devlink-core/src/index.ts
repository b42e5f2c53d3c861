// Devlink core: device sessions over a frame transport.
// This package provides correlation, subscriptions, middleware and logging;
// transports that own a physical link live in their own packages.

// Errors and wire types, re-exported so most callers need only this package
export {
  CommunicationError,
  CommandTimeoutError,
  InvalidResponseError,
  DeviceDisconnectedError,
  ProtocolError,
  isCommunicationError,
  StatusCode,
  ResponseKind,
  isSuccess,
  checkResponseStatus,
} from "@devlink/wire";

export type {
  CommunicationErrorKind,
  CommandParams,
  ResponseEnvelope,
  DataMessage,
  EventMessage,
} from "@devlink/wire";

// Session
export {
  DeviceSession,
  STREAM_START_COMMAND,
  STREAM_STOP_COMMAND,
  type DeviceInfo,
  type SessionOptions,
} from "./session.ts";

// Transport abstraction
export type { ConnectionState, FrameCallback, StateCallback, FrameTransport } from "./transport.ts";

// Configuration
export {
  DEFAULT_CONFIG,
  ENV_VARS,
  MAX_TIMEOUT_MS,
  ConfigError,
  resolveConfig,
  requireTimeout,
  configFromEnv,
  type SessionConfig,
} from "./config.ts";

// Command IDs
export { CommandIdAllocator } from "./allocator.ts";

// Subscriptions
export {
  ALL_EVENTS,
  SubscriberRegistry,
  toListener,
  type SubscriptionId,
  type MessageListener,
  type Subscriber,
} from "./subscribers.ts";

// Middleware
export {
  Extensions,
  type CommandContext,
  type CommandRequest,
  type CommandOutcome,
  type CommandMiddleware,
} from "./middleware.ts";

// Logging
export {
  LOG_ROOT,
  createLogger,
  enableLogging,
  disableLogging,
  isLoggingEnabled,
  type Logger,
  type LogFn,
  type LogLevel,
} from "./logger.ts";
export { loggingMiddleware, type LoggingOptions, type LogSink } from "./logging.ts";
