// Devlink wire protocol: envelopes, codec, validation and errors.
//
// This package has no I/O. It turns envelopes into newline-terminated JSON
// text and back, and tells the four message shapes apart.

// ============================================================================
// Errors
// ============================================================================

export {
  CommunicationError,
  CommandTimeoutError,
  InvalidResponseError,
  DeviceDisconnectedError,
  ProtocolError,
  isCommunicationError,
  type CommunicationErrorKind,
} from "./errors.ts";

// ============================================================================
// Wire Types
// ============================================================================

export type {
  CommandParams,
  RawMessage,
  CommandEnvelope,
  ResponseEnvelope,
  DataMessage,
  EventMessage,
  Envelope,
} from "./types.ts";

export {
  // Discriminants
  MessageKind,
  ResponseKind,
  RESPONSE_KINDS,
  StatusCode,
  COMMAND_ID_MODULUS,
  // Factory functions
  createCommand,
  createResponse,
  createDataMessage,
  createEventMessage,
} from "./types.ts";

// ============================================================================
// Wire Codec
// ============================================================================

export {
  FRAME_TERMINATOR,
  encode,
  decode,
  classify,
  hasDataMarker,
  hasEventMarker,
  isRecord,
} from "./codec.ts";

export {
  validateCommand,
  validateResponse,
  validateDataMessage,
  validateEventMessage,
  checkResponseStatus,
  isSuccess,
} from "./validate.ts";
