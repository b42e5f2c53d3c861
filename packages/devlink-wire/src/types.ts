// Devlink wire protocol types.
//
// One JSON object per line, in both directions. Four shapes travel on the
// wire: commands (host → device), responses, data messages and event
// messages (device → host).

// ============================================================================
// Discriminants
// ============================================================================

/** Kind of a classified inbound or outbound message. */
export const MessageKind = {
  Command: "command",
  Response: "response",
  Data: "data",
  Event: "event",
} as const;
export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind];

/** Value of the `resp` field of a response. */
export const ResponseKind = {
  /** Command accepted, nothing to return */
  Ack: "ack",
  /** Command result carried in `data` */
  Data: "data",
  /** Command failed, details in `data` */
  Error: "error",
} as const;
export type ResponseKind = (typeof ResponseKind)[keyof typeof ResponseKind];

export const RESPONSE_KINDS: readonly ResponseKind[] = [
  ResponseKind.Ack,
  ResponseKind.Data,
  ResponseKind.Error,
];

/** Status codes reported by the device in responses. */
export const StatusCode = {
  SUCCESS: 0,
  INVALID_COMMAND: 1,
  INVALID_PARAMS: 2,
  EXECUTION_ERROR: 3,
  TIMEOUT: 4,
  BUSY: 5,
  NOT_IMPLEMENTED: 6,
} as const;
export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

/** Command IDs live in 16 bits and wrap. */
export const COMMAND_ID_MODULUS = 65536;

// ============================================================================
// Envelopes
// ============================================================================

/** Command parameters, passed through to the device untouched. */
export type CommandParams = Record<string, unknown>;

/** A decoded JSON object whose shape has not been checked yet. */
export type RawMessage = Record<string, unknown>;

/** Outbound request: `{cmd, id, params}`. */
export interface CommandEnvelope {
  cmd: string;
  id: number;
  params: CommandParams;
}

/** Reply to a command, correlated by `id`: `{resp, id, status, data}`. */
export interface ResponseEnvelope<T = unknown> {
  resp: ResponseKind;
  id: number;
  status: number;
  data: T;
}

/**
 * Unsolicited streaming payload: `{data, type, timestamp}`.
 *
 * The `data` key doubles as the data marker, see `hasDataMarker`.
 */
export interface DataMessage<T = unknown> {
  data: T;
  type: string;
  timestamp?: number;
}

/** Unsolicited notification: `{event: true, type, data, timestamp}`. */
export interface EventMessage<T = unknown> {
  event: true;
  type: string;
  data: T;
  timestamp?: number;
}

export type Envelope = CommandEnvelope | ResponseEnvelope | DataMessage | EventMessage;

// ============================================================================
// Factory functions
// ============================================================================

export function createCommand(name: string, params: CommandParams = {}, id = 0): CommandEnvelope {
  return { cmd: name, id, params };
}

export function createResponse(
  kind: ResponseKind,
  id: number,
  data: unknown = null,
  status: number = StatusCode.SUCCESS,
): ResponseEnvelope {
  return { resp: kind, id, status, data };
}

/** Build a data message. The device stamps `timestamp` with its own clock. */
export function createDataMessage<T = unknown>(type: string, data: T, timestamp = 0): DataMessage<T> {
  return { data, type, timestamp };
}

export function createEventMessage(type: string, data: unknown = null, timestamp = 0): EventMessage {
  return { event: true, type, data, timestamp };
}
