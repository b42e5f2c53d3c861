// Error taxonomy for device communication.
//
// Every failure a caller can observe is a CommunicationError. The `kind`
// field lets callers branch without instanceof chains, e.g. to retry on
// "timeout" but prompt the user on "disconnected".

export type CommunicationErrorKind =
  | "communication"
  | "timeout"
  | "invalid-response"
  | "disconnected"
  | "protocol";

/** Link-level failure, and base of every other device communication error. */
export class CommunicationError extends Error {
  readonly kind: CommunicationErrorKind;

  constructor(message: string, cause?: unknown, kind: CommunicationErrorKind = "communication") {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CommunicationError";
    this.kind = kind;
  }
}

/** No matching response arrived before the command's deadline. */
export class CommandTimeoutError extends CommunicationError {
  readonly command: string;
  readonly id: number;
  readonly timeoutMs: number;

  constructor(command: string, id: number, timeoutMs: number) {
    super(`command ${command} (id=${id}) timed out after ${timeoutMs}ms`, undefined, "timeout");
    this.name = "CommandTimeoutError";
    this.command = command;
    this.id = id;
    this.timeoutMs = timeoutMs;
  }
}

/** A response failed validation or reported a non-success status. */
export class InvalidResponseError extends CommunicationError {
  /** Status code reported by the device, null when the response was malformed */
  readonly status: number | null;
  /** Response payload (usually the device's error description) */
  readonly payload: unknown;

  constructor(message: string, status: number | null = null, payload: unknown = null, cause?: unknown) {
    super(message, cause, "invalid-response");
    this.name = "InvalidResponseError";
    this.status = status;
    this.payload = payload;
  }

  static status(status: number, payload: unknown): InvalidResponseError {
    return new InvalidResponseError(
      `command failed with status ${status}: ${describePayload(payload)}`,
      status,
      payload,
    );
  }

  static malformed(cause: ProtocolError): InvalidResponseError {
    return new InvalidResponseError(`malformed response: ${cause.message}`, null, null, cause);
  }
}

/** The link is not open, or a write to it failed. */
export class DeviceDisconnectedError extends CommunicationError {
  constructor(message = "device is not connected", cause?: unknown) {
    super(message, cause, "disconnected");
    this.name = "DeviceDisconnectedError";
  }
}

/** A frame could not be decoded, or does not match any known message shape. */
export class ProtocolError extends CommunicationError {
  /** The offending field, when the failure concerns a single field */
  readonly field: string | null;

  constructor(message: string, field: string | null = null, cause?: unknown) {
    super(message, cause, "protocol");
    this.name = "ProtocolError";
    this.field = field;
  }

  static invalidJson(cause: unknown): ProtocolError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ProtocolError(`invalid JSON: ${reason}`, null, cause);
  }

  static notAnObject(): ProtocolError {
    return new ProtocolError("message must be a JSON object");
  }

  static missingField(shape: string, field: string): ProtocolError {
    return new ProtocolError(`${shape} is missing field "${field}"`, field);
  }

  static invalidField(shape: string, field: string, expected: string): ProtocolError {
    return new ProtocolError(`${shape} field "${field}" must be ${expected}`, field);
  }

  static unknownType(): ProtocolError {
    return new ProtocolError("unknown message type");
  }
}

export function isCommunicationError(value: unknown): value is CommunicationError {
  return value instanceof CommunicationError;
}

function describePayload(payload: unknown): string {
  if (payload === null || payload === undefined) return "unknown error";
  if (typeof payload === "string") return payload;
  try {
    return JSON.stringify(payload);
  } catch {
    return String(payload);
  }
}
