// Structural validation of decoded messages.
//
// Each validator is an assertion: on return the message is narrowed to its
// envelope type, otherwise a ProtocolError names the offending field.

import { isRecord, hasDataMarker } from "./codec.ts";
import { InvalidResponseError, ProtocolError } from "./errors.ts";
import {
  type CommandEnvelope,
  type DataMessage,
  type EventMessage,
  type RawMessage,
  type ResponseEnvelope,
  type ResponseKind,
  RESPONSE_KINDS,
  StatusCode,
} from "./types.ts";

function requireObject(shape: string, message: unknown): RawMessage {
  if (!isRecord(message)) {
    throw new ProtocolError(`${shape} must be a JSON object`);
  }
  return message;
}

function requireField(shape: string, message: RawMessage, field: string): unknown {
  if (!(field in message)) {
    throw ProtocolError.missingField(shape, field);
  }
  return message[field];
}

function requireInteger(shape: string, message: RawMessage, field: string): void {
  if (!Number.isInteger(requireField(shape, message, field))) {
    throw ProtocolError.invalidField(shape, field, "an integer");
  }
}

function requireString(shape: string, message: RawMessage, field: string): void {
  if (typeof requireField(shape, message, field) !== "string") {
    throw ProtocolError.invalidField(shape, field, "a string");
  }
}

function optionalNumber(shape: string, message: RawMessage, field: string): void {
  if (field in message && typeof message[field] !== "number") {
    throw ProtocolError.invalidField(shape, field, "a number");
  }
}

function isResponseKind(value: unknown): value is ResponseKind {
  return RESPONSE_KINDS.some((kind) => kind === value);
}

export function validateCommand(message: unknown): asserts message is CommandEnvelope {
  const msg = requireObject("command", message);
  requireString("command", msg, "cmd");
  requireInteger("command", msg, "id");
  if ("params" in msg && !isRecord(msg.params)) {
    throw ProtocolError.invalidField("command", "params", "an object");
  }
}

export function validateResponse(message: unknown): asserts message is ResponseEnvelope {
  const msg = requireObject("response", message);
  requireString("response", msg, "resp");
  if (!isResponseKind(msg.resp)) {
    throw new ProtocolError(`invalid response type: ${String(msg.resp)}`, "resp");
  }
  requireInteger("response", msg, "id");
  requireInteger("response", msg, "status");
}

export function validateDataMessage(message: unknown): asserts message is DataMessage {
  const msg = requireObject("data message", message);
  if (!hasDataMarker(msg)) {
    throw new ProtocolError('data message is missing the "data" marker', "data");
  }
  requireString("data message", msg, "type");
  optionalNumber("data message", msg, "timestamp");
}

export function validateEventMessage(message: unknown): asserts message is EventMessage {
  const msg = requireObject("event message", message);
  if (msg.event !== true) {
    throw new ProtocolError('event message field "event" must be true', "event");
  }
  requireString("event message", msg, "type");
  optionalNumber("event message", msg, "timestamp");
}

// ============================================================================
// Status
// ============================================================================

export function isSuccess(response: ResponseEnvelope): boolean {
  return response.status === StatusCode.SUCCESS;
}

/**
 * Throw unless the response reports success.
 *
 * @throws InvalidResponseError carrying the status code and payload
 */
export function checkResponseStatus(response: ResponseEnvelope): void {
  if (!isSuccess(response)) {
    throw InvalidResponseError.status(response.status, response.data);
  }
}
