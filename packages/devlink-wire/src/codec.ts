// Wire codec for devlink messages.
//
// A frame is one JSON object terminated by a single "\n". The framing layer
// strips the terminator before `decode` sees the text.

import { ProtocolError } from "./errors.ts";
import { type Envelope, type RawMessage, MessageKind } from "./types.ts";

/** Frame terminator. */
export const FRAME_TERMINATOR = "\n";

export function isRecord(value: unknown): value is RawMessage {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Encoding/Decoding
// ============================================================================

/**
 * Encode an envelope to its wire text, terminator included.
 *
 * @throws ProtocolError if the envelope holds values JSON cannot represent
 */
export function encode(envelope: Envelope): string {
  let text: string;
  try {
    text = JSON.stringify(envelope);
  } catch (e) {
    throw new ProtocolError(`failed to encode message: ${e instanceof Error ? e.message : String(e)}`, null, e);
  }
  return text + FRAME_TERMINATOR;
}

/**
 * Decode one frame of wire text.
 *
 * The result is only known to be a JSON object; use `classify` and the
 * validators to narrow it.
 *
 * @throws ProtocolError if the text is not a JSON object
 */
export function decode(text: string): RawMessage {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    throw ProtocolError.invalidJson(e);
  }
  if (!isRecord(value)) {
    throw ProtocolError.notAnObject();
  }
  return value;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Whether a message carries the data marker.
 *
 * The marker and the payload share the `data` key, and the device's JSON
 * serializer keeps only the payload. So either `data` is literally `true`,
 * or `data` sits next to a string `type` on a message that is not an event.
 */
export function hasDataMarker(message: RawMessage): boolean {
  if (message.data === true) return true;
  return "data" in message && typeof message.type === "string" && message.event !== true;
}

export function hasEventMarker(message: RawMessage): boolean {
  return message.event === true;
}

/**
 * Determine which of the four shapes a decoded message has.
 *
 * Precedence is fixed: `cmd`, then `resp`, then the data marker, then the
 * event marker. A message carrying several markers classifies by this
 * order alone.
 *
 * @throws ProtocolError("unknown message type") when nothing matches
 */
export function classify(message: RawMessage): MessageKind {
  if ("cmd" in message) return MessageKind.Command;
  if ("resp" in message) return MessageKind.Response;
  if (hasDataMarker(message)) return MessageKind.Data;
  if (hasEventMarker(message)) return MessageKind.Event;
  throw ProtocolError.unknownType();
}
