// Newline framing for serial byte streams.
//
// The device writes one JSON object per line. Chunks arrive split at
// arbitrary byte offsets, multi-byte UTF-8 sequences included.

import { createLogger } from "@devlink/core";

const log = createLogger("serial");

/**
 * Turns a stream of byte chunks into text frames.
 *
 * Invalid UTF-8 decodes to U+FFFD rather than failing. A partial line that
 * grows past `maxLineLength` is discarded up to its terminator.
 */
export class LineFramer {
  private decoder = new TextDecoder("utf-8");
  private buf = "";
  private discarding = false;

  constructor(private readonly maxLineLength = 65536) {}

  /** Feed one chunk; returns the complete, non-blank frames it finished. */
  push(chunk: Uint8Array): string[] {
    this.buf += this.decoder.decode(chunk, { stream: true });
    return this.processBuffer();
  }

  /** Number of buffered characters waiting for a terminator. */
  get buffered(): number {
    return this.buf.length;
  }

  /** Drop buffered text and any half-decoded byte sequence. */
  reset(): void {
    this.decoder = new TextDecoder("utf-8");
    this.buf = "";
    this.discarding = false;
  }

  private processBuffer(): string[] {
    const frames: string[] = [];
    while (true) {
      const end = this.buf.indexOf("\n");
      if (end < 0) break;

      const line = this.buf.slice(0, end).trim();
      this.buf = this.buf.slice(end + 1);
      if (this.discarding) {
        this.discarding = false;
        continue;
      }
      if (line) frames.push(line);
    }

    if (this.buf.length > this.maxLineLength) {
      if (!this.discarding) {
        log.warn("discarding line longer than %d characters", this.maxLineLength);
      }
      this.buf = "";
      this.discarding = true;
    }
    return frames;
  }
}
