/**
 * Frame transport abstraction.
 *
 * This module defines the FrameTransport interface that DeviceSession is
 * written against. A frame transport owns the physical link and turns its
 * byte stream into newline-delimited text frames.
 *
 * Implementations:
 * - SerialTransport (devlink-serial) for serial ports
 */

/** Link state. Moves disconnected → connecting → connected, and back to disconnected. */
export type ConnectionState = "disconnected" | "connecting" | "connected";

/** Receives one complete frame, terminator stripped, never blank. */
export type FrameCallback = (frame: string) => void;

export type StateCallback = (state: ConnectionState) => void;

/**
 * Interface for transports that carry devlink frames.
 *
 * Only one frame callback and one state callback are held at a time;
 * registering again replaces the previous one.
 */
export interface FrameTransport {
  /**
   * Open the link and start reading.
   *
   * Falls back to the transport's configured port and baud rate when the
   * arguments are omitted.
   *
   * @throws CommunicationError if the link cannot be opened
   */
  connect(port?: string, baudRate?: number): Promise<boolean>;

  /** Stop reading and close the link. Safe to call when already disconnected. */
  disconnect(): Promise<void>;

  /** True only while the link is open and the reader is alive. */
  isConnected(): boolean;

  getState(): ConnectionState;

  /**
   * Write text to the link. Concurrent writes never interleave.
   *
   * @throws DeviceDisconnectedError if not connected or the write fails
   */
  sendData(text: string): Promise<void>;

  /** Write raw bytes, with the same guarantees as sendData. */
  sendBinary(data: Uint8Array): Promise<void>;

  registerDataCallback(callback: FrameCallback): void;
  unregisterDataCallback(): void;

  registerStateCallback(callback: StateCallback): void;
  unregisterStateCallback(): void;
}
