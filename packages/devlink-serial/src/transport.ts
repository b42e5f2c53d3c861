// Serial transport for devlink sessions.

import {
  type ConnectionState,
  type FrameCallback,
  type FrameTransport,
  type SessionConfig,
  type StateCallback,
  CommunicationError,
  DeviceDisconnectedError,
  createLogger,
  resolveConfig,
} from "@devlink/core";
import { LineFramer } from "./framing.ts";
import { type LinkFactory, type SerialLink, nodeLinkFactory } from "./link.ts";
import { detectDevicePort } from "./ports.ts";

const log = createLogger("serial");

export interface SerialTransportOptions {
  /** Port, baud rate, close deadline and line bound; unset fields take their defaults. */
  config?: Partial<SessionConfig>;

  /** Opens the link. Defaults to NodeSerialLink. */
  linkFactory?: LinkFactory;

  /** Auto-detection used when connect() is given no port. */
  detectPort?: () => Promise<string | null>;
}

function reasonOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * FrameTransport over a serial port.
 *
 * Reading is event driven: each chunk from the link goes through a
 * LineFramer and every finished line is handed to the frame callback.
 * Writes are queued so two frames never interleave on the wire.
 *
 * @example
 * ```typescript
 * const transport = new SerialTransport({ config: { baudRate: 921600 } });
 * await transport.connect("/dev/ttyUSB0");
 * transport.registerDataCallback((line) => console.log(line));
 * await transport.sendData('{"cmd":"ping","id":1,"params":{}}\n');
 * ```
 */
export class SerialTransport implements FrameTransport {
  private readonly config: SessionConfig;
  private readonly linkFactory: LinkFactory;
  private readonly detectPort: () => Promise<string | null>;
  private readonly encoder = new TextEncoder();
  private framer: LineFramer;

  private link: SerialLink | null = null;
  private portPath: string | null = null;
  private state: ConnectionState = "disconnected";
  private readerAlive = false;
  private sendChain: Promise<void> = Promise.resolve();

  private frameCallback: FrameCallback | null = null;
  private stateCallback: StateCallback | null = null;

  constructor(options: SerialTransportOptions = {}) {
    this.config = resolveConfig(options.config);
    this.linkFactory = options.linkFactory ?? nodeLinkFactory;
    this.detectPort = options.detectPort ?? (() => detectDevicePort());
    this.framer = new LineFramer(this.config.maxLineLength);
  }

  /** Path of the open port, or null. */
  get port(): string | null {
    return this.portPath;
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  /**
   * Open the port. An open connection is closed first.
   *
   * The port is the explicit argument, else an auto-detected one, else the
   * configured default.
   *
   * @throws CommunicationError if no port can be found or the port fails to open
   */
  async connect(port?: string, baudRate?: number): Promise<boolean> {
    if (this.state !== "disconnected") {
      await this.disconnect();
    }

    const path = port ?? (await this.detectPort()) ?? this.config.port;
    if (!path) {
      throw new CommunicationError("no port specified and auto-detection failed");
    }
    const rate = baudRate ?? this.config.baudRate;

    this.setState("connecting");
    this.framer = new LineFramer(this.config.maxLineLength);

    let link: SerialLink;
    try {
      link = this.linkFactory({ path, baudRate: rate });
    } catch (e) {
      this.setState("disconnected");
      throw new CommunicationError(`failed to open ${path}: ${reasonOf(e)}`, e);
    }
    this.link = link;

    try {
      await link.open({
        onData: (chunk) => this.handleChunk(link, chunk),
        onError: (err) => this.handleLinkError(link, err),
        onClose: () => this.handleLinkClose(link),
      });
    } catch (e) {
      if (this.link === link) {
        this.link = null;
        this.setState("disconnected");
      }
      throw new CommunicationError(`failed to open ${path}: ${reasonOf(e)}`, e);
    }

    if (this.link !== link) {
      // disconnect() ran while the port was opening
      await link.close().catch((e: unknown) => log.debug("error closing abandoned link: %s", reasonOf(e)));
      return false;
    }

    this.portPath = path;
    this.readerAlive = true;
    this.setState("connected");
    log.info("connected to %s at %d baud", path, rate);
    return true;
  }

  /** Stop reading and close the port, waiting at most disconnectTimeoutMs. */
  async disconnect(): Promise<void> {
    const link = this.link;
    this.link = null;
    this.readerAlive = false;
    this.framer.reset();

    if (link) {
      try {
        const closed = await this.closeWithin(link, this.config.disconnectTimeoutMs);
        if (!closed) {
          log.warn("timed out closing %s", this.portPath ?? "serial port");
        }
      } catch (e) {
        log.warn("error closing %s: %s", this.portPath ?? "serial port", reasonOf(e));
      }
      log.info("disconnected from %s", this.portPath ?? "serial port");
    }

    this.portPath = null;
    this.setState("disconnected");
  }

  isConnected(): boolean {
    return this.state === "connected" && this.readerAlive && this.link?.isOpen === true;
  }

  getState(): ConnectionState {
    return this.state;
  }

  private async closeWithin(link: SerialLink, timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([link.close().then((): boolean => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private setState(state: ConnectionState): void {
    if (this.state === state) return;
    this.state = state;
    try {
      this.stateCallback?.(state);
    } catch (e) {
      log.error("error in state callback: %O", e);
    }
  }

  // ==========================================================================
  // Sending
  // ==========================================================================

  /** @throws DeviceDisconnectedError if not connected or the write fails */
  sendData(text: string): Promise<void> {
    return this.sendBinary(this.encoder.encode(text));
  }

  /** @throws DeviceDisconnectedError if not connected or the write fails */
  sendBinary(data: Uint8Array): Promise<void> {
    const write = this.sendChain.then(() => this.write(data));
    // The caller sees a failure through `write`; the queue moves on.
    this.sendChain = write.catch(() => undefined);
    return write;
  }

  private async write(data: Uint8Array): Promise<void> {
    const link = this.link;
    if (!link || !this.isConnected()) {
      throw new DeviceDisconnectedError();
    }
    try {
      await link.write(data);
    } catch (e) {
      log.error("write to %s failed: %s", this.portPath ?? "serial port", reasonOf(e));
      throw new DeviceDisconnectedError(`write failed: ${reasonOf(e)}`, e);
    }
  }

  // ==========================================================================
  // Receiving
  // ==========================================================================

  registerDataCallback(callback: FrameCallback): void {
    this.frameCallback = callback;
  }

  unregisterDataCallback(): void {
    this.frameCallback = null;
  }

  registerStateCallback(callback: StateCallback): void {
    this.stateCallback = callback;
  }

  unregisterStateCallback(): void {
    this.stateCallback = null;
  }

  private handleChunk(link: SerialLink, chunk: Uint8Array): void {
    if (link !== this.link || !this.readerAlive) return;

    for (const frame of this.framer.push(chunk)) {
      const callback = this.frameCallback;
      if (!callback) continue;
      try {
        callback(frame);
      } catch (e) {
        log.error("error in frame callback: %O", e);
      }
    }
  }

  private handleLinkError(link: SerialLink, err: Error): void {
    if (link !== this.link) return;
    log.error("serial link error on %s: %s", this.portPath ?? "serial port", err.message);
    this.markReaderDead(link);
  }

  private handleLinkClose(link: SerialLink): void {
    if (link !== this.link) return;
    log.warn("serial link %s closed unexpectedly", this.portPath ?? "serial port");
    this.markReaderDead(link);
  }

  private markReaderDead(link: SerialLink): void {
    this.link = null;
    this.readerAlive = false;
    this.framer.reset();
    this.portPath = null;
    if (link.isOpen) {
      link.close().catch((e: unknown) => log.debug("error closing dead link: %s", reasonOf(e)));
    }
    this.setState("disconnected");
  }
}
