// Serial link: the byte pipe underneath SerialTransport.

import { SerialPort } from "serialport";

/** Receives what the link produces once open. */
export interface LinkListener {
  onData(chunk: Uint8Array): void;
  onError(error: Error): void;
  /** The link closed, whether asked to or not. */
  onClose(): void;
}

export interface LinkOptions {
  path: string;
  baudRate: number;
}

/** A raw serial connection. Framing and state live in SerialTransport. */
export interface SerialLink {
  readonly isOpen: boolean;

  /** @throws Error from the OS when the port cannot be opened */
  open(listener: LinkListener): Promise<void>;

  /** Resolves once the bytes have been drained to the device. */
  write(data: Uint8Array): Promise<void>;

  close(): Promise<void>;
}

export type LinkFactory = (options: LinkOptions) => SerialLink;

/** SerialLink over the `serialport` package: 8 data bits, no parity, 1 stop bit. */
export class NodeSerialLink implements SerialLink {
  private port: SerialPort;

  constructor(options: LinkOptions) {
    this.port = new SerialPort({
      path: options.path,
      baudRate: options.baudRate,
      dataBits: 8,
      parity: "none",
      stopBits: 1,
      autoOpen: false,
    });
  }

  get isOpen(): boolean {
    return this.port.isOpen;
  }

  open(listener: LinkListener): Promise<void> {
    this.port.on("data", (chunk: Buffer) => listener.onData(chunk));
    this.port.on("error", (err: Error) => listener.onError(err));
    this.port.on("close", () => listener.onClose());

    return new Promise<void>((resolve, reject) => {
      this.port.open((err) => {
        if (err) {
          this.port.removeAllListeners();
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  write(data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.port.write(Buffer.from(data), (err) => {
        if (err) {
          reject(err);
          return;
        }
        this.port.drain((drainErr) => {
          if (drainErr) reject(drainErr);
          else resolve();
        });
      });
    });
  }

  close(): Promise<void> {
    if (!this.port.isOpen) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.port.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

export const nodeLinkFactory: LinkFactory = (options) => new NodeSerialLink(options);
