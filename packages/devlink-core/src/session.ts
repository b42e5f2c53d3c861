// Device session: command/response correlation and message fan-out.
//
// A DeviceSession sits on a FrameTransport. It tags outgoing commands with
// correlation IDs, parks each caller on its own pending record until the
// matching response arrives, and hands unsolicited data and event messages
// to their subscribers.

import {
  type CommandParams,
  type DataMessage,
  type EventMessage,
  type RawMessage,
  type ResponseEnvelope,
  CommandTimeoutError,
  CommunicationError,
  DeviceDisconnectedError,
  InvalidResponseError,
  MessageKind,
  ProtocolError,
  checkResponseStatus,
  classify,
  createCommand,
  decode,
  encode,
  isRecord,
  isSuccess,
  validateDataMessage,
  validateEventMessage,
  validateResponse,
} from "@devlink/wire";
import { CommandIdAllocator } from "./allocator.ts";
import { type SessionConfig, requireTimeout, resolveConfig } from "./config.ts";
import { createLogger } from "./logger.ts";
import {
  type CommandContext,
  type CommandMiddleware,
  type CommandOutcome,
  type CommandRequest,
  Extensions,
} from "./middleware.ts";
import {
  type MessageListener,
  type Subscriber,
  type SubscriptionId,
  ALL_EVENTS,
  SubscriberRegistry,
} from "./subscribers.ts";
import type { ConnectionState, FrameTransport } from "./transport.ts";

const log = createLogger("session");

/** Command that starts an unsolicited data stream. */
export const STREAM_START_COMMAND = "stream_start";

/** Command that stops an unsolicited data stream. */
export const STREAM_STOP_COMMAND = "stream_stop";

/** Identity reported by the device in reply to the identity command. */
export type DeviceInfo = Record<string, unknown>;

export interface SessionOptions {
  /** Timeouts and identity command; unset fields take their defaults. */
  config?: Partial<SessionConfig>;

  /** Command middleware, applied in order (see CommandMiddleware). */
  middleware?: CommandMiddleware[];
}

/**
 * Bookkeeping for one outstanding command.
 *
 * The `settled` promise never rejects; failures travel as an outcome so a
 * record settled before its caller starts waiting is not an unhandled
 * rejection.
 */
class PendingCommand {
  readonly settled: Promise<CommandOutcome>;
  private resolveSettled: (outcome: CommandOutcome) => void = () => {};
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    readonly id: number,
    readonly command: string,
  ) {
    this.settled = new Promise((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  startTimer(timeoutMs: number, onTimeout: () => void): void {
    this.timer = setTimeout(onTimeout, timeoutMs);
  }

  settle(outcome: CommandOutcome): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.resolveSettled(outcome);
  }
}

function sendFailure(e: unknown): CommunicationError {
  if (e instanceof ProtocolError || e instanceof DeviceDisconnectedError) return e;
  const reason = e instanceof Error ? e.message : String(e);
  return new DeviceDisconnectedError(`error sending command: ${reason}`, e);
}

function asError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * A session with one device.
 *
 * @example
 * ```typescript
 * const session = new DeviceSession(transport);
 * if (await session.connect("/dev/ttyUSB0")) {
 *   const response = await session.sendCommand("ping", {}, 1000);
 *   session.registerDataCallback("spectrum", (msg) => plot(msg.data));
 *   await session.startDataStream("spectrum", { interval: 100 });
 * }
 * ```
 */
export class DeviceSession {
  private readonly transport: FrameTransport;
  private readonly config: SessionConfig;
  private readonly middleware: CommandMiddleware[];
  private readonly allocator = new CommandIdAllocator();
  private readonly pending = new Map<number, PendingCommand>();
  private readonly dataSubscribers = new SubscriberRegistry<DataMessage>("data");
  private readonly eventSubscribers = new SubscriberRegistry<EventMessage>("event");
  private deviceInfo: DeviceInfo = {};

  constructor(transport: FrameTransport, options: SessionOptions = {}) {
    this.transport = transport;
    this.config = resolveConfig(options.config);
    this.middleware = [...(options.middleware ?? [])];

    transport.registerDataCallback((frame) => this.handleFrame(frame));
    transport.registerStateCallback((state) => this.handleStateChange(state));
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  /**
   * Open the transport and query the device's identity.
   *
   * Returns false when the link cannot be opened or the identity query
   * fails. In the latter case the link stays open; the caller decides
   * whether to disconnect.
   */
  async connect(port?: string, baudRate?: number): Promise<boolean> {
    this.deviceInfo = {};
    try {
      if (!(await this.transport.connect(port, baudRate))) {
        return false;
      }
    } catch (e) {
      if (e instanceof CommunicationError) {
        log.error("connection error: %s", e.message);
        return false;
      }
      throw e;
    }
    return this.queryDeviceInfo();
  }

  /**
   * Release every caller waiting in sendCommand() with a
   * DeviceDisconnectedError, then close the transport.
   */
  async disconnect(): Promise<void> {
    this.failAllPending("disconnected while waiting for response");
    await this.transport.disconnect();
  }

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  getState(): ConnectionState {
    return this.transport.getState();
  }

  /** Copy of the identity cached by the last successful connect(). */
  getDeviceInfo(): DeviceInfo {
    return { ...this.deviceInfo };
  }

  /** Number of commands still waiting for a response. */
  pendingCount(): number {
    return this.pending.size;
  }

  private async queryDeviceInfo(): Promise<boolean> {
    const command = this.config.identityCommand;
    try {
      const response = await this.sendCommand(command, {}, this.config.identityTimeoutMs);
      if (!isSuccess(response)) {
        log.error("failed to get device information: %O", response.data);
        return false;
      }
      this.deviceInfo = isRecord(response.data) ? { ...response.data } : {};
      log.info("connected to device: %s", String(this.deviceInfo.name ?? "unknown"));
      return true;
    } catch (e) {
      if (e instanceof CommandTimeoutError) {
        log.error("timeout querying device information");
        return false;
      }
      if (e instanceof CommunicationError) {
        log.error("error querying device information: %s", e.message);
        return false;
      }
      throw e;
    }
  }

  private handleStateChange(state: ConnectionState): void {
    if (state === "disconnected" && this.pending.size > 0) {
      this.failAllPending("link closed while waiting for response");
    }
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Send a command and wait for its response.
   *
   * Responses are matched by ID, so concurrent commands may be answered in
   * any order. A response with a non-success status is returned, not
   * thrown; use call() to have it thrown.
   *
   * @throws DeviceDisconnectedError if not connected, if the write fails, or
   *   if the session disconnects while waiting
   * @throws CommandTimeoutError if no response arrives within `timeoutMs`
   * @throws InvalidResponseError if the device answers with a malformed response
   * @throws ConfigError if `timeoutMs` is not a usable timer delay
   */
  async sendCommand(
    name: string,
    params: CommandParams = {},
    timeoutMs: number = this.config.commandTimeoutMs,
  ): Promise<ResponseEnvelope> {
    requireTimeout("timeoutMs", timeoutMs);
    if (!this.transport.isConnected()) {
      throw new DeviceDisconnectedError();
    }

    const id = this.allocator.next((candidate) => this.pending.has(candidate));
    const record = new PendingCommand(id, name);
    this.pending.set(id, record);
    record.startTimer(timeoutMs, () => {
      if (this.finish(record, { ok: false, error: new CommandTimeoutError(name, id, timeoutMs) })) {
        log.warn("command timeout: %s (id=%d)", name, id);
      }
    });

    const ctx: CommandContext = { extensions: new Extensions() };
    const request: CommandRequest = { command: name, id, params: { ...params }, timeoutMs };

    try {
      await this.runPreHooks(ctx, request);
    } catch (e) {
      this.finish(record, { ok: false, error: asError(e) });
    }

    if (this.pending.get(id) === record) {
      try {
        await this.transport.sendData(encode(createCommand(name, request.params, id)));
        log.debug("sent command: %s (id=%d)", name, id);
      } catch (e) {
        const error = sendFailure(e);
        if (this.finish(record, { ok: false, error })) {
          log.error("error sending command %s: %s", name, error.message);
        }
      }
    }

    const outcome = await record.settled;
    await this.runPostHooks(ctx, request, outcome);

    if (!outcome.ok) {
      throw outcome.error;
    }
    const response = outcome.response;
    log.debug("received response for command %s (id=%d): %O", name, id, response);
    if (!isSuccess(response)) {
      log.warn("command %s failed with status %d: %O", name, response.status, response.data);
    }
    return response;
  }

  /**
   * Send a command and return its payload, throwing on a non-success status.
   *
   * @throws InvalidResponseError carrying the status code and payload
   */
  async call(
    name: string,
    params: CommandParams = {},
    timeoutMs: number = this.config.commandTimeoutMs,
  ): Promise<unknown> {
    const response = await this.sendCommand(name, params, timeoutMs);
    checkResponseStatus(response);
    return response.data;
  }

  /**
   * Ask the device to start streaming data messages of `type`.
   * Any failure, a throwing middleware hook included, is logged and reported as false.
   */
  async startDataStream(type: string, params: CommandParams = {}): Promise<boolean> {
    try {
      const response = await this.sendCommand(STREAM_START_COMMAND, { type, ...params });
      return isSuccess(response);
    } catch (e) {
      log.error("error starting data stream %s: %s", type, e instanceof Error ? e.message : String(e));
      return false;
    }
  }

  async stopDataStream(type: string): Promise<boolean> {
    try {
      const response = await this.sendCommand(STREAM_STOP_COMMAND, { type });
      return isSuccess(response);
    } catch (e) {
      log.error("error stopping data stream %s: %s", type, e instanceof Error ? e.message : String(e));
      return false;
    }
  }

  /**
   * Remove the record and settle it, unless something else got there first.
   * Every path out of a pending command goes through here.
   */
  private finish(record: PendingCommand, outcome: CommandOutcome): boolean {
    if (this.pending.get(record.id) !== record) {
      return false;
    }
    this.pending.delete(record.id);
    record.settle(outcome);
    return true;
  }

  private failAllPending(reason: string): void {
    for (const record of [...this.pending.values()]) {
      this.finish(record, { ok: false, error: new DeviceDisconnectedError(reason) });
    }
  }

  private async runPreHooks(ctx: CommandContext, request: CommandRequest): Promise<void> {
    for (const mw of this.middleware) {
      if (mw.pre) {
        await mw.pre(ctx, request);
      }
    }
  }

  private async runPostHooks(
    ctx: CommandContext,
    request: CommandRequest,
    outcome: CommandOutcome,
  ): Promise<void> {
    for (let i = this.middleware.length - 1; i >= 0; i--) {
      const mw = this.middleware[i];
      if (mw?.post) {
        try {
          await mw.post(ctx, request, outcome);
        } catch (e) {
          log.error("post hook failed for command %s: %O", request.command, e);
        }
      }
    }
  }

  // ==========================================================================
  // Subscriptions
  // ==========================================================================

  registerDataCallback(type: string, subscriber: Subscriber<DataMessage>): SubscriptionId {
    const id = this.dataSubscribers.register(type, subscriber);
    log.debug("registered callback %s for data type %s", id, type);
    return id;
  }

  unregisterDataCallback(id: SubscriptionId): boolean {
    const removed = this.dataSubscribers.unregister(id);
    if (!removed) log.warn("callback %s not found", id);
    return removed;
  }

  /** Register for events of `type`; the type "all" receives every event. */
  registerEventCallback(type: string, subscriber: Subscriber<EventMessage>): SubscriptionId {
    const id = this.eventSubscribers.register(type, subscriber);
    log.debug("registered callback %s for event type %s", id, type);
    return id;
  }

  unregisterEventCallback(id: SubscriptionId): boolean {
    const removed = this.eventSubscribers.unregister(id);
    if (!removed) log.warn("callback %s not found", id);
    return removed;
  }

  // ==========================================================================
  // Routing
  // ==========================================================================

  /**
   * Route one inbound frame. Runs on the transport's reader; nothing thrown
   * here concerns a caller, so every failure is logged and the frame dropped.
   */
  private handleFrame(frame: string): void {
    const text = frame.trim();
    if (!text) return;

    if (!text.startsWith("{")) {
      // Console output from the device firmware
      if (/error|warning/i.test(text)) {
        log.warn("device output: %s", text);
      } else {
        log.debug("device output: %s", text);
      }
      return;
    }

    let message: RawMessage;
    try {
      message = decode(text);
    } catch (e) {
      if (!(e instanceof ProtocolError)) throw e;
      log.debug("dropping malformed frame: %s", e.message);
      return;
    }

    let kind: MessageKind;
    try {
      kind = classify(message);
    } catch (e) {
      if (!(e instanceof ProtocolError)) throw e;
      log.warn("dropping frame: %s", e.message);
      return;
    }

    switch (kind) {
      case MessageKind.Response:
        this.handleResponse(message);
        break;
      case MessageKind.Data:
        this.handleDataMessage(message);
        break;
      case MessageKind.Event:
        this.handleEventMessage(message);
        break;
      case MessageKind.Command:
        log.warn("received unexpected command from device: %s", text);
        break;
    }
  }

  private handleResponse(message: RawMessage): void {
    let response: ResponseEnvelope;
    try {
      validateResponse(message);
      response = message;
    } catch (e) {
      if (!(e instanceof ProtocolError)) throw e;
      const record = typeof message.id === "number" ? this.pending.get(message.id) : undefined;
      if (record && this.finish(record, { ok: false, error: InvalidResponseError.malformed(e) })) {
        log.warn("invalid response for command %s (id=%d): %s", record.command, record.id, e.message);
      } else {
        log.warn("invalid response: %s", e.message);
      }
      return;
    }

    const record = this.pending.get(response.id);
    if (!record || !this.finish(record, { ok: true, response })) {
      log.warn("received response for unknown command ID: %d", response.id);
    }
  }

  private handleDataMessage(message: RawMessage): void {
    let data: DataMessage;
    try {
      validateDataMessage(message);
      data = message;
    } catch (e) {
      if (!(e instanceof ProtocolError)) throw e;
      log.warn("invalid data message: %s", e.message);
      return;
    }

    const listeners = this.dataSubscribers.snapshot(data.type);
    if (listeners.length === 0) {
      log.debug("received data of type %s but no callbacks registered", data.type);
      return;
    }
    this.deliver(data, listeners);
  }

  private handleEventMessage(message: RawMessage): void {
    let event: EventMessage;
    try {
      validateEventMessage(message);
      event = message;
    } catch (e) {
      if (!(e instanceof ProtocolError)) throw e;
      log.warn("invalid event message: %s", e.message);
      return;
    }

    log.info("received event: %s", event.type);
    const listeners = this.eventSubscribers.snapshot(event.type, ALL_EVENTS);
    if (listeners.length === 0) {
      log.debug("received event of type %s but no callbacks registered", event.type);
      return;
    }
    this.deliver(event, listeners);
  }

  /** Invoke each listener; one failing listener never stops the others. */
  private deliver<M>(message: M, listeners: Array<[SubscriptionId, MessageListener<M>]>): void {
    for (const [id, listener] of listeners) {
      try {
        const result = listener.onMessage(message);
        if (result instanceof Promise) {
          result.catch((e: unknown) => log.error("error in callback %s: %O", id, e));
        }
      } catch (e) {
        log.error("error in callback %s: %O", id, e);
      }
    }
  }
}
