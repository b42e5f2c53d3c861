// Logging middleware for device sessions.
//
// Logs every command and its outcome with timing information, through a
// `debug` namespace (like the rest of devlink's logging).

import createDebug from "debug";
import { CommunicationError } from "@devlink/wire";
import type { CommandContext, CommandMiddleware, CommandOutcome, CommandRequest } from "./middleware.ts";

const START_TIME = Symbol("logging:start-time");

/** Where log lines go: a message plus a structured object. */
export type LogSink = (message: string, data: Record<string, unknown>) => void;

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "devlink:commands".
   * Logging is enabled when DEBUG matches this namespace.
   */
  namespace?: string;

  /**
   * Log command parameters. Defaults to true.
   */
  logParams?: boolean;

  /**
   * Log response payloads. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log. Faster commands are skipped.
   * Defaults to 0 (log every command).
   */
  minDuration?: number;

  /**
   * Custom sink. Defaults to a `debug` instance for `namespace`.
   */
  log?: LogSink;
}

/**
 * Create a middleware that logs every command with timing information.
 *
 * Logs structured objects:
 * - Request: { type: "request", command, id, params? }
 * - Response: { type: "response", command, id, duration, ok, status?, result?, error? }
 *
 * @example
 * ```typescript
 * const session = new DeviceSession(transport, {
 *   middleware: [loggingMiddleware({ minDuration: 50 })],
 * });
 * // DEBUG=devlink:commands shows "→ get_info" / "← get_info: ✓ 12.40ms"
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): CommandMiddleware {
  const namespace = options.namespace ?? "devlink:commands";
  const logParams = options.logParams ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;
  const log: LogSink = options.log ?? createDebug(namespace);

  return {
    pre(ctx: CommandContext, request: CommandRequest): void {
      ctx.extensions.set(START_TIME, performance.now());

      const logObj: Record<string, unknown> = {
        type: "request",
        command: request.command,
        id: request.id,
      };

      if (logParams && Object.keys(request.params).length > 0) {
        logObj.params = request.params;
      }

      log(`→ ${request.command}`, logObj);
    },

    post(ctx: CommandContext, request: CommandRequest, outcome: CommandOutcome): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        command: request.command,
        id: request.id,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        logObj.status = outcome.response.status;
        if (logResults && outcome.response.data !== undefined) {
          logObj.result = outcome.response.data;
        }
        log(`← ${request.command}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      logObj.ok = false;
      const error = outcome.error;
      if (error instanceof CommunicationError) {
        logObj.error = { name: error.name, kind: error.kind, message: error.message };
      } else {
        logObj.error = { name: error.name, message: error.message };
      }
      log(`← ${request.command}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}
