// Command middleware for device sessions.
//
// Middleware can intercept commands before they are written and observe
// their outcome, enabling command logging, timing and parameter rewriting.

import type { CommandParams, ResponseEnvelope } from "@devlink/wire";

/**
 * Extensions provide symbol-keyed storage for middleware state.
 *
 * Each middleware defines its own symbol and keeps per-command data under
 * it without clashing with other middleware.
 *
 * @example
 * ```typescript
 * const STARTED = Symbol("started");
 * ctx.extensions.set(STARTED, Date.now());
 * const started = ctx.extensions.get<number>(STARTED);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }

  has(key: symbol): boolean {
    return this.data.has(key);
  }

  delete(key: symbol): boolean {
    return this.data.delete(key);
  }
}

/** State shared by the pre and post hooks of a single command. */
export interface CommandContext {
  extensions: Extensions;
}

/**
 * An outgoing command as middleware sees it.
 *
 * `params` may be replaced or modified in `pre`; the change is what gets
 * written to the wire.
 */
export interface CommandRequest {
  /** Command name, e.g. "get_info". */
  readonly command: string;

  /** Correlation ID allocated for this command. */
  readonly id: number;

  params: CommandParams;

  readonly timeoutMs: number;
}

/** How a command ended. */
export type CommandOutcome =
  | { ok: true; response: ResponseEnvelope }
  | { ok: false; error: Error };

/**
 * Command middleware.
 *
 * `pre` hooks run in registration order before the command is written;
 * throwing from one aborts the command with that error. `post` hooks run
 * in reverse order once the command has settled (onion model).
 */
export interface CommandMiddleware {
  pre?(ctx: CommandContext, request: CommandRequest): Promise<void> | void;

  /** Observes the outcome. Errors thrown here are logged and ignored. */
  post?(ctx: CommandContext, request: CommandRequest, outcome: CommandOutcome): Promise<void> | void;
}
