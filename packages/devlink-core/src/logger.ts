// Namespaced diagnostic logging.
//
// Built on the `debug` package: nothing is printed unless the namespace is
// enabled, through the DEBUG environment variable or enableLogging().
//
//   DEBUG=devlink:*                            everything
//   DEBUG=devlink:session:*                    one component
//   DEBUG=devlink:*:warn,devlink:*:error       problems only

import createDebug from "debug";

export const LOG_ROOT = "devlink";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFn = (formatter: string, ...args: unknown[]) => void;

export interface Logger {
  readonly namespace: string;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/** Create a logger whose levels live under `devlink:<scope>:<level>`. */
export function createLogger(scope: string): Logger {
  const namespace = `${LOG_ROOT}:${scope}`;
  return {
    namespace,
    debug: createDebug(`${namespace}:debug`),
    info: createDebug(`${namespace}:info`),
    warn: createDebug(`${namespace}:warn`),
    error: createDebug(`${namespace}:error`),
  };
}

/** Enable namespaces, replacing whatever DEBUG enabled. Supports `*` and `-exclusions`. */
export function enableLogging(patterns: string): void {
  createDebug.enable(patterns);
}

/** Disable all logging and return the patterns that were enabled. */
export function disableLogging(): string {
  return createDebug.disable();
}

export function isLoggingEnabled(scope: string, level: LogLevel): boolean {
  return createDebug.enabled(`${LOG_ROOT}:${scope}:${level}`);
}
