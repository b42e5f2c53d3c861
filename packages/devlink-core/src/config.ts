// Session configuration.
//
// Every field has a default; callers pass only what they want to change.
// configFromEnv() reads the same fields from DEVLINK_* variables.

/** Configuration of a device session and the transport underneath it. */
export interface SessionConfig {
  /** Serial port path. null lets the transport auto-detect. */
  port: string | null;

  /** Line speed. Default: 115200 */
  baudRate: number;

  /** Default deadline for sendCommand(). Default: 5000 */
  commandTimeoutMs: number;

  /** Deadline for the identity query issued by connect(). Default: 2000 */
  identityTimeoutMs: number;

  /** Command that returns the device's identity. Default: "get_info" */
  identityCommand: string;

  /** Bound on waiting for the link to close. Default: 1000 */
  disconnectTimeoutMs: number;

  /** Longest partial line kept while waiting for its terminator. Default: 65536 */
  maxLineLength: number;
}

export const DEFAULT_CONFIG: Readonly<SessionConfig> = {
  port: null,
  baudRate: 115200,
  commandTimeoutMs: 5000,
  identityTimeoutMs: 2000,
  identityCommand: "get_info",
  disconnectTimeoutMs: 1000,
  maxLineLength: 65536,
};

/** Error thrown for invalid configuration values. */
export class ConfigError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(field, `${field} must be a positive integer, got ${value}`);
  }
}

/** Longest delay a timer can hold; larger values fire at once. */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, `${field} must be a positive number, got ${value}`);
  }
}

/**
 * Check a timeout in milliseconds.
 *
 * @throws ConfigError unless 0 < value <= MAX_TIMEOUT_MS
 */
export function requireTimeout(field: string, value: number): void {
  requirePositive(field, value);
  if (value > MAX_TIMEOUT_MS) {
    throw new ConfigError(field, `${field} must be at most ${MAX_TIMEOUT_MS}, got ${value}`);
  }
}

/**
 * Fill in defaults and check every value.
 *
 * @throws ConfigError naming the first invalid field
 */
export function resolveConfig(input: Partial<SessionConfig> = {}): SessionConfig {
  const config: SessionConfig = {
    port: input.port ?? DEFAULT_CONFIG.port,
    baudRate: input.baudRate ?? DEFAULT_CONFIG.baudRate,
    commandTimeoutMs: input.commandTimeoutMs ?? DEFAULT_CONFIG.commandTimeoutMs,
    identityTimeoutMs: input.identityTimeoutMs ?? DEFAULT_CONFIG.identityTimeoutMs,
    identityCommand: input.identityCommand ?? DEFAULT_CONFIG.identityCommand,
    disconnectTimeoutMs: input.disconnectTimeoutMs ?? DEFAULT_CONFIG.disconnectTimeoutMs,
    maxLineLength: input.maxLineLength ?? DEFAULT_CONFIG.maxLineLength,
  };

  if (config.port !== null && config.port.trim() === "") {
    throw new ConfigError("port", "port must be a non-empty path or null");
  }
  requirePositiveInteger("baudRate", config.baudRate);
  requireTimeout("commandTimeoutMs", config.commandTimeoutMs);
  requireTimeout("identityTimeoutMs", config.identityTimeoutMs);
  requireTimeout("disconnectTimeoutMs", config.disconnectTimeoutMs);
  requirePositiveInteger("maxLineLength", config.maxLineLength);
  if (config.identityCommand.trim() === "") {
    throw new ConfigError("identityCommand", "identityCommand must not be empty");
  }
  return config;
}

/** Environment variables read by configFromEnv(). */
export const ENV_VARS = {
  port: "DEVLINK_PORT",
  baudRate: "DEVLINK_BAUD_RATE",
  commandTimeoutMs: "DEVLINK_COMMAND_TIMEOUT_MS",
  identityTimeoutMs: "DEVLINK_IDENTITY_TIMEOUT_MS",
} as const;

function readNumber(env: Record<string, string | undefined>, name: string, field: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(field, `${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Read configuration overrides from the environment.
 *
 * Unset and empty variables are left out, so the result can be passed
 * straight to resolveConfig().
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): Partial<SessionConfig> {
  const config: Partial<SessionConfig> = {};

  const port = env[ENV_VARS.port]?.trim();
  if (port) config.port = port;

  const baudRate = readNumber(env, ENV_VARS.baudRate, "baudRate");
  if (baudRate !== undefined) config.baudRate = baudRate;

  const commandTimeoutMs = readNumber(env, ENV_VARS.commandTimeoutMs, "commandTimeoutMs");
  if (commandTimeoutMs !== undefined) config.commandTimeoutMs = commandTimeoutMs;

  const identityTimeoutMs = readNumber(env, ENV_VARS.identityTimeoutMs, "identityTimeoutMs");
  if (identityTimeoutMs !== undefined) config.identityTimeoutMs = identityTimeoutMs;

  return config;
}
