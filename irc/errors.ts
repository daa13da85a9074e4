/**
 * Error hierarchy for the IRC client.
 *
 * Every error extends IRCError and carries a `.code` discriminant so callers
 * can switch on it instead of matching messages.
 *
 * @example
 * ```ts
 * try {
 *   await client.connect();
 * } catch (e) {
 *   if (isErrorCode(e, "INVALID_CONFIG")) console.error(e.issues);
 * }
 * ```
 */

/** Union of all error codes for exhaustive switch handling. */
export type IRCErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_TARGET"
  | "NOT_CONNECTED"
  | "DISCONNECTED"
  | "ALREADY_CONNECTING"
  | "DECODE_FAILED"
  | "ENCODE_FAILED"
  | "TRACKING_DISABLED"
  | "ABORTED";

/** Base error for all client errors. */
export class IRCError extends Error {
  readonly code: IRCErrorCode;
  readonly cause?: Error;

  constructor(code: IRCErrorCode, message: string, opts?: { cause?: Error }) {
    super(message);
    this.code = code;
    this.name = "IRCError";
    if (opts?.cause) this.cause = opts.cause;
  }
}

/** Client configuration failed validation. Never retried. */
export class ConfigError extends IRCError {
  readonly code = "INVALID_CONFIG" as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CONFIG", `invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** A channel, nickname or user passed to a command builder is invalid. */
export class InvalidTargetError extends IRCError {
  readonly code = "INVALID_TARGET" as const;
  readonly target: string;

  constructor(target: string) {
    super("INVALID_TARGET", `invalid target: ${target}`);
    this.name = "InvalidTargetError";
    this.target = target;
  }
}

export class NotConnectedError extends IRCError {
  readonly code = "NOT_CONNECTED" as const;

  constructor() {
    super("NOT_CONNECTED", "client is not connected to server");
    this.name = "NotConnectedError";
  }
}

/** Reconnection was not attempted, or gave up. */
export class DisconnectedError extends IRCError {
  readonly code = "DISCONNECTED" as const;

  constructor(message = "unexpectedly disconnected") {
    super("DISCONNECTED", message);
    this.name = "DisconnectedError";
  }
}

/** A reconnect sequence is already running. */
export class AlreadyConnectingError extends IRCError {
  readonly code = "ALREADY_CONNECTING" as const;

  constructor() {
    super("ALREADY_CONNECTING", "a connection attempt is already occurring");
    this.name = "AlreadyConnectingError";
  }
}

export class DecodeError extends IRCError {
  readonly code = "DECODE_FAILED" as const;

  constructor(message: string, opts?: { cause?: Error }) {
    super("DECODE_FAILED", message, opts);
    this.name = "DecodeError";
  }
}

export class EncodeError extends IRCError {
  readonly code = "ENCODE_FAILED" as const;

  constructor(message: string, opts?: { cause?: Error }) {
    super("ENCODE_FAILED", message, opts);
    this.name = "EncodeError";
  }
}

/**
 * A tracking query was made after tracking was disabled. This is a contract
 * violation by the caller and is not meant to be caught and recovered from.
 */
export class TrackingDisabledError extends IRCError {
  readonly code = "TRACKING_DISABLED" as const;
  readonly method: string;

  constructor(method: string) {
    super("TRACKING_DISABLED", `${method}() used when tracking is disabled`);
    this.name = "TrackingDisabledError";
    this.method = method;
  }
}

/** A wait was cancelled through its AbortSignal. */
export class AbortError extends IRCError {
  readonly code = "ABORTED" as const;

  constructor(message = "Operation aborted") {
    super("ABORTED", message);
    this.name = "AbortError";
  }
}

/** Narrow any caught value to an {@link IRCError}. */
export function isIRCError(err: unknown): err is IRCError {
  return err instanceof IRCError;
}

/** Narrow to a specific error by code. */
export function isErrorCode<C extends IRCErrorCode>(
  err: unknown,
  code: C
): err is IRCError & { code: C } {
  return err instanceof IRCError && err.code === code;
}

/** Coerce a caught value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
