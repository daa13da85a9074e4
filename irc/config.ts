/**
 * IRC client configuration
 */
import type { Duplex } from "stream";
import type { ConnectionOptions } from "tls";

import { z } from "zod";

import { ConfigError } from "./errors";
import type { RateLimitOptions } from "./ratelimit";
import { isValidNick, isValidUser } from "./validate";

/** Reconnect delays below this are replaced by DEFAULT_RECONNECT_DELAY */
export const MIN_RECONNECT_DELAY = 10_000;
export const DEFAULT_RECONNECT_DELAY = 25_000;

export const DEFAULT_VERSION = "ircloop (Node.js)";

/**
 * IRCClientConfig defines everything needed to run a client against one server
 */
export interface IRCClientConfig {
  /** Server hostname or IP address */
  host: string;

  /** Server port number (21-65535) */
  port: number;

  /** Whether to use TLS with default options */
  secure?: boolean;

  /** TLS options; implies secure */
  tls?: ConnectionOptions;

  /** Pre-established stream to use instead of dialing host:port */
  conn?: Duplex;

  /** Nickname to use */
  nickname: string;

  /** Username for the connection (default: nickname) */
  username?: string;

  /** Real name to display (default: username) */
  realname?: string;

  /** Server password, if required */
  password?: string;

  /** Reconnection attempts after a lost connection (default: 0) */
  retries?: number;

  /** Delay before each reconnection attempt in ms (minimum 10s, otherwise 25s) */
  reconnectDelay?: number;

  /** Connection timeout in milliseconds (default: 10000 - 10 seconds) */
  connectionTimeout?: number;

  /** Bypass the outbound rate limiter entirely */
  allowFlood?: boolean;

  /** Rate limiting settings */
  rateLimit?: RateLimitOptions;

  /** IRCv3 capabilities to request when the server offers them */
  supportedCaps?: string[];

  /** Reply to CTCP VERSION */
  version?: string;

  /** Print debug logs, including raw traffic */
  debug?: boolean;

  /** Called when the connection is lost and could not be re-established */
  handleError?: (error: Error) => void;
}

/** Config with defaults applied */
export type ResolvedConfig = IRCClientConfig &
  Required<
    Pick<
      IRCClientConfig,
      | "username"
      | "realname"
      | "retries"
      | "reconnectDelay"
      | "connectionTimeout"
      | "allowFlood"
      | "supportedCaps"
      | "version"
    >
  >;

/**
 * Rules a config must satisfy before connecting. Keys not listed here
 * (streams, callbacks, TLS options) are not checked.
 */
const ConnectConfigSchema = z.object({
  host: z.string().min(1, "invalid server specified"),
  port: z
    .number()
    .int("invalid port (21-65535)")
    .min(21, "invalid port (21-65535)")
    .max(65535, "invalid port (21-65535)"),
  nickname: z.string().refine(isValidNick, "invalid nickname"),
  username: z.string().refine(isValidUser, "invalid user"),
  retries: z.number().int().nonnegative(),
  reconnectDelay: z.number().nonnegative(),
  connectionTimeout: z.number().positive(),
});

/**
 * Apply defaults to a config
 */
export function resolveConfig(config: IRCClientConfig): ResolvedConfig {
  const username = config.username || config.nickname;

  return {
    ...config,
    username,
    realname: config.realname || username,
    retries: config.retries ?? 0,
    reconnectDelay: config.reconnectDelay ?? 0,
    connectionTimeout: config.connectionTimeout || 10000,
    allowFlood: config.allowFlood ?? false,
    supportedCaps: config.supportedCaps ?? [],
    version: config.version || DEFAULT_VERSION,
  };
}

/**
 * Check a resolved config before connecting
 * @throws ConfigError listing every problem found
 */
export function validateConfig(config: ResolvedConfig): void {
  const result = ConnectConfigSchema.safeParse(config);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
}

/**
 * Delay actually used between reconnection attempts
 */
export function effectiveReconnectDelay(configured: number): number {
  return configured < MIN_RECONNECT_DELAY ? DEFAULT_RECONNECT_DELAY : configured;
}
