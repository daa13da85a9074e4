import type { IRCClient } from "./client";
import { NOTICE, PRIVMSG } from "./commands";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { IRCMessage } from "./message";
import { lastParam, sourceNick } from "./message";
import { isValidNick } from "./validate";

const DELIM = "\x01";

export const CTCP_ACTION = "ACTION";
export const CTCP_CLIENTINFO = "CLIENTINFO";
export const CTCP_ERRMSG = "ERRMSG";
export const CTCP_PING = "PING";
export const CTCP_TIME = "TIME";
export const CTCP_VERSION = "VERSION";

/**
 * A CTCP query (inside a PRIVMSG) or reply (inside a NOTICE)
 */
export interface CTCPEvent {
  /** Nickname of the sender */
  source: string;
  /** Channel or nickname the message was addressed to */
  target: string;
  /** Upper-case CTCP type, e.g. VERSION */
  type: string;
  text: string;
  reply: boolean;
}

export type CTCPHandler = (
  client: IRCClient,
  ctcp: CTCPEvent
) => void | Promise<void>;

/**
 * Extract a CTCP message from a PRIVMSG or NOTICE, or null when the event
 * does not carry one
 */
export function decodeCTCP(event: IRCMessage): CTCPEvent | null {
  if (event.command !== PRIVMSG && event.command !== NOTICE) {
    return null;
  }

  const raw = lastParam(event);
  if (raw.length < 2 || !raw.startsWith(DELIM)) {
    return null;
  }

  // The closing delimiter is optional in practice
  const inner = raw.endsWith(DELIM) ? raw.slice(1, -1) : raw.slice(1);
  const space = inner.indexOf(" ");
  const type = (space === -1 ? inner : inner.substring(0, space)).toUpperCase();

  if (type === "" || type.includes(DELIM)) {
    return null;
  }

  return {
    source: sourceNick(event),
    target: event.params[0] ?? "",
    type,
    text: space === -1 ? "" : inner.substring(space + 1),
    reply: event.command === NOTICE,
  };
}

/**
 * Wrap a CTCP type and text in delimiters. Returns "" when the type is not
 * sendable.
 */
export function encodeCTCPRaw(type: string, text: string): string {
  if (type === "" || /[\s\x01]/.test(type)) {
    return "";
  }

  const body = text === "" ? type.toUpperCase() : `${type.toUpperCase()} ${text}`;
  return DELIM + body + DELIM;
}

/**
 * Registry of CTCP handlers, one per type plus an optional "*" handler that
 * sees every CTCP message first
 */
export class CTCP {
  private handlers = new Map<string, CTCPHandler>();

  constructor(private readonly logger: Logger = silentLogger) {}

  /** Types with a registered handler, sorted */
  types(): string[] {
    return [...this.handlers.keys()].filter((type) => type !== "*").sort();
  }

  set(type: string, handler: CTCPHandler): void {
    this.handlers.set(type.toUpperCase(), handler);
  }

  /**
   * Like set, but the handler runs without the dispatcher waiting on it
   */
  setBg(type: string, handler: CTCPHandler): void {
    this.set(type, (client, ctcp) => {
      void Promise.resolve()
        .then(() => handler(client, ctcp))
        .catch((error: unknown) => {
          this.logger.error(`background CTCP handler for ${ctcp.type} failed:`, error);
        });
    });
  }

  clear(type: string): void {
    this.handlers.delete(type.toUpperCase());
  }

  clearAll(): void {
    this.handlers.clear();
  }

  /**
   * Run the handlers for a CTCP message. Unknown queries from a valid
   * nickname are answered with ERRMSG.
   */
  async call(ctcp: CTCPEvent, client: IRCClient): Promise<void> {
    const wildcard = this.handlers.get("*");
    if (wildcard) {
      await this.invoke(wildcard, client, ctcp);
    }

    const handler = this.handlers.get(ctcp.type);
    if (handler) {
      await this.invoke(handler, client, ctcp);
      return;
    }

    if (!ctcp.reply && isValidNick(ctcp.source)) {
      await client.sendCTCPReply(ctcp.source, CTCP_ERRMSG, "that is an unknown CTCP query");
    }
  }

  /**
   * Install the standard replies: PING, VERSION, TIME, CLIENTINFO, and a
   * no-op ACTION so that /me messages are not answered with ERRMSG
   */
  addDefaultHandlers(): void {
    this.set(CTCP_ACTION, () => {});

    this.set(CTCP_PING, async (client, ctcp) => {
      if (ctcp.reply) return;
      await client.sendCTCPReply(ctcp.source, CTCP_PING, ctcp.text);
    });

    this.set(CTCP_VERSION, async (client, ctcp) => {
      if (ctcp.reply) return;
      await client.sendCTCPReply(ctcp.source, CTCP_VERSION, client.config.version);
    });

    this.set(CTCP_TIME, async (client, ctcp) => {
      if (ctcp.reply) return;
      await client.sendCTCPReply(ctcp.source, CTCP_TIME, new Date().toUTCString());
    });

    this.set(CTCP_CLIENTINFO, async (client, ctcp) => {
      if (ctcp.reply) return;
      await client.sendCTCPReply(ctcp.source, CTCP_CLIENTINFO, this.types().join(" "));
    });
  }

  private async invoke(handler: CTCPHandler, client: IRCClient, ctcp: CTCPEvent): Promise<void> {
    try {
      await handler(client, ctcp);
    } catch (error) {
      this.logger.error(`CTCP handler for ${ctcp.type} failed:`, error);
    }
  }
}
