import type { Caller } from "./caller";
import type { IRCClient } from "./client";
import {
  CAP,
  CONNECTED,
  ERR_ERRONEUSNICKNAME,
  ERR_NICKNAMEINUSE,
  ERR_UNAVAILRESOURCE,
  JOIN,
  KICK,
  NICK,
  PART,
  PING,
  RPL_ENDOFMOTD,
  RPL_ISUPPORT,
  RPL_MOTD,
  RPL_MOTDSTART,
  RPL_MYINFO,
  RPL_WELCOME,
} from "./commands";
import type { IRCMessage } from "./message";
import { lastParam, makeMessage, sourceNick } from "./message";

/** Capabilities requested whenever the server offers them */
export const DEFAULT_CAPS = [
  "account-notify",
  "away-notify",
  "cap-notify",
  "chghost",
  "extended-join",
  "invite-notify",
  "multi-prefix",
  "server-time",
  "userhost-in-names",
];

/** Which groups of built-in handlers are active */
export interface BuiltinFlags {
  tracking: boolean;
  capTracking: boolean;
  nickCollision: boolean;
}

/**
 * Register the client's built-in handlers on the internal registry
 */
export function registerBuiltins(caller: Caller, flags: BuiltinFlags): void {
  caller.addInternal(PING, handlePing);
  caller.addInternal(RPL_WELCOME, handleWelcome);

  if (flags.nickCollision) {
    for (const numeric of [ERR_NICKNAMEINUSE, ERR_ERRONEUSNICKNAME, ERR_UNAVAILRESOURCE]) {
      caller.addInternal(numeric, handleNickCollision);
    }
  }

  if (!flags.tracking) {
    return;
  }

  caller.addInternal(NICK, handleNick);
  caller.addInternal(JOIN, handleJoin);
  caller.addInternal(PART, handlePart);
  caller.addInternal(KICK, handleKick);
  caller.addInternal(RPL_MYINFO, handleMyInfo);
  caller.addInternal(RPL_ISUPPORT, handleISupport);
  caller.addInternal(RPL_MOTDSTART, handleMotd);
  caller.addInternal(RPL_MOTD, handleMotd);
  caller.addInternal(RPL_ENDOFMOTD, handleMotd);

  if (flags.capTracking) {
    caller.addInternal(CAP, handleCap);
  }
}

function currentNick(client: IRCClient): string {
  return client.session.nick || client.config.nickname;
}

function isSelf(client: IRCClient, event: IRCMessage): boolean {
  return sourceNick(event).toLowerCase() === currentNick(client).toLowerCase();
}

async function handlePing(client: IRCClient, event: IRCMessage): Promise<void> {
  await client.pong(lastParam(event));
}

/**
 * RPL_WELCOME: registration is complete, and its first parameter is the
 * nickname the server gave us
 */
async function handleWelcome(client: IRCClient, event: IRCMessage): Promise<void> {
  const session = client.session;
  session.registered = true;
  if (event.params[0]) {
    session.nick = event.params[0];
  }

  await client.runHandlers(makeMessage(CONNECTED, [], client.server()));
}

/**
 * Nickname taken or refused: retry with an underscore appended
 */
async function handleNickCollision(client: IRCClient): Promise<void> {
  await client.nick(currentNick(client) + "_");
}

function handleNick(client: IRCClient, event: IRCMessage): void {
  const next = lastParam(event);
  if (next && isSelf(client, event)) {
    client.session.nick = next;
  }
}

function handleJoin(client: IRCClient, event: IRCMessage): void {
  const channel = event.params[0] ?? event.trailing;
  if (channel && isSelf(client, event)) {
    client.session.channels?.add(channel.toLowerCase());
  }
}

function handlePart(client: IRCClient, event: IRCMessage): void {
  const channel = event.params[0];
  if (channel && isSelf(client, event)) {
    client.session.channels?.delete(channel.toLowerCase());
  }
}

function handleKick(client: IRCClient, event: IRCMessage): void {
  const [channel, nick] = event.params;
  if (channel && nick && nick.toLowerCase() === currentNick(client).toLowerCase()) {
    client.session.channels?.delete(channel.toLowerCase());
  }
}

/**
 * RPL_MYINFO: <client> <servername> <version> ...
 */
function handleMyInfo(client: IRCClient, event: IRCMessage): void {
  const [, server, version] = event.params;
  const options = client.session.serverOptions;

  if (server) options.set("SERVER", server);
  if (version) options.set("VERSION", version);
}

/**
 * RPL_ISUPPORT: <client> <token>[=<value>] ... :are supported by this server
 */
function handleISupport(client: IRCClient, event: IRCMessage): void {
  const options = client.session.serverOptions;

  for (const token of event.params.slice(1)) {
    if (token.startsWith("-")) {
      options.delete(token.slice(1));
      continue;
    }

    const eq = token.indexOf("=");
    if (eq === -1) {
      options.set(token, "");
    } else {
      options.set(token.substring(0, eq), token.substring(eq + 1));
    }
  }
}

function handleMotd(client: IRCClient, event: IRCMessage): void {
  const session = client.session;

  switch (event.command) {
    case RPL_MOTDSTART:
      session.motd = "";
      break;
    case RPL_MOTD: {
      const line = lastParam(event).replace(/^- ?/, "");
      session.motd = session.motd === "" ? line : `${session.motd}\n${line}`;
      break;
    }
  }
}

/**
 * CAP negotiation. Our CAP LS 302 is answered with one or more LS lines
 * (all but the last carry "*" before the list); we then request what we
 * want and close negotiation once the server ACKs or NAKs.
 */
async function handleCap(client: IRCClient, event: IRCMessage): Promise<void> {
  const session = client.session;
  const subcommand = (event.params[1] ?? "").toUpperCase();
  const caps = lastParam(event).split(" ").filter((cap) => cap !== "");

  switch (subcommand) {
    case "LS": {
      for (const cap of caps) {
        const eq = cap.indexOf("=");
        if (eq === -1) {
          session.offeredCaps.set(cap, "");
        } else {
          session.offeredCaps.set(cap.substring(0, eq), cap.substring(eq + 1));
        }
      }

      // More LS lines follow
      if (event.params[2] === "*") return;

      const wanted = new Set([...DEFAULT_CAPS, ...client.config.supportedCaps]);
      const request = [...session.offeredCaps.keys()].filter((cap) => wanted.has(cap));

      if (request.length === 0) {
        await endCap(client);
      } else {
        await client.send(makeMessage(CAP, ["REQ"], request.join(" ")));
      }
      break;
    }

    case "ACK":
      for (const cap of caps) {
        if (cap.startsWith("-")) {
          session.enabledCaps.delete(cap.slice(1));
        } else {
          session.enabledCaps.add(cap);
        }
      }
      await endCap(client);
      break;

    case "NAK":
      await endCap(client);
      break;
  }
}

async function endCap(client: IRCClient): Promise<void> {
  if (!client.session.registered) {
    await client.send(makeMessage(CAP, ["END"]));
  }
}
