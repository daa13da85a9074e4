/**
 * Command names and numerics the client sends or reacts to
 */

/** Handlers registered under this key run for every event. */
export const ALL_EVENTS = "*";

// Virtual events, dispatched by the client itself and never sent on the wire
export const INITIALIZED = "CLIENT_INIT";
export const CONNECTED = "CLIENT_CONNECTED";
export const DISCONNECTED = "CLIENT_DISCONNECTED";
export const STOPPED = "CLIENT_STOPPED";

export const AWAY = "AWAY";
export const CAP = "CAP";
export const INVITE = "INVITE";
export const JOIN = "JOIN";
export const KICK = "KICK";
export const LIST = "LIST";
export const NICK = "NICK";
export const NOTICE = "NOTICE";
export const OPER = "OPER";
export const PART = "PART";
export const PASS = "PASS";
export const PING = "PING";
export const PONG = "PONG";
export const PRIVMSG = "PRIVMSG";
export const QUIT = "QUIT";
export const TOPIC = "TOPIC";
export const USER = "USER";
export const WHO = "WHO";
export const WHOIS = "WHOIS";
export const WHOWAS = "WHOWAS";

export const RPL_WELCOME = "001";
export const RPL_MYINFO = "004";
export const RPL_ISUPPORT = "005";
export const RPL_MOTD = "372";
export const RPL_MOTDSTART = "375";
export const RPL_ENDOFMOTD = "376";
export const ERR_ERRONEUSNICKNAME = "432";
export const ERR_NICKNAMEINUSE = "433";
export const ERR_UNAVAILRESOURCE = "437";
