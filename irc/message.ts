/**
 * IRC message type and parser/serializer
 * Framing: RFC 1459 lines with IRCv3 message tags
 * (https://ircv3.net/specs/extensions/message-tags.html)
 */

/** Maximum length of a line in bytes, excluding the trailing CRLF. */
export const MAX_LINE_LENGTH = 510;

/**
 * IRCMessage represents one protocol message, inbound or outbound
 */
export interface IRCMessage {
  tags: Map<string, string | true>;
  source: string | null;
  /** Upper-case verb or three digit numeric */
  command: string;
  /** Middle parameters, in order */
  params: string[];
  /** Final free-form parameter, sent after " :" */
  trailing?: string;
  /** Keep the message out of debug logs (passwords and the like) */
  sensitive?: boolean;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const TAG_ESCAPES: Record<string, string> = {
  ":": ";",
  s: " ",
  "\\": "\\",
  r: "\r",
  n: "\n",
};

function unescapeTagValue(value: string): string {
  let out = "";

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch !== "\\") {
      out += ch;
      continue;
    }

    // A lone trailing backslash is dropped
    const next = value[i + 1];
    if (next === undefined) break;
    out += TAG_ESCAPES[next] ?? next;
    i++;
  }

  return out;
}

function escapeTagValue(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\:")
    .replace(/ /g, "\\s")
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n");
}

/**
 * Parse one line into an IRCMessage
 * @param data The line, as text or raw bytes, with or without CRLF
 * @throws Error when the line is malformed
 */
export function parseMessage(data: string | Uint8Array): IRCMessage {
  let str = typeof data === "string" ? data : decoder.decode(data);
  str = str.replace(/\r?\n$/, "");

  const message: IRCMessage = {
    tags: new Map<string, string | true>(),
    source: null,
    command: "",
    params: [],
  };

  let position = 0;
  let nextSpace = -1;

  const skipSpaces = () => {
    while (position < str.length && str[position] === " ") {
      position++;
    }
  };

  // Tags
  if (str[position] === "@") {
    nextSpace = str.indexOf(" ", position);

    if (nextSpace === -1) {
      throw new Error("Malformed IRC message: No space after tags");
    }

    const tagStr = str.substring(position + 1, nextSpace);
    for (const pair of tagStr.split(";")) {
      if (pair === "") continue;

      const eq = pair.indexOf("=");
      if (eq === -1) {
        message.tags.set(pair, true);
      } else {
        message.tags.set(
          pair.substring(0, eq),
          unescapeTagValue(pair.substring(eq + 1))
        );
      }
    }

    position = nextSpace + 1;
  }

  skipSpaces();

  // Source
  if (str[position] === ":") {
    nextSpace = str.indexOf(" ", position);

    if (nextSpace === -1) {
      throw new Error("Malformed IRC message: No space after source");
    }

    message.source = str.substring(position + 1, nextSpace);
    position = nextSpace + 1;
    skipSpaces();
  }

  // Command
  nextSpace = str.indexOf(" ", position);
  const command =
    nextSpace === -1
      ? str.substring(position)
      : str.substring(position, nextSpace);

  if (command === "") {
    throw new Error("Malformed IRC message: Missing command");
  }

  message.command = command.toUpperCase();
  if (nextSpace === -1) {
    return message;
  }

  position = nextSpace + 1;
  skipSpaces();

  // Parameters
  while (position < str.length) {
    if (str[position] === ":") {
      message.trailing = str.substring(position + 1);
      break;
    }

    nextSpace = str.indexOf(" ", position);

    if (nextSpace === -1) {
      message.params.push(str.substring(position));
      break;
    }

    message.params.push(str.substring(position, nextSpace));
    position = nextSpace + 1;
    skipSpaces();
  }

  return message;
}

/**
 * Serialize a message to a line, without CRLF
 */
export function messageToString(message: IRCMessage): string {
  let str = "";

  if (message.tags.size > 0) {
    const tagParts: string[] = [];

    message.tags.forEach((value, key) => {
      tagParts.push(value === true ? key : `${key}=${escapeTagValue(value)}`);
    });

    str += "@" + tagParts.join(";") + " ";
  }

  if (message.source) {
    str += ":" + message.source + " ";
  }

  str += message.command;

  const params = message.params;
  for (let i = 0; i < params.length; i++) {
    const param = params[i];
    const isLast = i === params.length - 1 && message.trailing === undefined;

    // A last middle parameter that cannot stand alone is sent as trailing
    if (isLast && (param === "" || param.includes(" ") || param.startsWith(":"))) {
      str += " :" + param;
    } else {
      str += " " + param;
    }
  }

  if (message.trailing !== undefined) {
    str += " :" + message.trailing;
  }

  return str;
}

/**
 * Create raw bytes from an IRCMessage, including the trailing CRLF
 */
export function createMessage(message: IRCMessage): Uint8Array {
  return encoder.encode(messageToString(message) + "\r\n");
}

/**
 * Serialized length of a message in bytes, excluding CRLF. Used for rate
 * limiting and for keeping batched commands under MAX_LINE_LENGTH.
 */
export function messageLength(message: IRCMessage): number {
  return encoder.encode(messageToString(message)).length;
}

/**
 * Create a new IRC message with the provided parameters
 * @param command The IRC command
 * @param params Middle parameters
 * @param trailing Optional trailing parameter
 * @param source Optional source/prefix
 * @param tags Optional map of tags
 */
export function makeMessage(
  command: string,
  params: string[] = [],
  trailing?: string,
  source: string | null = null,
  tags: Map<string, string | true> = new Map()
): IRCMessage {
  const message: IRCMessage = {
    command: command.toUpperCase(),
    params,
    source,
    tags,
  };

  if (trailing !== undefined) {
    message.trailing = trailing;
  }

  return message;
}

/**
 * Independent copy of a message, so one handler cannot change what another sees
 */
export function copyMessage(message: IRCMessage): IRCMessage {
  const copy: IRCMessage = {
    tags: new Map(message.tags),
    source: message.source,
    command: message.command,
    params: [...message.params],
  };

  if (message.trailing !== undefined) copy.trailing = message.trailing;
  if (message.sensitive) copy.sensitive = true;

  return copy;
}

/**
 * Nickname part of a message source ("nick!user@host" -> "nick")
 */
export function sourceNick(message: IRCMessage): string {
  if (!message.source) return "";

  const bang = message.source.indexOf("!");
  return bang === -1 ? message.source : message.source.substring(0, bang);
}

/**
 * The last argument of a message: the trailing parameter if present, else
 * the last middle parameter
 */
export function lastParam(message: IRCMessage): string {
  if (message.trailing !== undefined) return message.trailing;
  return message.params[message.params.length - 1] ?? "";
}

/**
 * Group targets into comma-joined batches so that "COMMAND batch" never
 * exceeds MAX_LINE_LENGTH bytes. A single target longer than the budget is
 * sent on its own.
 */
export function splitTargets(command: string, targets: string[]): string[] {
  const max = MAX_LINE_LENGTH - encoder.encode(command).length - 1;
  const batches: string[] = [];
  let buffer = "";

  for (const target of targets) {
    if (buffer === "") {
      buffer = target;
      continue;
    }

    if (encoder.encode(buffer + "," + target).length > max) {
      batches.push(buffer);
      buffer = target;
    } else {
      buffer += "," + target;
    }
  }

  if (buffer !== "") {
    batches.push(buffer);
  }

  return batches;
}
