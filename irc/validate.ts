/**
 * Target validation following RFC 2812 section 2.3.1
 */

const NICK_SPECIAL = "[]\\`_^{|}";
const MAX_CHANNEL_LENGTH = 50;

function isLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

/**
 * nickname = ( letter / special ) *( letter / digit / special / "-" )
 */
export function isValidNick(nick: string): boolean {
  if (nick.length === 0) return false;

  const first = nick[0];
  if (!isLetter(first) && !NICK_SPECIAL.includes(first)) return false;

  for (const ch of nick.slice(1)) {
    if (!isLetter(ch) && !isDigit(ch) && !NICK_SPECIAL.includes(ch) && ch !== "-") {
      return false;
    }
  }

  return true;
}

/**
 * channel = ( "#" / "+" / ( "!" channelid ) / "&" ) chanstring
 * where chanstring excludes NUL, BELL, CR, LF, space, comma and colon
 */
export function isValidChannel(channel: string): boolean {
  if (channel.length < 2 || channel.length > MAX_CHANNEL_LENGTH) return false;

  let rest: string;
  switch (channel[0]) {
    case "#":
    case "&":
    case "+":
      rest = channel.slice(1);
      break;
    case "!": {
      // 5 character channel id of A-Z / 0-9
      const id = channel.slice(1, 6);
      if (id.length !== 5 || !/^[A-Z0-9]{5}$/.test(id)) return false;
      rest = channel.slice(6);
      if (rest.length === 0) return false;
      break;
    }
    default:
      return false;
  }

  return !/[\x00\x07\r\n ,:]/.test(rest);
}

/**
 * user = 1*( any octet except NUL, CR, LF, " " and "@" ), ignoring a
 * leading "~" added by servers without ident
 */
export function isValidUser(user: string): boolean {
  const name = user.startsWith("~") ? user.slice(1) : user;
  if (name.length === 0) return false;

  return !/[\x00\r\n @]/.test(name);
}
