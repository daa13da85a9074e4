import { describe, expect, test } from "vitest";

import {
  copyMessage,
  createMessage,
  lastParam,
  makeMessage,
  messageLength,
  messageToString,
  parseMessage,
  sourceNick,
  splitTargets,
} from "./message";

describe("IRC Message Parser", () => {
  test("should parse a simple IRC message", () => {
    const parsed = parseMessage(new TextEncoder().encode("PING :server1.example.com\r\n"));

    expect(parsed.command).toBe("PING");
    expect(parsed.source).toBeNull();
    expect(parsed.params).toEqual([]);
    expect(parsed.trailing).toBe("server1.example.com");
  });

  test("should parse a complex message with tags", () => {
    const parsed = parseMessage(
      "@id=234AB;room=lobby :nick!user@host PRIVMSG #channel :Hey everyone!\r\n"
    );

    expect(parsed.command).toBe("PRIVMSG");
    expect(parsed.source).toBe("nick!user@host");
    expect(parsed.params).toEqual(["#channel"]);
    expect(parsed.trailing).toBe("Hey everyone!");
    expect(parsed.tags.size).toBe(2);
    expect(parsed.tags.get("id")).toBe("234AB");
    expect(parsed.tags.get("room")).toBe("lobby");
  });

  test("should unescape tag values and keep valueless tags", () => {
    const parsed = parseMessage("@msg=a\\sb\\:c;+flag :n PRIVMSG #x :hi");

    expect(parsed.tags.get("msg")).toBe("a b;c");
    expect(parsed.tags.get("+flag")).toBe(true);
  });

  test("should upper-case the command", () => {
    expect(parseMessage("privmsg #a :x").command).toBe("PRIVMSG");
  });

  test("should collect middle parameters", () => {
    const parsed = parseMessage(":irc.example.net 005 tester NETWORK=ExampleNet -EXCEPTS :are supported");

    expect(parsed.params).toEqual(["tester", "NETWORK=ExampleNet", "-EXCEPTS"]);
    expect(parsed.trailing).toBe("are supported");
  });

  test("should reject malformed messages", () => {
    expect(() => parseMessage("@id=1")).toThrow("Malformed IRC message: No space after tags");
    expect(() => parseMessage(":nick!user@host")).toThrow(
      "Malformed IRC message: No space after source"
    );
    expect(() => parseMessage(":nick!user@host ")).toThrow("Malformed IRC message: Missing command");
  });
});

describe("IRC Message Serializer", () => {
  test("should create and serialize a message", () => {
    const message = makeMessage("PRIVMSG", ["#channel"], "Hello, world!", "nick!user@host");

    expect(new TextDecoder().decode(createMessage(message))).toBe(
      ":nick!user@host PRIVMSG #channel :Hello, world!\r\n"
    );
  });

  test("should send a last middle parameter with spaces as trailing", () => {
    expect(messageToString(makeMessage("TOPIC", ["#a", "new topic"]))).toBe("TOPIC #a :new topic");
    expect(messageToString(makeMessage("TOPIC", ["#a", ""]))).toBe("TOPIC #a :");
  });

  test("should serialize tags", () => {
    const tags = new Map<string, string | true>([
      ["+typing", "active"],
      ["flag", true],
    ]);

    expect(messageToString(makeMessage("TAGMSG", ["#a"], undefined, null, tags))).toBe(
      "@+typing=active;flag TAGMSG #a"
    );
  });

  test("should count command, parameters, separators and trailing text", () => {
    // "PRIVMSG" + " " + "#chan" + " :" + "hello world"
    expect(messageLength(makeMessage("PRIVMSG", ["#chan"], "hello world"))).toBe(7 + 1 + 5 + 2 + 11);
  });

  test("should measure length in bytes", () => {
    expect(messageLength(makeMessage("PRIVMSG", ["#a"], "é"))).toBe(14);
  });
});

describe("message helpers", () => {
  test("sourceNick takes the part before '!'", () => {
    expect(sourceNick(parseMessage(":alice!a@host.example JOIN #a"))).toBe("alice");
    expect(sourceNick(parseMessage(":irc.example.net 001 tester :hi"))).toBe("irc.example.net");
    expect(sourceNick(parseMessage("PING x"))).toBe("");
  });

  test("lastParam prefers the trailing parameter", () => {
    expect(lastParam(parseMessage("PING :abc"))).toBe("abc");
    expect(lastParam(parseMessage("JOIN #a"))).toBe("#a");
    expect(lastParam(parseMessage("AWAY"))).toBe("");
  });

  test("copyMessage is independent of the original", () => {
    const original = parseMessage("@id=1 :a!b@c PRIVMSG #x :hi");
    const copy = copyMessage(original);

    copy.params.push("extra");
    copy.tags.set("id", "2");

    expect(original.params).toEqual(["#x"]);
    expect(original.tags.get("id")).toBe("1");
  });

  test("splitTargets packs targets under the line limit", () => {
    expect(splitTargets("JOIN", ["#a", "#b", "#c"])).toEqual(["#a,#b,#c"]);

    const channels = Array.from({ length: 25 }, (_, i) => `#${"x".repeat(45)}${String(i).padStart(2, "0")}`);
    const batches = splitTargets("JOIN", channels);

    expect(batches.map((batch) => batch.split(",").length)).toEqual([10, 10, 5]);
    expect(batches.join(",").split(",")).toEqual(channels);
  });
});
