import { afterEach, describe, expect, it, vi } from "vitest";

import { MockSocket, tick } from "../tests/helpers/mock-socket";
import type { ClientOptions } from "./client";
import { ConnectionState, IRCClient } from "./client";
import { CONNECTED, DISCONNECTED, INITIALIZED, PRIVMSG, STOPPED } from "./commands";
import type { IRCClientConfig } from "./config";
import {
  AlreadyConnectingError,
  ConfigError,
  DisconnectedError,
  EncodeError,
  InvalidTargetError,
  NotConnectedError,
  TrackingDisabledError,
} from "./errors";
import { silentLogger } from "./logger";
import type { IRCMessage } from "./message";
import { lastParam } from "./message";

const clients: IRCClient[] = [];

function createClient(config: Partial<IRCClientConfig> = {}, options: ClientOptions = {}) {
  const client = new IRCClient(
    { host: "irc.example.net", port: 6667, nickname: "tester", ...config },
    { logger: silentLogger, sleep: vi.fn(async () => {}), ...options }
  );
  clients.push(client);
  return client;
}

async function connected(config: Partial<IRCClientConfig> = {}, options: ClientOptions = {}) {
  const socket = new MockSocket();
  const client = createClient({ conn: socket, ...config }, options);
  await client.connect();
  return { client, socket };
}

function lastLine(socket: MockSocket): string | undefined {
  return socket.written[socket.written.length - 1];
}

afterEach(async () => {
  for (const client of clients.splice(0)) {
    await client.stop();
  }
});

describe("IRCClient connect", () => {
  it.each([0, 70000])("rejects port %d before opening anything", async (port) => {
    const dialer = vi.fn(async () => new MockSocket());
    const client = createClient({ port }, { dialer });

    const error = await client.connect().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty("issues", ["port: invalid port (21-65535)"]);
    expect(dialer).not.toHaveBeenCalled();
    expect(client.state).toBe(ConnectionState.IDLE);
    expect(client.isConnected()).toBe(false);
  });

  it("registers with PASS, NICK, USER and CAP LS", async () => {
    const { client, socket } = await connected({ password: "test-secret", realname: "Test User" });

    expect(socket.written).toEqual([
      "PASS test-secret",
      "NICK tester",
      "USER tester +iw * :Test User",
      "CAP LS 302",
    ]);
    expect(client.state).toBe(ConnectionState.CONNECTED);
    expect(client.isConnected()).toBe(true);
  });

  it("skips CAP LS when tracking is disabled", async () => {
    const socket = new MockSocket();
    const client = createClient({ conn: socket });
    client.disableTracking();
    await client.connect();

    expect(socket.written).toEqual(["NICK tester", "USER tester +iw * :tester"]);
  });

  it("dials host and port when no stream is given", async () => {
    const dialer = vi.fn(async () => new MockSocket());
    const client = createClient({ secure: true, connectionTimeout: 5000 }, { dialer });

    await client.connect();

    expect(dialer).toHaveBeenCalledWith({
      host: "irc.example.net",
      port: 6667,
      tls: {},
      timeout: 5000,
    });
  });

  it("dispatches INITIALIZED", async () => {
    const socket = new MockSocket();
    const client = createClient({ conn: socket });
    const seen: IRCMessage[] = [];
    client.handlers.add(INITIALIZED, (_client, event) => {
      seen.push(event);
    });

    await client.connect();

    await vi.waitFor(() => expect(seen).toHaveLength(1));
    expect(seen[0].trailing).toBe("irc.example.net:6667");
  });

  it("tracks the welcome nick and dispatches CONNECTED", async () => {
    const { client, socket } = await connected();
    let connectedEvents = 0;
    client.handlers.add(CONNECTED, () => {
      connectedEvents++;
    });

    socket.serverSend(":irc.example.net 001 tester_ :Welcome to ExampleNet");

    await vi.waitFor(() => expect(connectedEvents).toBe(1));
    expect(client.getNick()).toBe("tester_");
    expect(client.uptime()).toBeInstanceOf(Date);
  });
});

describe("IRCClient dispatch", () => {
  it("finishes every handler of one event before the next event", async () => {
    const { client, socket } = await connected();
    let open = () => {};
    const opened = new Promise<void>((resolve) => {
      open = () => resolve();
    });
    const log: string[] = [];
    client.handlers.add(PRIVMSG, async (_client, event) => {
      const text = lastParam(event);
      log.push(`start ${text}`);
      if (text === "1") await opened;
      log.push(`end ${text}`);
    });
    client.handlers.add(PRIVMSG, (_client, event) => {
      log.push(`other ${lastParam(event)}`);
    });

    socket.serverSend(":alice!a@h PRIVMSG #test :1", ":alice!a@h PRIVMSG #test :2", ":alice!a@h PRIVMSG #test :3");

    await vi.waitFor(() => expect(log).toEqual(["start 1", "other 1"]));
    await tick();
    await tick();
    expect(log).toEqual(["start 1", "other 1"]);

    open();
    await vi.waitFor(() => expect(log).toHaveLength(9));
    expect(log).toEqual([
      "start 1",
      "other 1",
      "end 1",
      "start 2",
      "end 2",
      "other 2",
      "start 3",
      "end 3",
      "other 3",
    ]);
  });

  it("keeps a single session when connects overlap", async () => {
    const sockets: MockSocket[] = [];
    const dialer = vi.fn(async () => {
      const socket = new MockSocket();
      sockets.push(socket);
      return socket;
    });
    const client = createClient({}, { dialer });
    let open = () => {};
    const opened = new Promise<void>((resolve) => {
      open = () => resolve();
    });
    const log: string[] = [];
    client.handlers.add(PRIVMSG, async (_client, event) => {
      const text = lastParam(event);
      log.push(`start ${text}`);
      if (text === "1") await opened;
      log.push(`end ${text}`);
    });

    await Promise.all([client.connect(), client.connect()]);

    expect(sockets).toHaveLength(2);
    expect(sockets[0].destroyed).toBe(true);
    expect(sockets[1].destroyed).toBe(false);

    sockets[1].serverSend(":alice!a@h PRIVMSG #test :1", ":alice!a@h PRIVMSG #test :2");
    await vi.waitFor(() => expect(log).toEqual(["start 1"]));
    await tick();
    await tick();
    expect(log).toEqual(["start 1"]);

    open();
    await vi.waitFor(() => expect(log).toEqual(["start 1", "end 1", "start 2", "end 2"]));

    await client.stop();
    expect(sockets[1].destroyed).toBe(true);
  });

  it("stops reading from the socket while the queue is full", async () => {
    const socket = new MockSocket();
    const client = createClient({ conn: socket }, { queueCapacity: 2 });
    let open = () => {};
    const opened = new Promise<void>((resolve) => {
      open = () => resolve();
    });
    let handled = 0;
    client.handlers.add(PRIVMSG, async (_client, event) => {
      if (lastParam(event) === "0") await opened;
      handled++;
    });
    await client.connect();

    for (let i = 0; i < 200; i++) {
      socket.serverSend(`:alice!a@h PRIVMSG #test :${i}`);
    }

    await vi.waitFor(() => expect(socket.isPaused()).toBe(true));
    expect(handled).toBe(0);
    expect(socket.readableLength).toBeGreaterThan(0);

    open();
    await vi.waitFor(() => expect(handled).toBe(200));
  });

  it("detaches from a caller-supplied stream on stop", async () => {
    const { client, socket } = await connected();
    expect(socket.listenerCount("data")).toBe(1);

    await client.stop();

    expect(socket.listenerCount("data")).toBe(0);
  });

  it("stops calling a removed handler", async () => {
    const { client, socket } = await connected();
    let calls = 0;
    let seen = 0;
    const id = client.handlers.add(PRIVMSG, () => {
      calls++;
    });
    client.handlers.add(PRIVMSG, () => {
      seen++;
    });

    expect(client.handlers.remove(id)).toBe(true);
    socket.serverSend(":alice!a@h PRIVMSG #test :hi");

    await vi.waitFor(() => expect(seen).toBe(1));
    expect(calls).toBe(0);
  });
});

describe("IRCClient built-in handlers", () => {
  it("answers PING", async () => {
    const { socket } = await connected();

    socket.serverSend("PING :abc123");

    await vi.waitFor(() => expect(socket.written).toContain("PONG abc123"));
  });

  it("appends an underscore on nick collision", async () => {
    const { socket } = await connected();

    socket.serverSend(":irc.example.net 433 * tester :Nickname is already in use");

    await vi.waitFor(() => expect(lastLine(socket)).toBe("NICK tester_"));
  });

  it("leaves nick collisions alone when disabled", async () => {
    const { client, socket } = await connected();
    client.disableNickCollision();
    let seen = false;
    client.handlers.add("433", () => {
      seen = true;
    });

    socket.serverSend(":irc.example.net 433 * tester :Nickname is already in use");

    await vi.waitFor(() => expect(seen).toBe(true));
    expect(socket.written).not.toContain("NICK tester_");
  });

  it("tracks joined channels", async () => {
    const { client, socket } = await connected();

    socket.serverSend(":tester!t@h JOIN #Test", ":tester!t@h JOIN #other", ":alice!a@h JOIN #third");
    await vi.waitFor(() => expect(client.channels().sort()).toEqual(["#other", "#test"]));
    expect(client.isInChannel("#TEST")).toBe(true);

    socket.serverSend(":tester!t@h PART #test", ":op!o@h KICK #other tester :bye");
    await vi.waitFor(() => expect(client.channels()).toEqual([]));
  });

  it("follows its own nick changes", async () => {
    const { client, socket } = await connected();

    socket.serverSend(":tester!t@h NICK :renamed");

    await vi.waitFor(() => expect(client.getNick()).toBe("renamed"));
  });

  it("records server options and MOTD", async () => {
    const { client, socket } = await connected();

    socket.serverSend(
      ":irc.example.net 004 tester irc.example.net exampled-1.2 iw ov",
      ":irc.example.net 005 tester NETWORK=ExampleNet NICKLEN=30 :are supported by this server",
      ":irc.example.net 375 tester :- irc.example.net Message of the day -",
      ":irc.example.net 372 tester :- first line",
      ":irc.example.net 372 tester :- second line",
      ":irc.example.net 376 tester :End of /MOTD command."
    );

    await vi.waitFor(() => expect(client.serverMOTD()).toBe("first line\nsecond line"));
    expect(client.serverName()).toBe("irc.example.net");
    expect(client.serverVersion()).toBe("exampled-1.2");
    expect(client.networkName()).toBe("ExampleNet");
    expect(client.getServerOption("NICKLEN")).toBe("30");
  });

  it("negotiates capabilities", async () => {
    const { client, socket } = await connected({ supportedCaps: ["sasl"] });

    socket.serverSend(":irc.example.net CAP * LS * :multi-prefix batch");
    socket.serverSend(":irc.example.net CAP * LS :sasl server-time");
    await vi.waitFor(() => expect(lastLine(socket)).toBe("CAP REQ :multi-prefix sasl server-time"));

    socket.serverSend(":irc.example.net CAP tester ACK :multi-prefix sasl server-time");
    await vi.waitFor(() => expect(lastLine(socket)).toBe("CAP END"));
    expect(client.enabledCaps()).toEqual(["multi-prefix", "sasl", "server-time"]);
  });

  it("ends negotiation when nothing is wanted", async () => {
    const { socket } = await connected();

    socket.serverSend(":irc.example.net CAP * LS :batch");

    await vi.waitFor(() => expect(lastLine(socket)).toBe("CAP END"));
  });

  it("answers CTCP VERSION and unknown queries", async () => {
    const { socket } = await connected({ version: "test-client 1.0" });

    socket.serverSend(":alice!a@h PRIVMSG tester :\x01VERSION\x01");
    await vi.waitFor(() =>
      expect(socket.written).toContain("NOTICE alice :\x01VERSION test-client 1.0\x01")
    );

    socket.serverSend(":alice!a@h PRIVMSG tester :\x01FINGER\x01");
    await vi.waitFor(() =>
      expect(socket.written).toContain("NOTICE alice :\x01ERRMSG that is an unknown CTCP query\x01")
    );
  });

  it("throws from tracking queries once tracking is disabled", async () => {
    const { client } = await connected();
    client.disableTracking();

    expect(() => client.channels()).toThrow(TrackingDisabledError);
    expect(() => client.getNick()).toThrow("getNick() used when tracking is disabled");
    expect(() => client.isInChannel("#a")).toThrow(TrackingDisabledError);
  });
});

describe("IRCClient commands", () => {
  it("sends PART for part and partMessage", async () => {
    const { client, socket } = await connected();

    await client.part("#test");
    expect(lastLine(socket)).toBe("PART #test");

    await client.partMessage("#test", "see you");
    expect(lastLine(socket)).toBe("PART #test :see you");
  });

  it("splits long JOINs and keeps every channel", async () => {
    const { client, socket } = await connected();
    const channels = Array.from({ length: 25 }, (_, i) => `#${"x".repeat(45)}${String(i).padStart(2, "0")}`);

    await client.join(...channels);

    const joins = socket.written.filter((line) => line.startsWith("JOIN "));
    expect(joins).toHaveLength(3);
    expect(joins.map((line) => line.substring(5)).join(",").split(",")).toEqual(channels);
  });

  it("validates every channel before sending", async () => {
    const { client, socket } = await connected();
    const before = socket.written.length;

    await expect(client.join("#ok", "nope")).rejects.toThrow(InvalidTargetError);
    expect(socket.written).toHaveLength(before);
  });

  it("formats the other commands", async () => {
    const { client, socket } = await connected();
    const before = socket.written.length;

    await client.message("#test", "hello there");
    await client.notice("alice", "psst");
    await client.action("#test", "waves");
    await client.joinKey("#secret", "test-key");
    await client.topic("#test", "new topic");
    await client.who("#test");
    await client.whois("alice");
    await client.whowas("alice", 3);
    await client.kick("#test", "alice");
    await client.kick("#test", "alice", "spam");
    await client.invite("#test", "alice");
    await client.away("lunch");
    await client.away("");
    await client.list();
    await client.list("#a", "#b");
    await client.ping("token");
    await client.nick("renamed");
    await client.oper("admin", "test-secret");

    expect(socket.written.slice(before)).toEqual([
      "PRIVMSG #test :hello there",
      "NOTICE alice :psst",
      "PRIVMSG #test :\x01ACTION waves\x01",
      "JOIN #secret test-key",
      "TOPIC #test :new topic",
      "WHO #test %tcuhnr,2",
      "WHOIS alice",
      "WHOWAS alice 3",
      "KICK #test alice",
      "KICK #test alice :spam",
      "INVITE alice #test",
      "AWAY :lunch",
      "AWAY",
      "LIST",
      "LIST #a,#b",
      "PING token",
      "NICK renamed",
      "OPER admin test-secret",
    ]);
    expect(client.getNick()).toBe("renamed");
  });

  it("sends raw lines and rejects unparsable ones", async () => {
    const { client, socket } = await connected();

    await client.sendRaw("PRIVMSG #a :hi");
    expect(lastLine(socket)).toBe("PRIVMSG #a :hi");

    await expect(client.sendRaw("")).rejects.toThrow("invalid event: ");
  });

  it("rejects invalid message targets", async () => {
    const { client } = await connected();

    await expect(client.message("bad target", "x")).rejects.toThrow(InvalidTargetError);
    await expect(client.sendCTCP("alice", "A B", "x")).rejects.toThrow(EncodeError);
  });

  it("fails to send without a connection", async () => {
    const client = createClient();

    await expect(client.message("#a", "x")).rejects.toThrow("client has no open connection");
    expect(() => client.uptime()).toThrow(NotConnectedError);
    expect(() => client.connectionDuration()).toThrow(NotConnectedError);
  });

  it("rate limits sends unless bypassed", async () => {
    const sleep = vi.fn(async () => {});
    const { client } = await connected({}, { sleep, now: () => 0 });
    const text = "x".repeat(385);

    // "PRIVMSG #test :" + 385 bytes = 400 bytes, 5000ms of debt each
    await client.message("#test", text);
    await client.message("#test", text);
    await client.send(
      { tags: new Map(), source: null, command: "PRIVMSG", params: ["#test"], trailing: text },
      { bypassFlood: true }
    );

    expect(sleep.mock.calls).toEqual([[2000]]);
  });

  it("never waits when flooding is allowed", async () => {
    const sleep = vi.fn(async () => {});
    const { client } = await connected({ allowFlood: true }, { sleep, now: () => 0 });

    for (let i = 0; i < 5; i++) {
      await client.message("#test", "x".repeat(385));
    }

    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("IRCClient lifecycle", () => {
  it("quit sends QUIT and dispatches DISCONNECTED", async () => {
    const { client, socket } = await connected();
    const seen: string[] = [];
    client.handlers.add(DISCONNECTED, (_client, event) => {
      seen.push(event.command);
    });

    await client.quit();

    expect(lastLine(socket)).toBe("QUIT :disconnecting...");
    expect(seen).toEqual([DISCONNECTED]);
    expect(client.isConnected()).toBe(false);
    expect(client.state).toBe(ConnectionState.IDLE);
  });

  it("quitWithMessage uses the given message", async () => {
    const { client, socket } = await connected();

    await client.quitWithMessage("gone fishing");

    expect(socket.written.filter((line) => line.startsWith("QUIT"))).toEqual(["QUIT :gone fishing"]);
  });

  it("stop releases run after DISCONNECTED and STOPPED", async () => {
    const { client, socket } = await connected();
    const seen: string[] = [];
    client.handlers.add(DISCONNECTED, () => {
      seen.push(DISCONNECTED);
    });
    client.handlers.add(STOPPED, () => {
      seen.push(STOPPED);
    });

    const running = client.run();
    await client.stop();

    await expect(running).resolves.toBeUndefined();
    expect(seen).toEqual([DISCONNECTED, STOPPED]);
    expect(socket.written.some((line) => line.startsWith("QUIT"))).toBe(false);
  });

  it("rejects a second reconnect while one is running", async () => {
    const dialer = vi.fn(async () => new MockSocket());
    const client = createClient({}, { dialer });
    await client.connect();

    const first = client.reconnect();
    await expect(client.reconnect()).rejects.toBeInstanceOf(AlreadyConnectingError);
    await first;

    expect(dialer).toHaveBeenCalledTimes(2);
    expect(client.isConnected()).toBe(true);
  });

  it("waits at least the default delay before reconnecting", async () => {
    const sleep = vi.fn(async () => {});
    const client = createClient({ reconnectDelay: 1000 }, { sleep, dialer: async () => new MockSocket() });
    await client.connect();

    await client.reconnect();

    expect(sleep).toHaveBeenCalledWith(25_000);
  });

  it("reconnects after losing the connection", async () => {
    const sockets: MockSocket[] = [];
    const dialer = vi.fn(async () => {
      const socket = new MockSocket();
      sockets.push(socket);
      return socket;
    });
    const client = createClient({ retries: 1 }, { dialer });
    await client.connect();

    sockets[0].serverClose();

    await vi.waitFor(() => expect(sockets).toHaveLength(2));
    await vi.waitFor(() => expect(client.isConnected()).toBe(true));
    expect(sockets[1].written).toContain("NICK tester");
  });

  it("gives up after the configured retries", async () => {
    const handleError = vi.fn();
    const first = new MockSocket();
    let calls = 0;
    const dialer = vi.fn(async () => {
      calls++;
      if (calls > 1) throw new Error("connection refused");
      return first;
    });
    const client = createClient({ retries: 2, handleError }, { dialer });
    await client.connect();
    const running = client.run();

    first.serverClose();

    await expect(running).rejects.toThrow("connection refused");
    expect(dialer).toHaveBeenCalledTimes(4);
    expect(handleError).toHaveBeenCalledTimes(1);
    expect(client.state).toBe(ConnectionState.IDLE);
    expect(client.isConnected()).toBe(false);
  });

  it("does not reconnect with zero retries", async () => {
    const handleError = vi.fn();
    const socket = new MockSocket();
    const dialer = vi.fn(async () => socket);
    const client = createClient({ handleError }, { dialer });
    await client.connect();
    const running = client.run();

    socket.serverClose();

    const error = await running.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DisconnectedError);
    expect(dialer).toHaveBeenCalledTimes(1);
    expect(handleError).toHaveBeenCalledWith(error);
  });

  it("reports its lifetime", () => {
    const client = createClient();
    expect(client.lifetime()).toBeGreaterThanOrEqual(0);
  });
});
