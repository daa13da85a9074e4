import { registerBuiltins } from "./builtins";
import type { BuiltinFlags } from "./builtins";
import { Caller } from "./caller";
import { LineDecoder, LineEncoder } from "./codec";
import {
  AWAY,
  CAP,
  DISCONNECTED,
  INITIALIZED,
  INVITE,
  JOIN,
  KICK,
  LIST,
  NICK,
  NOTICE,
  OPER,
  PART,
  PASS,
  PING,
  PONG,
  PRIVMSG,
  QUIT,
  STOPPED,
  TOPIC,
  USER,
  WHO,
  WHOIS,
  WHOWAS,
} from "./commands";
import type { IRCClientConfig, ResolvedConfig } from "./config";
import { effectiveReconnectDelay, resolveConfig, validateConfig } from "./config";
import { CTCP, decodeCTCP, encodeCTCPRaw } from "./ctcp";
import {
  AlreadyConnectingError,
  DisconnectedError,
  EncodeError,
  InvalidTargetError,
  NotConnectedError,
  TrackingDisabledError,
  isErrorCode,
  toError,
} from "./errors";
import type { Logger } from "./logger";
import { createConsoleLogger } from "./logger";
import type { IRCMessage } from "./message";
import {
  makeMessage,
  messageLength,
  messageToString,
  parseMessage,
  splitTargets,
} from "./message";
import { Mutex } from "./mutex";
import { EventQueue } from "./queue";
import { SessionState } from "./state";
import type { Dialer } from "./transport";
import { dial } from "./transport";
import { isValidChannel, isValidNick, isValidUser } from "./validate";

/** Read deadline; a connection silent for this long is considered dead */
export const READ_TIMEOUT = 300_000;

/** Capacity of the queue between the reader and the dispatcher */
export const EVENT_QUEUE_CAPACITY = 100;

/**
 * Connection state enum
 */
export enum ConnectionState {
  IDLE = "idle",
  CONNECTING = "connecting",
  CONNECTED = "connected",
  DISCONNECTING = "disconnecting",
  RECONNECTING = "reconnecting",
}

/**
 * Collaborators that can be swapped out, mostly for tests
 */
export interface ClientOptions {
  logger?: Logger;
  /** Opens the transport when config.conn is not set */
  dialer?: Dialer;
  /** Waits between reconnection attempts and for the rate limiter */
  sleep?: (ms: number) => Promise<void>;
  /** Clock for the rate limiter, in ms */
  now?: () => number;
  queueCapacity?: number;
}

export interface SendOptions {
  /** Skip the rate limiter for this message */
  bypassFlood?: boolean;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * IRCClient runs a single connection to an IRC server.
 *
 * Once connected, a reader task decodes lines onto a bounded queue and a
 * dispatch task hands each event to the registered handlers, waiting for all
 * of them before taking the next one. Lost connections are re-established
 * according to `retries` and `reconnectDelay`.
 */
export class IRCClient {
  /** Client configuration, with defaults applied */
  readonly config: ResolvedConfig;

  /** Internal and user event handlers */
  readonly handlers: Caller;

  /** CTCP handlers */
  readonly ctcp: CTCP;

  private readonly logger: Logger;
  private readonly dialer: Dialer;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: (() => number) | undefined;
  private readonly events: EventQueue<IRCMessage>;
  private readonly initTime = Date.now();

  /** Serializes connect against cleanup */
  private readonly lifecycle = new Mutex();

  private _session: SessionState;
  private _state: ConnectionState = ConnectionState.IDLE;
  private readonly flags: BuiltinFlags = {
    tracking: true,
    capTracking: true,
    nickCollision: true,
  };

  /** Failed reconnect attempts since the last successful connect */
  private tries = 0;
  private reconnecting = false;

  private closeRead: AbortController | null = null;
  private closeExec: AbortController | null = null;
  private closeLoop = new AbortController();
  private fatal: Error | null = null;

  /**
   * Create a new client. Nothing happens on the network until connect().
   */
  constructor(config: IRCClientConfig, options: ClientOptions = {}) {
    this.config = resolveConfig(config);
    this.logger =
      options.logger ?? createConsoleLogger(this.server(), this.config.debug);
    this.dialer = options.dialer ?? dial;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now;
    this.events = new EventQueue(options.queueCapacity ?? EVENT_QUEUE_CAPACITY);

    this._session = this.newSession();
    this.handlers = new Caller(this.logger);
    this.ctcp = new CTCP(this.logger);

    this.registerBuiltins();
    this.ctcp.addDefaultHandlers();
  }

  /**
   * Get the current connection state
   */
  get state(): ConnectionState {
    return this._state;
  }

  /**
   * Connection-scoped state of the live session
   * @internal used by the built-in handlers
   */
  get session(): SessionState {
    return this._session;
  }

  /**
   * host:port of the server
   */
  server(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  /**
   * Milliseconds since the client was created
   */
  lifetime(): number {
    return Date.now() - this.initTime;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Connect to the server, register, and start processing events
   * @throws ConfigError before touching the network if the config is invalid
   */
  async connect(): Promise<void> {
    validateConfig(this.config);

    await this.cleanup(false);
    await this.lifecycle.runExclusive(() => this.open());
  }

  /**
   * Drop the current connection and connect again. At least one attempt is
   * made even when `retries` is 0.
   * @throws AlreadyConnectingError if a reconnect is already running
   */
  reconnect(): Promise<void> {
    return this.reconnectWith(true);
  }

  /**
   * Block until stop() is called. Rejects with the last error when the
   * connection is lost and every reconnection attempt has failed.
   */
  run(): Promise<void> {
    if (this.closeLoop.signal.aborted) {
      this.closeLoop = new AbortController();
    }
    this.fatal = null;

    const { signal } = this.closeLoop;
    return new Promise<void>((resolve, reject) => {
      signal.addEventListener(
        "abort",
        () => {
          if (this.fatal) {
            reject(this.fatal);
          } else {
            resolve();
          }
        },
        { once: true }
      );
    });
  }

  /**
   * Send QUIT and disconnect. A caller blocked in run() keeps waiting.
   */
  quit(): Promise<void> {
    return this.quitWith(true);
  }

  /**
   * Disconnect with a quit message
   */
  async quitWithMessage(message: string): Promise<void> {
    await this.sendQuit(message);
    await this.quitWith(false);
  }

  /**
   * Disconnect without sending QUIT, dispatch STOPPED and release run().
   * Handlers already running are not interrupted.
   */
  async stop(): Promise<void> {
    await this.quitWith(false);
    await this.runHandlers(makeMessage(STOPPED, [], this.server()));
    await this.cleanup(true);
  }

  /**
   * Open the transport and register. Runs under the lifecycle lock.
   */
  private async open(): Promise<void> {
    // A connect that raced ours may have installed a session since our cleanup
    this.closeRead?.abort();
    this.closeExec?.abort();
    this.closeRead = null;
    this.closeExec = null;
    this._session.close();

    this.setState(ConnectionState.CONNECTING);

    const session = this.newSession();
    this._session = session;
    // Events read from a previous connection are stale now
    this.events.clear();

    this.logger.debug(`connecting to ${this.server()}...`);

    try {
      const conn =
        this.config.conn ??
        (await this.dialer({
          host: this.config.host,
          port: this.config.port,
          tls: this.config.tls ?? (this.config.secure ? {} : undefined),
          timeout: this.config.connectionTimeout,
        }));

      session.conn = conn;
      session.decoder = new LineDecoder(conn, this.logger);
      session.encoder = new LineEncoder(conn);

      await this.events.put(makeMessage(INITIALIZED, [], this.server()));

      for (const event of this.connectMessages()) {
        await this.write(event);
      }

      // Ask for the capability list with the highest version we speak
      if (this.flags.tracking && this.flags.capTracking) {
        await this.write(makeMessage(CAP, ["LS", "302"]));
      }
    } catch (error) {
      session.close();
      this.setState(this.reconnecting ? ConnectionState.RECONNECTING : ConnectionState.IDLE);
      throw error;
    }

    this.tries = 0;
    session.connectTime = new Date();
    session.connected = true;
    this.setState(ConnectionState.CONNECTED);

    const read = new AbortController();
    const exec = new AbortController();
    this.closeRead = read;
    this.closeExec = exec;

    void this.readLoop(session, read.signal).catch((error: unknown) => {
      this.logger.error("read loop failed:", error);
    });
    void this.execLoop(exec.signal).catch((error: unknown) => {
      this.logger.error("dispatch loop failed:", error);
    });
  }

  /**
   * Registration messages: PASS (if any), NICK, USER
   */
  private connectMessages(): IRCMessage[] {
    const events: IRCMessage[] = [];

    if (this.config.password) {
      events.push({ ...makeMessage(PASS, [this.config.password]), sensitive: true });
    }

    events.push(makeMessage(NICK, [this.config.nickname]));
    events.push(makeMessage(USER, [this.config.username, "+iw", "*"], this.config.realname));

    return events;
  }

  private async reconnectWith(remoteInvoked: boolean): Promise<void> {
    if (this.reconnecting) {
      throw new AlreadyConnectingError();
    }
    this.reconnecting = true;

    try {
      await this.cleanup(false);

      if (this.config.retries < 1 && !remoteInvoked) {
        throw new DisconnectedError();
      }

      const delay = effectiveReconnectDelay(this.config.reconnectDelay);
      this.logger.info(`reconnecting to ${this.server()} in ${delay}ms`);
      await this.sleep(delay);

      for (;;) {
        const error = await this.connect().then(
          () => null,
          (reason: unknown) => toError(reason)
        );
        if (!error) return;

        if (isErrorCode(error, "INVALID_CONFIG") || this.tries >= this.config.retries) {
          await this.cleanup(false);
          throw error;
        }

        this.tries++;
        this.logger.info(
          `reconnecting to ${this.server()} in ${delay}ms (${this.tries} tries)`
        );
        await this.sleep(delay);
      }
    } finally {
      this.reconnecting = false;
      if (this._state === ConnectionState.RECONNECTING) {
        this.setState(ConnectionState.IDLE);
      }
    }
  }

  private async quitWith(sendMessage: boolean): Promise<void> {
    if (sendMessage) {
      await this.sendQuit("disconnecting...");
    }

    this.setState(ConnectionState.DISCONNECTING);
    await this.runHandlers(makeMessage(DISCONNECTED, [], this.server()));
    await this.cleanup(false);
  }

  private async sendQuit(message: string): Promise<void> {
    try {
      await this.send(makeMessage(QUIT, [], message));
    } catch (error) {
      this.logger.debug(`could not send QUIT: ${toError(error).message}`);
    }
  }

  /**
   * Stop the reader and dispatcher and close the transport. With `all`, a
   * caller blocked in run() is released too. Safe to call at any time.
   */
  private async cleanup(all: boolean): Promise<void> {
    await this.lifecycle.runExclusive(() => {
      this.closeRead?.abort();
      this.closeExec?.abort();
      this.closeRead = null;
      this.closeExec = null;

      this._session.close();

      if (all) {
        this.closeLoop.abort();
      }

      this.setState(this.reconnecting ? ConnectionState.RECONNECTING : ConnectionState.IDLE);
    });
  }

  /**
   * Decode lines until cancelled. A read failure hands over to reconnect;
   * if that gives up, the error goes to config.handleError and run().
   */
  private async readLoop(session: SessionState, signal: AbortSignal): Promise<void> {
    const decoder = session.decoder;
    if (!decoder) return;

    while (!signal.aborted) {
      let event: IRCMessage | null;

      try {
        event = await decoder.decode({ timeout: READ_TIMEOUT, signal });
      } catch (error) {
        if (signal.aborted) return;

        this.logger.warn(`read from ${this.server()} failed: ${toError(error).message}`);
        await this.recover();
        return;
      }

      if (!event) continue;

      try {
        await this.events.put(event, signal);
      } catch (error) {
        if (isErrorCode(error, "ABORTED")) return;
        throw error;
      }
    }
  }

  private async recover(): Promise<void> {
    try {
      await this.reconnectWith(false);
    } catch (error) {
      // Someone else is already handling it
      if (isErrorCode(error, "ALREADY_CONNECTING")) return;

      const err = toError(error);
      this.logger.error(`giving up on ${this.server()}: ${err.message}`);
      this.config.handleError?.(err);

      this.fatal = err;
      this.closeLoop.abort();
    }
  }

  /**
   * Dispatch queued events one at a time until cancelled
   */
  private async execLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let event: IRCMessage;

      try {
        event = await this.events.take(signal);
      } catch (error) {
        if (isErrorCode(error, "ABORTED")) return;
        throw error;
      }

      await this.runHandlers(event);
    }
  }

  /**
   * Run every handler for an event and wait for them: ALL_EVENTS and
   * command handlers first, then CTCP handlers if the event carries CTCP.
   */
  async runHandlers(event: IRCMessage): Promise<void> {
    if (!event.sensitive) {
      this.logger.debug(`< ${messageToString(event)}`);
    }

    await this.handlers.execute(event.command, this, event);

    const ctcp = decodeCTCP(event);
    if (ctcp) {
      await this.ctcp.call(ctcp, this);
    }
  }

  // ---------------------------------------------------------------------------
  // Sending
  // ---------------------------------------------------------------------------

  /**
   * Send an event to the server, waiting on the rate limiter first unless
   * flooding is allowed. Use runHandlers() to trigger handlers instead.
   * @throws EncodeError when there is no open connection or the event cannot be encoded
   */
  async send(event: IRCMessage, options: SendOptions = {}): Promise<void> {
    if (!this.config.allowFlood && !options.bypassFlood) {
      const delay = this._session.limiter.delayFor(messageLength(event));
      if (delay > 0) {
        await this.sleep(delay);
      }
    }

    await this.write(event);
  }

  private async write(event: IRCMessage): Promise<void> {
    const session = this._session;
    session.lastWrite = new Date();

    if (!event.sensitive) {
      this.logger.debug(`> ${messageToString(event)}`);
    }

    if (!session.encoder) {
      throw new EncodeError("client has no open connection");
    }

    await session.encoder.encode(event);
  }

  /**
   * Send a raw line, without CR or LF
   */
  async sendRaw(raw: string): Promise<void> {
    let event: IRCMessage;
    try {
      event = parseMessage(raw);
    } catch (error) {
      throw new EncodeError(`invalid event: ${raw}`, { cause: toError(error) });
    }

    await this.send(event);
  }

  /**
   * Send a PRIVMSG to a channel, service or user
   */
  async message(target: string, message: string): Promise<void> {
    assertMessageTarget(target);
    await this.send(makeMessage(PRIVMSG, [target], message));
  }

  /**
   * Send a NOTICE to a channel, service or user
   */
  async notice(target: string, message: string): Promise<void> {
    assertMessageTarget(target);
    await this.send(makeMessage(NOTICE, [target], message));
  }

  /**
   * Send a CTCP ACTION (/me)
   */
  async action(target: string, message: string): Promise<void> {
    assertMessageTarget(target);
    await this.send(makeMessage(PRIVMSG, [target], `\x01ACTION ${message}\x01`));
  }

  /**
   * Send a CTCP query, inside a PRIVMSG
   */
  async sendCTCP(target: string, type: string, message: string): Promise<void> {
    const out = encodeCTCPRaw(type, message);
    if (out === "") {
      throw new EncodeError(`invalid CTCP type: ${type}`);
    }

    await this.message(target, out);
  }

  /**
   * Send a CTCP reply, inside a NOTICE
   */
  async sendCTCPReply(target: string, type: string, message: string): Promise<void> {
    const out = encodeCTCPRaw(type, message);
    if (out === "") {
      throw new EncodeError(`invalid CTCP type: ${type}`);
    }

    await this.notice(target, out);
  }

  /**
   * Join channels, packing as many into one JOIN as the line length allows
   */
  async join(...channels: string[]): Promise<void> {
    channels.forEach(assertChannel);

    for (const batch of splitTargets(JOIN, channels)) {
      await this.send(makeMessage(JOIN, [batch]));
    }
  }

  /**
   * Join a channel protected by a key
   */
  async joinKey(channel: string, key: string): Promise<void> {
    assertChannel(channel);
    await this.send(makeMessage(JOIN, [channel, key]));
  }

  /**
   * Leave a channel
   */
  async part(channel: string): Promise<void> {
    assertChannel(channel);
    await this.send(makeMessage(PART, [channel]));
  }

  /**
   * Leave a channel with a parting message
   */
  async partMessage(channel: string, message: string): Promise<void> {
    assertChannel(channel);
    await this.send(makeMessage(PART, [channel], message));
  }

  /**
   * Set a channel topic. The topic length is not checked.
   */
  async topic(channel: string, message: string): Promise<void> {
    await this.send(makeMessage(TOPIC, [channel], message));
  }

  /**
   * WHO query using WHOX ("%tcuhnr,2")
   */
  async who(target: string): Promise<void> {
    if (!isValidNick(target) && !isValidChannel(target) && !isValidUser(target)) {
      throw new InvalidTargetError(target);
    }

    await this.send(makeMessage(WHO, [target, "%tcuhnr,2"]));
  }

  async whois(nick: string): Promise<void> {
    assertNick(nick);
    await this.send(makeMessage(WHOIS, [nick]));
  }

  /**
   * WHOWAS query returning at most `amount` entries
   */
  async whowas(nick: string, amount: number): Promise<void> {
    assertNick(nick);
    await this.send(makeMessage(WHOWAS, [nick, String(amount)]));
  }

  async ping(id: string): Promise<void> {
    await this.send(makeMessage(PING, [id]));
  }

  async pong(id: string): Promise<void> {
    await this.send(makeMessage(PONG, [id]));
  }

  /**
   * Authenticate as an IRC operator. Never logged.
   */
  async oper(user: string, password: string): Promise<void> {
    await this.send({ ...makeMessage(OPER, [user, password]), sensitive: true });
  }

  /**
   * Kick a user from a channel. An empty reason is not sent.
   */
  async kick(channel: string, nick: string, reason = ""): Promise<void> {
    assertChannel(channel);
    assertNick(nick);

    await this.send(
      makeMessage(KICK, [channel, nick], reason === "" ? undefined : reason)
    );
  }

  async invite(channel: string, nick: string): Promise<void> {
    assertChannel(channel);
    assertNick(nick);
    await this.send(makeMessage(INVITE, [nick, channel]));
  }

  /**
   * Mark the client as away. An empty reason marks it back instead.
   */
  async away(reason: string): Promise<void> {
    if (reason === "") {
      await this.back();
      return;
    }

    await this.send(makeMessage(AWAY, [], reason));
  }

  async back(): Promise<void> {
    await this.send(makeMessage(AWAY));
  }

  /**
   * LIST channels and topics. With no channels, lists the whole network.
   */
  async list(...channels: string[]): Promise<void> {
    if (channels.length === 0) {
      await this.send(makeMessage(LIST));
      return;
    }

    channels.forEach(assertChannel);

    for (const batch of splitTargets(LIST, channels)) {
      await this.send(makeMessage(LIST, [batch]));
    }
  }

  /**
   * Change nickname
   */
  async nick(name: string): Promise<void> {
    assertNick(name);

    this._session.nick = name;
    await this.send(makeMessage(NICK, [name]));
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  isConnected(): boolean {
    return this._session.connected;
  }

  /**
   * Time at which the current connection was established
   * @throws NotConnectedError
   */
  uptime(): Date {
    const since = this._session.connectTime;
    if (!this._session.connected || !since) {
      throw new NotConnectedError();
    }

    return since;
  }

  /**
   * Milliseconds since the current connection was established
   * @throws NotConnectedError
   */
  connectionDuration(): number {
    return Date.now() - this.uptime().getTime();
  }

  /**
   * Current nickname
   * @throws TrackingDisabledError
   */
  getNick(): string {
    this.assertTracking("getNick");
    return this._session.nick || this.config.nickname;
  }

  /**
   * Channels the client is in, lower-cased
   * @throws TrackingDisabledError
   */
  channels(): string[] {
    this.assertTracking("channels");
    return [...(this._session.channels ?? [])];
  }

  /**
   * @throws TrackingDisabledError
   */
  isInChannel(channel: string): boolean {
    this.assertTracking("isInChannel");
    return this._session.channels?.has(channel.toLowerCase()) ?? false;
  }

  /**
   * A server option from ISUPPORT or MYINFO, e.g. "NICKLEN"
   * @throws TrackingDisabledError
   */
  getServerOption(key: string): string | undefined {
    this.assertTracking("getServerOption");
    return this._session.serverOptions.get(key);
  }

  /** Name the server identifies as, or "" */
  serverName(): string {
    this.assertTracking("serverName");
    return this._session.serverOptions.get("SERVER") ?? "";
  }

  /** Network name, e.g. "ExampleNet", or "" */
  networkName(): string {
    this.assertTracking("networkName");
    return this._session.serverOptions.get("NETWORK") ?? "";
  }

  /** Server software version, or "" */
  serverVersion(): string {
    this.assertTracking("serverVersion");
    return this._session.serverOptions.get("VERSION") ?? "";
  }

  /** Message of the day, or "" */
  serverMOTD(): string {
    this.assertTracking("serverMOTD");
    return this._session.motd;
  }

  /** Capabilities acknowledged by the server */
  enabledCaps(): string[] {
    this.assertTracking("enabledCaps");
    return [...this._session.enabledCaps].sort();
  }

  // ---------------------------------------------------------------------------
  // Feature toggles (one way)
  // ---------------------------------------------------------------------------

  /**
   * Disable channel, server option and capability tracking. Tracking
   * queries throw afterwards. Cannot be undone.
   */
  disableTracking(): void {
    if (!this.flags.tracking) return;

    this.logger.debug("disabling tracking");
    this.flags.tracking = false;
    this._session.channels = null;
    this.resetBuiltins();
  }

  /**
   * Disable capability negotiation; CAP is left to the user's handlers
   */
  disableCapTracking(): void {
    if (!this.flags.capTracking) return;

    this.logger.debug("disabling CAP tracking");
    this.flags.capTracking = false;
    this.resetBuiltins();
  }

  /**
   * Stop answering nickname collisions by appending "_"
   */
  disableNickCollision(): void {
    if (!this.flags.nickCollision) return;

    this.logger.debug("disabling nick collision prevention");
    this.flags.nickCollision = false;
    this.resetBuiltins();
  }

  private resetBuiltins(): void {
    this.handlers.clearInternal();
    this.registerBuiltins();
  }

  private registerBuiltins(): void {
    registerBuiltins(this.handlers, { ...this.flags });
  }

  private assertTracking(method: string): void {
    if (!this.flags.tracking) {
      throw new TrackingDisabledError(method);
    }
  }

  private newSession(): SessionState {
    const session = new SessionState(this.config.rateLimit, this.now);
    if (!this.flags.tracking) {
      session.channels = null;
    }
    return session;
  }

  private setState(state: ConnectionState): void {
    if (this._state !== state) {
      this.logger.debug(`state ${this._state} -> ${state}`);
      this._state = state;
    }
  }
}

function assertChannel(channel: string): void {
  if (!isValidChannel(channel)) {
    throw new InvalidTargetError(channel);
  }
}

function assertNick(nick: string): void {
  if (!isValidNick(nick)) {
    throw new InvalidTargetError(nick);
  }
}

function assertMessageTarget(target: string): void {
  if (!isValidNick(target) && !isValidChannel(target)) {
    throw new InvalidTargetError(target);
  }
}
