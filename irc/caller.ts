import type { IRCClient } from "./client";
import { ALL_EVENTS } from "./commands";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { IRCMessage } from "./message";
import { copyMessage } from "./message";

/**
 * Callback invoked with the client and its own copy of the event
 */
export type HandlerFunc = (
  client: IRCClient,
  event: IRCMessage
) => void | Promise<void>;

/**
 * Lower level handler shape, for handlers that carry their own state
 */
export interface Handler {
  execute(client: IRCClient, event: IRCMessage): void | Promise<void>;
}

/**
 * A registered handler. "sync" handlers are awaited before the next event is
 * dispatched; "background" handlers are only launched.
 */
export type Registration =
  | { kind: "sync"; handler: Handler }
  | { kind: "background"; handler: Handler };

type Registry = Map<string, Map<string, Registration>>;

const LETTERS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
const UID_LENGTH = 20;

function toHandler(fn: HandlerFunc): Handler {
  return { execute: fn };
}

/**
 * Caller keeps the internal (built-in) and external (user) handler
 * registries and runs every handler matching an event.
 *
 * Registries are keyed by upper-case command, then by a random 20 letter
 * uid. Handler ids have the form "COMMAND:uid". Uniqueness is probabilistic:
 * two registrations for the same command collide with probability around
 * 52^-20, which is not checked for.
 *
 * Registration and removal are synchronous, and `execute` snapshots the
 * registries before its first await, so a snapshot never observes a
 * half-applied change.
 */
export class Caller {
  private external: Registry = new Map();
  private internal: Registry = new Map();

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Total number of external handlers
   */
  len(): number {
    let total = 0;
    for (const handlers of this.external.values()) {
      total += handlers.size;
    }
    return total;
  }

  /**
   * Number of external handlers registered for a command
   */
  count(command: string): number {
    return this.external.get(command.toUpperCase())?.size ?? 0;
  }

  toString(): string {
    let internal = 0;
    for (const handlers of this.internal.values()) {
      internal += handlers.size;
    }
    return `<Caller external:${this.len()} internal:${internal}>`;
  }

  /**
   * Register a handler function for an event. Returns the id to pass to
   * {@link Caller.remove}.
   */
  add(command: string, handler: HandlerFunc): string {
    return this.register(false, command, { kind: "sync", handler: toHandler(handler) });
  }

  /**
   * Register an object implementing {@link Handler}
   */
  addHandler(command: string, handler: Handler): string {
    return this.register(false, command, { kind: "sync", handler });
  }

  /**
   * Register a handler that runs in the background. It does not hold up
   * dispatch of the next event, so it may still be running when later
   * events are handled.
   */
  addBg(command: string, handler: HandlerFunc): string {
    return this.register(false, command, { kind: "background", handler: toHandler(handler) });
  }

  /** @internal built-in behaviour of the client */
  addInternal(command: string, handler: HandlerFunc): string {
    return this.register(true, command, { kind: "sync", handler: toHandler(handler) });
  }

  register(internal: boolean, command: string, registration: Registration): string {
    const cmd = command.toUpperCase();
    const registry = internal ? this.internal : this.external;

    let handlers = registry.get(cmd);
    if (!handlers) {
      handlers = new Map();
      registry.set(cmd, handlers);
    }

    const uid = randomUid();
    handlers.set(uid, registration);

    const id = `${cmd}:${uid}`;
    this.logger.debug(`registering handler for "${cmd}" with id "${id}" (internal: ${internal})`);
    return id;
  }

  /**
   * Remove an external handler by id. Returns false when the id is malformed
   * or does not name a registered handler.
   */
  remove(id: string): boolean {
    const sep = id.lastIndexOf(":");
    if (sep <= 0 || sep === id.length - 1) {
      return false;
    }

    const cmd = id.substring(0, sep);
    const uid = id.substring(sep + 1);

    const handlers = this.external.get(cmd);
    if (!handlers || !handlers.delete(uid)) {
      return false;
    }

    if (handlers.size === 0) {
      this.external.delete(cmd);
    }

    this.logger.debug(`removed handler "${id}"`);
    return true;
  }

  /**
   * Remove all external handlers for a command
   */
  clear(command: string): void {
    const cmd = command.toUpperCase();
    this.external.delete(cmd);
    this.logger.debug(`cleared external handlers for "${cmd}"`);
  }

  /**
   * Remove all external handlers. Internal handlers are kept.
   */
  clearAll(): void {
    this.external = new Map();
    this.logger.debug("cleared all external handlers");
  }

  clearInternal(): void {
    this.internal = new Map();
    this.logger.debug("cleared all internal handlers");
  }

  /**
   * Run every handler registered for ALL_EVENTS and for `command`, internal
   * handlers first, each on its own copy of the event. Resolves once all
   * handlers have finished; background handlers count as finished once
   * launched. There is no ordering between handlers of one event.
   */
  async execute(command: string, client: IRCClient, event: IRCMessage): Promise<void> {
    const cmd = command.toUpperCase();
    const keys = cmd === ALL_EVENTS ? [ALL_EVENTS] : [ALL_EVENTS, cmd];
    const stack: { id: string; registration: Registration }[] = [];

    for (const registry of [this.internal, this.external]) {
      for (const key of keys) {
        const handlers = registry.get(key);
        if (!handlers) continue;

        for (const [uid, registration] of handlers) {
          stack.push({ id: `${key}:${uid}`, registration });
        }
      }
    }

    await Promise.all(
      stack.map(({ id, registration }) =>
        this.run(id, cmd, registration, client, copyMessage(event))
      )
    );
  }

  private async run(
    id: string,
    command: string,
    registration: Registration,
    client: IRCClient,
    event: IRCMessage
  ): Promise<void> {
    this.logger.debug(`executing handler ${id} for event ${command}`);
    const start = Date.now();

    if (registration.kind === "background") {
      void Promise.resolve()
        .then(() => registration.handler.execute(client, event))
        .catch((error: unknown) => {
          this.logger.error(`background handler ${id} for ${command} failed:`, error);
        });
      return;
    }

    try {
      await registration.handler.execute(client, event);
    } catch (error) {
      this.logger.error(`handler ${id} for ${command} failed:`, error);
    }

    this.logger.debug(`execution of ${id} took ${Date.now() - start}ms`);
  }
}

function randomUid(): string {
  let uid = "";
  for (let i = 0; i < UID_LENGTH; i++) {
    uid += LETTERS[Math.floor(Math.random() * LETTERS.length)];
  }
  return uid;
}
