import type { Duplex } from "stream";

import type { Decoder, Encoder } from "./codec";
import type { RateLimitOptions } from "./ratelimit";
import { RateLimiter } from "./ratelimit";

/**
 * Connection-scoped data. The client builds a fresh SessionState for every
 * connection attempt, so discarding it is the only reset there is.
 */
export class SessionState {
  /** Open stream, owned by this state */
  conn: Duplex | null = null;
  decoder: Decoder | null = null;
  encoder: Encoder | null = null;

  connected = false;
  /** Set once the server has sent RPL_WELCOME */
  registered = false;
  connectTime: Date | null = null;
  lastWrite: Date | null = null;

  /** Nickname the server knows us by, once known */
  nick = "";

  /** Lower-cased names of joined channels; null when tracking is disabled */
  channels: Set<string> | null = new Set();

  /** ISUPPORT and MYINFO values, e.g. NETWORK, SERVER, VERSION */
  serverOptions = new Map<string, string>();

  motd = "";

  /** Capabilities offered in CAP LS, with their values */
  offeredCaps = new Map<string, string>();
  enabledCaps = new Set<string>();

  readonly limiter: RateLimiter;

  constructor(rateLimit: RateLimitOptions = {}, now?: () => number) {
    this.limiter = new RateLimiter(rateLimit, now);
  }

  /**
   * Detach the decoder and close the stream if one is open. Safe to call
   * repeatedly.
   */
  close(): void {
    this.connected = false;
    this.decoder?.dispose();

    if (this.conn && !this.conn.destroyed) {
      this.conn.destroy();
    }
  }
}
