import { Socket, connect } from "net";
import type { Duplex } from "stream";
import { connect as tlsConnect } from "tls";
import type { ConnectionOptions } from "tls";

export interface DialOptions {
  host: string;
  port: number;
  /** TLS options; plain TCP when absent */
  tls?: ConnectionOptions;
  /** Give up on the TCP/TLS handshake after this many ms */
  timeout: number;
}

/** Opens the stream a session runs over. */
export type Dialer = (options: DialOptions) => Promise<Duplex>;

/**
 * Open a plain or TLS socket and resolve once it is ready for writing
 */
export const dial: Dialer = (options) =>
  new Promise<Duplex>((resolve, reject) => {
    const readyEvent = options.tls ? "secureConnect" : "connect";
    const socket: Socket = options.tls
      ? tlsConnect({ ...options.tls, host: options.host, port: options.port })
      : connect({ host: options.host, port: options.port });

    const onError = (err: Error) => {
      socket.destroy();
      reject(err);
    };

    const onTimeout = () => {
      socket.destroy();
      reject(new Error(`connection to ${options.host}:${options.port} timed out`));
    };

    socket.setTimeout(options.timeout);
    socket.once("error", onError);
    socket.once("timeout", onTimeout);
    socket.once(readyEvent, () => {
      socket.off("error", onError);
      socket.off("timeout", onTimeout);
      // Idle detection is the reader's job from here on
      socket.setTimeout(0);
      resolve(socket);
    });
  });
