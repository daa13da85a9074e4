import type { Duplex } from "stream";
import { StringDecoder } from "string_decoder";

import { AbortError, DecodeError, EncodeError, toError } from "./errors";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { IRCMessage } from "./message";
import { MAX_LINE_LENGTH, createMessage, messageLength, parseMessage } from "./message";

export interface DecodeOptions {
  /** Read deadline in ms; the read fails with a DecodeError when it passes */
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Source of inbound messages. `null` means a line carrying nothing to
 * dispatch (blank or unparsable); end of stream is a DecodeError.
 */
export interface Decoder {
  decode(options?: DecodeOptions): Promise<IRCMessage | null>;
  /** Stop reading from the underlying stream. */
  dispose(): void;
}

/** Sink for outbound messages. */
export interface Encoder {
  encode(message: IRCMessage): Promise<void>;
}

/** The stream is paused once this many lines wait to be decoded */
export const MAX_BUFFERED_LINES = 32;

/** Reading resumes once no more than this many are left */
export const RESUME_BUFFERED_LINES = 8;

/**
 * Splits a byte stream into CRLF (or bare LF) terminated lines and parses
 * each into an IRCMessage. Supports one pending decode at a time.
 *
 * Reading stops while MAX_BUFFERED_LINES lines are waiting, so a consumer
 * that stops calling decode() also stops the socket.
 */
export class LineDecoder implements Decoder {
  private readonly text = new StringDecoder("utf8");
  private buffer = "";
  private lines: string[] = [];
  private paused = false;
  private failure: DecodeError | null = null;
  private wake: (() => void) | null = null;

  private readonly onData = (chunk: Buffer | string) => this.handleData(chunk);
  private readonly onEnd = () => this.fail(new DecodeError("connection closed by server"));
  private readonly onClose = () => this.fail(new DecodeError("connection closed"));
  private readonly onError = (err: Error) =>
    this.fail(new DecodeError(`connection error: ${err.message}`, { cause: err }));

  constructor(
    private readonly stream: Duplex,
    private readonly logger: Logger = silentLogger
  ) {
    stream.on("data", this.onData);
    stream.on("end", this.onEnd);
    stream.on("close", this.onClose);
    stream.on("error", this.onError);
  }

  async decode(options: DecodeOptions = {}): Promise<IRCMessage | null> {
    const line = await this.nextLine(options);

    if (line.trim() === "") {
      return null;
    }

    try {
      return parseMessage(line);
    } catch (error) {
      this.logger.debug(`dropping malformed line ${JSON.stringify(line)}: ${toError(error).message}`);
      return null;
    }
  }

  /** Lines read from the stream and not yet decoded */
  get pending(): number {
    return this.lines.length;
  }

  /** Stop listening to the stream. */
  dispose(): void {
    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("close", this.onClose);
    this.stream.off("error", this.onError);
  }

  private nextLine({ timeout, signal }: DecodeOptions): Promise<string> {
    const ready = this.shiftLine();
    if (ready !== undefined) return Promise.resolve(ready);
    if (this.failure) return Promise.reject(this.failure);
    if (signal?.aborted) return Promise.reject(new AbortError());

    return new Promise<string>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.wake = null;
      };

      const onAbort = () => {
        cleanup();
        reject(new AbortError());
      };

      this.wake = () => {
        const line = this.shiftLine();
        if (line !== undefined) {
          cleanup();
          resolve(line);
        } else if (this.failure) {
          cleanup();
          reject(this.failure);
        }
      };

      if (timeout !== undefined && timeout > 0) {
        timer = setTimeout(() => {
          cleanup();
          reject(new DecodeError(`read timed out after ${timeout}ms`));
        }, timeout);
      }

      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private handleData(chunk: Buffer | string): void {
    this.buffer += typeof chunk === "string" ? chunk : this.text.write(chunk);

    let newline = this.buffer.indexOf("\n");
    while (newline !== -1) {
      this.lines.push(this.buffer.substring(0, newline).replace(/\r$/, ""));
      this.buffer = this.buffer.substring(newline + 1);
      newline = this.buffer.indexOf("\n");
    }

    if (!this.paused && this.lines.length >= MAX_BUFFERED_LINES) {
      this.paused = true;
      this.stream.pause();
    }

    this.wake?.();
  }

  private shiftLine(): string | undefined {
    const line = this.lines.shift();

    if (this.paused && this.lines.length <= RESUME_BUFFERED_LINES) {
      this.paused = false;
      this.stream.resume();
    }

    return line;
  }

  private fail(error: DecodeError): void {
    if (this.failure) return;
    this.failure = error;
    this.wake?.();
  }
}

/**
 * Writes messages to a stream as CRLF-terminated lines.
 */
export class LineEncoder implements Encoder {
  constructor(private readonly stream: Duplex) {}

  encode(message: IRCMessage): Promise<void> {
    const problem = checkOutbound(message);
    if (problem) {
      return Promise.reject(new EncodeError(problem));
    }

    if (this.stream.destroyed || !this.stream.writable) {
      return Promise.reject(new EncodeError("connection is closed"));
    }

    return new Promise<void>((resolve, reject) => {
      this.stream.write(createMessage(message), (err) => {
        if (err) {
          reject(new EncodeError(`write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * Reason a message cannot be sent, or null when it is fine. The line length
 * limit applies to everything after the tags section.
 */
export function checkOutbound(message: IRCMessage): string | null {
  if (message.command === "") {
    return "message has no command";
  }

  const fields = [message.command, ...message.params, message.trailing ?? ""];
  if (fields.some((field) => /[\r\n\0]/.test(field))) {
    return "message contains a line break or NUL";
  }

  const length = messageLength({ ...message, tags: new Map() });
  if (length > MAX_LINE_LENGTH) {
    return `line is ${length} bytes, limit is ${MAX_LINE_LENGTH}`;
  }

  return null;
}
