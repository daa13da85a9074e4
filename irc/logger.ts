/**
 * Minimal logger used across the client. The default implementation writes
 * through console, with debug output only when explicitly enabled.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Create a console-backed logger
 * @param prefix Prepended to every line, e.g. the server address
 * @param debug Whether debug lines are printed
 */
export function createConsoleLogger(prefix: string, debug = false): Logger {
  const tag = prefix ? `[${prefix}] ` : "";

  return {
    debug: (message, ...args) => {
      if (debug) console.log(`${tag}debug: ${message}`, ...args);
    },
    info: (message, ...args) => console.log(`${tag}${message}`, ...args),
    warn: (message, ...args) => console.warn(`${tag}${message}`, ...args),
    error: (message, ...args) => console.error(`${tag}${message}`, ...args),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
