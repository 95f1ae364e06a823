/**
 * Simple logger interface for the edge router.
 * @packageDocumentation
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Print debug lines (default: false) */
  verbose?: boolean;
  /** Line prefix (default: "[edge-router]") */
  prefix?: string;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const prefix = opts.prefix ?? '[edge-router]';
  const verbose = opts.verbose ?? false;
  return {
    debug: (msg, ...args) => {
      if (verbose) console.log(`${prefix} ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix} ${msg}`, ...args),
  };
}

export const defaultLogger: Logger = createLogger();

/** Discards everything. Handy in tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
