/**
 * @fileoverview Prefixed line logger shared by the device and the CLI.
 */

export type LogSink = (message: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  prefix?: string;
  /** Emit debug lines (off by default) */
  verbose?: boolean;
  /** Sink for debug/info lines */
  log?: LogSink;
  /** Sink for warn/error lines */
  logError?: LogSink;
}

export const DEFAULT_LOG_PREFIX = '[sdspi]';

export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = options.prefix ?? DEFAULT_LOG_PREFIX;
  const verbose = options.verbose === true;
  const log: LogSink = options.log ?? ((message) => console.log(message));
  const logError: LogSink = options.logError ?? ((message) => console.error(message));
  const format = (message: string): string => (prefix === '' ? message : `${prefix} ${message}`);

  return {
    debug: (message) => {
      if (verbose) {
        log(format(message));
      }
    },
    info: (message) => log(format(message)),
    warn: (message) => logError(format(message)),
    error: (message) => logError(format(message)),
  };
}

const noop = (): void => {
  /* noop */
};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
