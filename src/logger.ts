export interface PagingLogger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type ConsoleLoggerOptions = {
  prefix?: string;
  /** Print debug lines too */
  verbose?: boolean;
};

/**
 * A logger that writes `[prefix] message` lines to the console.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): PagingLogger {
  const prefix = `[${options.prefix ?? 'pagewalk'}]`;
  const verbose = options.verbose ?? false;

  return {
    debug(message, ...args) {
      if (verbose) console.debug(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      console.error(`${prefix} ${message}`, ...args);
    },
  };
}

const noop = (): void => {};

export const silentLogger: PagingLogger = { debug: noop, warn: noop, error: noop };
