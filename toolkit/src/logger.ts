export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Console logger that prefixes every line with `[scope]`. `debug` lines are
 * only written when `verbose` is set.
 */
export const createLogger = (scope: string, options: LoggerOptions = {}): Logger => {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (options.verbose) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => console.log(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
