export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: (line: string) => void;
}

// Logs go to stderr so a report printed to stdout stays clean.
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const sink = options.sink ?? ((line: string) => console.error(line));

  const write = (message: string) => sink(`[${scope}] ${message}`);

  return {
    debug(message) {
      if (verbose) write(message);
    },
    info(message) {
      write(message);
    },
    warn(message) {
      write(`warning: ${message}`);
    },
    error(message) {
      write(`error: ${message}`);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, { verbose, sink });
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
