export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
}

const PREFIX = '[pg-shape]';

/**
 * Console logger. Debug lines are only written when `debug` is set; warnings
 * are always written.
 */
export function createLogger(opts?: { debug?: boolean }): Logger {
  const debug = !!opts?.debug;
  return {
    debug(message, details) {
      if (!debug) return;
      if (details) console.debug(PREFIX, message, details);
      else console.debug(PREFIX, message);
    },
    warn(message, details) {
      if (details) console.warn(PREFIX, message, details);
      else console.warn(PREFIX, message);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
