export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  warn: noop,
  error: noop,
};

export function createConsoleLogger(tag = "scrolltether"): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, data) {
      if (data) console.debug(prefix, message, data);
      else console.debug(prefix, message);
    },
    warn(message, data) {
      if (data) console.warn(prefix, message, data);
      else console.warn(prefix, message);
    },
    error(message, data) {
      if (data) console.error(prefix, message, data);
      else console.error(prefix, message);
    },
  };
}
