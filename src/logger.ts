import { describeError } from "./utils.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function createLogger(tag: string, verbose = false): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message) {
      if (verbose) console.log(`${prefix} ${message}`);
    },
    info(message) {
      console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message, err) {
      if (err === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}: ${describeError(err)}`);
        if (verbose && err instanceof Error && err.stack) console.error(err.stack);
      }
    },
  };
}
