import type { ConsumerLogger } from "./types";

/** Console logger with a `[<scope>]` prefix on every line. */
export function createConsoleLogger(scope: string): ConsumerLogger {
  return {
    log: (msg) => console.log(`[${scope}] ${msg}`),
    warn: (msg, ...args) => console.warn(`[${scope}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[${scope}] ${msg}`, ...args),
    debug: (msg, ...args) => console.debug(`[${scope}] ${msg}`, ...args),
  };
}
