import { config } from "./config.js";

/**
 * Scoped console logger. `debug` lines only appear when `config.debug` is on.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

/**
 * @example
 * ```typescript
 * const log = createLogger("recycle");
 * log.debug("common length 3");   // [zipmap:recycle] common length 3
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[zipmap:${scope}]`;
  return {
    debug(message, ...details) {
      if (!config.has("debug")) return;
      console.debug(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
  };
}
