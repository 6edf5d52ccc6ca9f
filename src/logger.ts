/**
 * Logger interface for scheduler, pool and bridge diagnostics.
 * Compatible with common logging libraries like winston, pino, console, etc.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A no-op logger that discards all log messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Wraps a logger so every message is prefixed with `[component]`.
 * The target is resolved on each call, which lets a late `configure({ logger })`
 * reach modules that captured their logger at import time.
 */
export function prefixLogger(resolve: () => Logger, component: string): Logger {
  const tag = `[${component}]`;
  return {
    debug: (message, ...args) => resolve().debug(`${tag} ${message}`, ...args),
    info: (message, ...args) => resolve().info(`${tag} ${message}`, ...args),
    warn: (message, ...args) => resolve().warn(`${tag} ${message}`, ...args),
    error: (message, ...args) => resolve().error(`${tag} ${message}`, ...args),
  };
}
