/**
 * Logging seam for device drivers. Defaults to the console.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Wrap a logger so every message is prefixed with a device name.
 */
export function createLogger(name: string, sink: Logger = console): Logger {
  const prefix = `[${name}]`;
  return {
    debug: (message) => sink.debug(`${prefix} ${message}`),
    info: (message) => sink.info(`${prefix} ${message}`),
    warn: (message) => sink.warn(`${prefix} ${message}`),
    error: (message) => sink.error(`${prefix} ${message}`),
  };
}
