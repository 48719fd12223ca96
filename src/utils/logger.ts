/**
 * Epoch Sync Logger Interface
 *
 * Provides a pluggable logging interface that can be configured
 * by consumers to integrate with their preferred logging solution.
 * Components take a Logger through their options; the functions here
 * only decide what they get by default.
 */

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Default console logger implementation
 */
const consoleLogger: Logger = {
  debug: (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.debug('[EPOCH-SYNC:DEBUG]', ...args);
  },
  info: (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.info('[EPOCH-SYNC:INFO]', ...args);
  },
  warn: (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.warn('[EPOCH-SYNC:WARN]', ...args);
  },
  error: (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.error('[EPOCH-SYNC:ERROR]', ...args);
  },
};

/**
 * No-op logger for tests or when logging is disabled
 */
const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

let currentLogger: Logger = consoleLogger;

/**
 * Get the current logger instance
 */
export function getLogger(): Logger {
  return currentLogger;
}

/**
 * Set a custom logger implementation
 */
export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

/**
 * Reset to the default console logger
 */
export function resetLogger(): void {
  currentLogger = consoleLogger;
}

/**
 * Disable all logging
 */
export function disableLogging(): void {
  currentLogger = noopLogger;
}

/**
 * Create a namespaced logger.
 *
 * The namespace is resolved against the current logger on every call, so a
 * logger created before `setLogger` still follows the replacement.
 */
export function createNamespacedLogger(namespace: string): Logger {
  return {
    debug: (...args: unknown[]) => getLogger().debug(`[${namespace}]`, ...args),
    info: (...args: unknown[]) => getLogger().info(`[${namespace}]`, ...args),
    warn: (...args: unknown[]) => getLogger().warn(`[${namespace}]`, ...args),
    error: (...args: unknown[]) => getLogger().error(`[${namespace}]`, ...args),
  };
}

// Export default logger for convenience
export const logger: Logger = {
  debug: (...args: unknown[]) => getLogger().debug(...args),
  info: (...args: unknown[]) => getLogger().info(...args),
  warn: (...args: unknown[]) => getLogger().warn(...args),
  error: (...args: unknown[]) => getLogger().error(...args),
};
