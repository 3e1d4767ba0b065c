/**
 * Debug Logger Utility
 *
 * Conditional console logging for the relay.
 * Nothing is written unless debug mode is enabled.
 */

/**
 * Debug logger interface
 */
export interface DebugLogger {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}

const PREFIX = "[AvatarRelay]";

/**
 * Global debug state
 */
let globalDebugEnabled = false;

/**
 * Set global debug state
 */
export const setDebugEnabled = (enabled: boolean): void => {
  globalDebugEnabled = enabled;
};

/**
 * Check if debug is enabled
 */
export const isDebugEnabled = (): boolean => globalDebugEnabled;

/**
 * Convenience logger; a no-op while debug is off
 */
export const debug: DebugLogger = {
  log: (...args: unknown[]): void => {
    if (globalDebugEnabled) {
      console.log(PREFIX, ...args);
    }
  },
  error: (...args: unknown[]): void => {
    if (globalDebugEnabled) {
      console.error(PREFIX, ...args);
    }
  },
  warn: (...args: unknown[]): void => {
    if (globalDebugEnabled) {
      console.warn(PREFIX, ...args);
    }
  },
};
