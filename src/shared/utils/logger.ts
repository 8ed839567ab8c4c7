/**
 * Logger - Conditional logging for the engine's hot paths.
 *
 * The poll loop runs every 60ms, so `log` and `warn` stay silent unless
 * REACTIVE_AVATAR_DEBUG=1. `error` is always active.
 */

const readDebugEnv = () => {
  try {
    const raw = typeof process !== "undefined" ? process.env.REACTIVE_AVATAR_DEBUG : undefined;
    return raw === "1" || raw === "true";
  } catch {
    return false;
  }
};

const DEBUG = readDebugEnv();

const noop = (..._args: unknown[]) => {};

export const logger = {
  debugEnabled: DEBUG,
  /**
   * Debug logging - disabled unless the debug flag is set
   */
  log: DEBUG ? console.log.bind(console) : noop,

  /**
   * Warning logging - disabled unless the debug flag is set
   */
  warn: DEBUG ? console.warn.bind(console) : noop,

  /**
   * Error logging - always enabled
   */
  error: console.error.bind(console),
};

export default logger;
