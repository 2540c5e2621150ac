import type { CoreLogger } from './types.js';

/**
 * Fallback sink used when a component is built without a logger.
 */
export const consoleLogger: CoreLogger = {
  debug: (context, message) => console.debug(message, context),
  info: (context, message) => console.info(message, context),
  warn: (context, message) => console.warn(message, context),
  error: (context, message) => console.error(message, context),
};
