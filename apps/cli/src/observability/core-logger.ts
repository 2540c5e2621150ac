import type { CoreLogger } from '@vacancy-scout/vacancy-sdk';
import type { Logger } from 'pino';

export function createCoreLogger(logger: Logger): CoreLogger {
  return {
    debug: (context, message) => logger.debug(context, message),
    info: (context, message) => logger.info(context, message),
    warn: (context, message) => logger.warn(context, message),
    error: (context, message) => logger.error(context, message),
  };
}
