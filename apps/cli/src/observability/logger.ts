import pino, { type DestinationStream, type Logger } from 'pino';
import type { CliConfig } from '../config.js';

/**
 * JSON logger writing to the configured log file, so log lines never mix
 * with the interactive console.
 */
export function createCliLogger(config: CliConfig['log'], destination?: DestinationStream): Logger {
  return pino(
    {
      level: config.level,
      base: { service: config.service },
      timestamp: () => `,"ts":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => ({ level: label }),
      },
      messageKey: 'message',
    },
    destination ?? pino.destination({ dest: config.file, mkdir: true, sync: true }),
  );
}
