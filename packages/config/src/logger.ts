import { pino, type Logger } from 'pino';
import type { LoggingConfig } from './env.js';

/**
 * Process logger; pretty-printed in development like the API's
 */
export function createLogger(name: string, config: LoggingConfig): Logger {
  return pino({
    name,
    level: config.logLevel,
    transport: config.prettyLogs ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  });
}
