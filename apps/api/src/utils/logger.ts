import pino, { type Logger } from 'pino';
import { config } from '../config/env.js';

/**
 * Root logger. Modules take a child via createLogger('Module').
 */
export const logger: Logger = pino({
  level: config.logLevel,
  base: { service: 'cobra-relay' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
