import { pino } from 'pino';
import { config } from '../config.js';

/**
 * Root structured logger. Modules derive children carrying a `module` field.
 */
export const logger = pino({
  level: config.logLevel,
  base: { service: 'user-directory' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function moduleLogger(name: string) {
  return logger.child({ module: name });
}
