import { pino, type Logger } from 'pino';
import type { LoggingConfig } from '../config/config.js';

/**
 * Root logger for the process. Components derive their own with
 * `logger.child({ module })`.
 */
export function createLogger(config: LoggingConfig): Logger {
  return pino({
    name: 'agent-council',
    level: config.level,
  });
}
