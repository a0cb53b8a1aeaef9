import pino, { type Logger, type LoggerOptions } from 'pino';

import type { AppConfig } from './schema.js';

export function createLogger(config: Pick<AppConfig, 'LOG_LEVEL'>): Logger {
  const options: LoggerOptions = {
    level: config.LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'intraday-exit-bot'
    }
  };

  return pino(options);
}
