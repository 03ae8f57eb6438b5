// Structured logging via pino
// Agents and orchestrators take a Logger in their constructors; nothing logs through globals.

import pino, { type Logger, type LoggerOptions } from 'pino';
import { env } from './env.js';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
  base?: Record<string, unknown>;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? env.LOG_LEVEL,
    base: config.base ?? { service: 'parallel-research-api' },
  };

  if (config.pretty ?? env.NODE_ENV !== 'production') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(options);
}

/** Logger that discards everything; the default for library use and tests. */
export const silentLogger: Logger = pino({ level: 'silent' });

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
