// src/logging.ts
// What: Application logger.
// How: Creates a pino logger. In development, attempts to use pino-pretty transport for readable logs.
//      Under tests the logger stays silent unless LOG_LEVEL asks otherwise.

import pino, { type Logger, type LoggerOptions } from 'pino';

const env = process.env.NODE_ENV;
const isTest = env === 'test';
const isDev = env !== 'production' && !isTest;

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDev ? 'debug' : 'info'),
};

function createLogger(): Logger {
  if (!isDev) return pino(baseOptions);
  // Try pretty transport in development; fall back to standard if unavailable.
  try {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: false,
        },
      },
    });
  } catch (err) {
    const fallback = pino(baseOptions);
    fallback.warn({ err }, 'pino-pretty unavailable; using JSON logs');
    return fallback;
  }
}

const logger: Logger = createLogger();

export type { Logger };
export default logger;
