import { type DestinationStream, type Logger, type LoggerOptions, pino } from 'pino';

import { LOG_LEVEL_ENV } from './specs.js';

const LOGGER_NAME = 'sip-header-parser';

export function createLogger(options: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const merged: LoggerOptions = {
    name: LOGGER_NAME,
    level: process.env[LOG_LEVEL_ENV] ?? 'silent',
    ...options,
  };
  return destination === undefined ? pino(merged) : pino(merged, destination);
}

let defaultLogger: Logger | null = null;

export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
