/**
 * Shared pino logger for the loader, the repositories and the CLI.
 *
 * Respects the LOG_LEVEL environment variable (any pino level, including
 * `silent`). Default: 'info', or 'warn' when NODE_ENV=production.
 *
 * Output is structured JSON in production and under the test runner;
 * anywhere else it goes through pino-pretty.
 */

import { pino, stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

const isProd = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';
const level = (process.env.LOG_LEVEL || (isProd ? 'warn' : 'info')).toLowerCase();

const options: LoggerOptions = {
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
};

if (!isProd && !isTest) {
  options.transport = {
    target: 'pino-pretty',
    options: { translateTime: 'SYS:standard', ignore: 'pid,hostname' },
  };
}

export const logger: Logger = pino(options);
