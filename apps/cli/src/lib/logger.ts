import { pino, destination, type Logger, type LoggerOptions } from 'pino';
import type { LogLevel, LogFormat } from '@tx-fee-guard/config';

/**
 * Create a configured logger instance
 *
 * Logs always go to stderr; stdout carries only the report.
 */
export function createLogger(level: LogLevel = 'warn', format: LogFormat = 'pretty'): Logger {
  const options: LoggerOptions = { level };

  if (format === 'pretty') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, destination(2));
}
