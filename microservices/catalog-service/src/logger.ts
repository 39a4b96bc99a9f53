import winston from 'winston';
import LokiTransport from 'winston-loki';
import { SERVICE_NAME, type LogLevel } from './config';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: LogLevel;
  /** Loki push endpoint; the Loki transport is only attached when set. */
  lokiHost?: string;
  environment?: string;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const consoleTransport = new winston.transports.Console({
    format: winston.format.simple(),
  });

  const transports = options.lokiHost
    ? [
        consoleTransport,
        new LokiTransport({
          host: options.lokiHost,
          labels: {
            service: SERVICE_NAME,
            environment: options.environment ?? 'development',
          },
          json: true,
        }),
      ]
    : [consoleTransport];

  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    defaultMeta: { service: SERVICE_NAME },
    transports,
  });
}
