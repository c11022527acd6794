/**
 * Shared logger for the record store and database layers
 * Console output always, Loki when a host is configured. Settings are read from
 * configuration on first use, so an entry point can load .env before anything logs.
 */

import winston from 'winston';
import LokiTransport from 'winston-loki';
import { getConfigManager } from '../config/app';
import { LogContext, LoggingConfig } from '../types/logging';

const SERVICE_NAME = 'bulk-write-results';

const consoleFormat = (info: winston.Logform.TransformableInfo): string => {
  const { timestamp, level, message, traceId, ...meta } = info;
  const trace = traceId ? `[${traceId}]` : '';
  const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
  return `${timestamp} ${level}: ${trace} ${message} ${metaStr}`;
};

export function buildLoggerOptions(config: LoggingConfig): winston.LoggerOptions {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(consoleFormat)
      ),
    }),
  ];

  if (config.lokiHost) {
    transports.push(
      new LokiTransport({
        host: config.lokiHost,
        labels: { service: SERVICE_NAME, environment: config.environment },
        json: true,
        format: winston.format.json(),
        replaceTimestamp: true,
        onConnectionError: err => {
          let fallbackMessage = 'Loki connection error, falling back to console';
          if (err instanceof Error) {
            fallbackMessage += `: ${err.message}`;
          }
          console.error(fallbackMessage);
        },
      })
    );
  }

  return {
    level: config.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: {
      service: SERVICE_NAME,
      version: config.version,
      environment: config.environment,
    },
    transports,
  };
}

export class Logger {
  private readonly loadConfig: () => LoggingConfig;
  private instance: winston.Logger | null = null;

  constructor(loadConfig: () => LoggingConfig) {
    this.loadConfig = loadConfig;
  }

  private get client(): winston.Logger {
    if (!this.instance) {
      this.instance = winston.createLogger(buildLoggerOptions(this.loadConfig()));
    }
    return this.instance;
  }

  public info(message: string, context?: LogContext): void {
    this.client.info(message, context);
  }

  public error(message: string, context?: LogContext & { error?: Error | string }): void {
    this.client.error(message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.client.debug(message, context);
  }

  public withTrace(traceId: string) {
    return {
      info: (message: string, context?: Omit<LogContext, 'traceId'>) =>
        this.info(message, { ...context, traceId }),
      error: (
        message: string,
        context?: Omit<LogContext, 'traceId'> & { error?: Error | string }
      ) => this.error(message, { ...context, traceId }),
      debug: (message: string, context?: Omit<LogContext, 'traceId'>) =>
        this.debug(message, { ...context, traceId }),
    };
  }
}

export const logger = new Logger(() => getConfigManager().getLoggingConfig());
export default logger;
