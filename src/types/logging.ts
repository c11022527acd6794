/**
 * Logging-related type definitions
 */

export interface LogContext {
  traceId?: string;
  [key: string]: unknown;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'verbose';

export interface LoggingConfig {
  level: LogLevel;
  environment: string;
  version: string;
  /** Loki push endpoint; console only when absent */
  lokiHost?: string;
}
