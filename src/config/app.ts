/**
 * Application configuration
 * Centralized configuration management with environment validation
 */

import { z } from 'zod';
import { LoggingConfig } from '../types/logging';

const identifierSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Must be a plain SQL identifier');

// Environment validation schema
const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).default('info'),

  // Database
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_NAME: z.string().default('record_store'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('password'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(20),

  // Record store
  RECORD_STORE_TABLE: identifierSchema.default('records'),
  RECORD_STORE_ID_COLUMN: identifierSchema.default('id'),
  RECORD_STORE_EXTERNAL_ID_FIELD: identifierSchema.optional(),

  // Monitoring
  LOKI_HOST: z.string().optional(),

  // Package details
  PACKAGE_VERSION: z.string().default('1.0.0'),
});

export type AppConfig = z.infer<typeof envSchema>;

class ConfigManager {
  private config: AppConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadAndValidateConfig(env);
  }

  /**
   * Load and validate environment configuration
   */
  private loadAndValidateConfig(env: NodeJS.ProcessEnv): AppConfig {
    const result = envSchema.safeParse(env);

    if (!result.success) {
      const errors = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Invalid configuration: ${errors.join(', ')}`);
    }

    return result.data;
  }

  /**
   * Get database configuration
   */
  public getDatabaseConfig() {
    return {
      host: this.config.DB_HOST,
      port: this.config.DB_PORT,
      database: this.config.DB_NAME,
      user: this.config.DB_USER,
      password: this.config.DB_PASSWORD,
      min: this.config.DB_POOL_MIN,
      max: this.config.DB_POOL_MAX,
    };
  }

  /**
   * Get record store configuration
   */
  public getRecordStoreConfig() {
    return {
      table: this.config.RECORD_STORE_TABLE,
      idColumn: this.config.RECORD_STORE_ID_COLUMN,
      externalIdField: this.config.RECORD_STORE_EXTERNAL_ID_FIELD,
    };
  }

  /**
   * Get logger configuration
   */
  public getLoggingConfig(): LoggingConfig {
    return {
      level: this.config.LOG_LEVEL,
      environment: this.config.NODE_ENV,
      version: this.config.PACKAGE_VERSION,
      lokiHost: this.config.LOKI_HOST,
    };
  }
}

let instance: ConfigManager | null = null;

/**
 * Shared instance, created on first use
 */
export function getConfigManager(): ConfigManager {
  if (!instance) {
    instance = new ConfigManager();
  }
  return instance;
}

export { ConfigManager };
