/**
 * Database configuration and connection management
 * Owns the pg pool the record store writes through
 */

import { Pool, PoolClient } from 'pg';
import { DatabaseConfig } from '../types/database';
import { logger } from '../utils/logger';
import { DatabaseError } from '../utils/error';

import { getConfigManager } from './app';

/**
 * Minimal client surface used inside transactions
 */
export type QueryClient = Pick<PoolClient, 'query'>;

export interface TransactionRunner {
  transaction<T>(callback: (client: QueryClient) => Promise<T>, traceId?: string): Promise<T>;
}

export class Database implements TransactionRunner {
  private pool: Pool | null = null;
  private isConnected = false;
  private config: DatabaseConfig | null = null;

  /**
   * Load database configuration from environment variables
   */
  private loadConfig(): DatabaseConfig {
    const envConfig = getConfigManager().getDatabaseConfig();

    return {
      host: envConfig.host || 'localhost',
      port: envConfig.port || 5432,
      database: envConfig.database || 'record_store',
      user: envConfig.user || 'postgres',
      password: envConfig.password || 'password',
      min: envConfig.min || 2,
      max: envConfig.max || 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
      statement_timeout: 30000,
      query_timeout: 30000,
    };
  }

  /**
   * Initialize database connection pool
   */
  public async connect(): Promise<void> {
    const config = this.config ?? this.loadConfig();
    this.config = config;

    try {
      this.pool = new Pool(config);

      // Handle pool errors
      this.pool.on('error', (err: Error) => {
        logger.error('Unexpected database pool error', { error: err.message });
      });

      // Test connection
      const client = await this.pool.connect();
      const result = await client.query('SELECT NOW() as connected_at, version()');
      client.release();

      this.isConnected = true;
      logger.info('Database connected successfully', {
        host: config.host,
        database: config.database,
        connectedAt: result.rows[0].connected_at,
        version: result.rows[0].version.split(' ')[0], // Just get PostgreSQL version
      });
    } catch (error) {
      this.isConnected = false;
      logger.error('Database connection failed', {
        error: error instanceof Error ? error.message : String(error),
        config: {
          host: config.host,
          port: config.port,
          database: config.database,
          user: config.user,
        },
      });
      throw new DatabaseError(`Database connection failed: ${error}`);
    }
  }

  /**
   * Get a client from the pool for transactions
   */
  public async getClient(): Promise<PoolClient> {
    if (!this.pool || !this.isConnected) {
      throw new DatabaseError('Database not connected');
    }

    try {
      return await this.pool.connect();
    } catch (error) {
      logger.error('Failed to get database client', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new DatabaseError(`Failed to get database client: ${error}`);
    }
  }

  /**
   * Execute a transaction with automatic rollback on error
   */
  public async transaction<T>(
    callback: (client: QueryClient) => Promise<T>,
    traceId?: string
  ): Promise<T> {
    const log = traceId ? logger.withTrace(traceId) : logger;
    const client = await this.getClient();

    try {
      await client.query('BEGIN');
      log.debug('Transaction started');

      const result = await callback(client);

      await client.query('COMMIT');
      log.debug('Transaction committed successfully');

      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
        log.error('Transaction rolled back due to error', {
          error: error instanceof Error ? error.message : String(error),
        });
      } catch (rollbackError) {
        log.error('Transaction rollback failed', {
          error: error instanceof Error ? error.message : String(error),
          rollbackError:
            rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
      }
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Close database connection pool
   */
  public async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.isConnected = false;
      logger.info('Database connection closed');
    }
  }

  /**
   * Check if database is connected and healthy
   */
  public isHealthy(): boolean {
    return this.isConnected && this.pool !== null;
  }
}

// Export singleton instance
const database = new Database();
export default database;
