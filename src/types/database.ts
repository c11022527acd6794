/**
 * Database-related type definitions
 */

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  min: number;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  statement_timeout: number;
  query_timeout: number;
}

export interface RecordStoreConfig {
  table: string;
  idColumn: string;
  /** Default conflict target for upserts */
  externalIdField?: string;
}
