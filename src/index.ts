/**
 * Package entry: canonical bulk write results
 */

// Load environment variables
import dotenv from 'dotenv';
dotenv.config();

import { getConfigManager } from './config/app';
import database, { TransactionRunner } from './config/database';
import { PostgresRecordStore } from './repositories/PostgresRecordStore';
import { ResultService } from './services/ResultService';
import { RecordStoreConfig } from './types/database';

export * from './types/results';
export * from './models/CanonicalResult';
export * from './models/outcomes';
export * from './interfaces/OutcomeStrategy';
export * from './interfaces/BulkWriteClient';
export * from './strategies/TypedOutcomeStrategy';
export * from './strategies/SaveOutcomeStrategy';
export * from './strategies/UpsertOutcomeStrategy';
export * from './strategies/DeleteOutcomeStrategy';
export * from './strategies/GenericOutcomeStrategy';
export * from './registry/StrategyRegistry';
export * from './services/ResultService';
export * from './repositories/PostgresRecordStore';
export { operationKindSchema } from './schemas/bulk-write';
export type { OperationKind, BulkWriteRequestOptions } from './schemas/bulk-write';
export { BulkWriteError, DatabaseError, ValidationError } from './utils/error';
export { database };

export interface PostgresResultServiceOptions {
  runner?: TransactionRunner;
  store?: Partial<RecordStoreConfig>;
}

/**
 * Build a ResultService backed by PostgreSQL, configured from the environment.
 * The shared database must be connected before the first write.
 */
export function createPostgresResultService(
  options: PostgresResultServiceOptions = {}
): ResultService {
  const storeConfig: RecordStoreConfig = { ...getConfigManager().getRecordStoreConfig() };
  if (options.store?.table !== undefined) {
    storeConfig.table = options.store.table;
  }
  if (options.store?.idColumn !== undefined) {
    storeConfig.idColumn = options.store.idColumn;
  }
  if (options.store?.externalIdField !== undefined) {
    storeConfig.externalIdField = options.store.externalIdField;
  }

  return new ResultService(new PostgresRecordStore(options.runner ?? database, storeConfig));
}
