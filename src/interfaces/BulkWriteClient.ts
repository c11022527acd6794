/**
 * Contract of the record store that performs bulk writes
 */

export type WriteRecord = Record<string, unknown>;

export interface BulkWriteOptions {
  /** When false, a failing record must not abort the rest of the batch */
  allOrNone: boolean;
  traceId: string;
  externalIdField?: string;
}

/**
 * Each method resolves to one raw outcome per record, in submission order.
 * Rejecting means the store refused the batch as a whole.
 */
export interface BulkWriteClient {
  save(records: readonly WriteRecord[], options: BulkWriteOptions): Promise<readonly unknown[]>;
  upsert(records: readonly WriteRecord[], options: BulkWriteOptions): Promise<readonly unknown[]>;
  delete(records: readonly WriteRecord[], options: BulkWriteOptions): Promise<readonly unknown[]>;
}
