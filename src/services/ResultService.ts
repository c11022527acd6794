/**
 * Bulk write result service
 * Turns store-specific write outcomes into canonical results, index-aligned with the input
 */

import { v4 as uuidv4 } from 'uuid';
import { BulkWriteClient, BulkWriteOptions, WriteRecord } from '../interfaces/BulkWriteClient';
import { StrategyRegistry } from '../registry/StrategyRegistry';
import {
  BulkWriteRequestOptions,
  OperationKind,
  bulkWriteRequestOptionsSchema,
  operationKindSchema,
} from '../schemas/bulk-write';
import { createCanonicalError, createCanonicalResult } from '../models/CanonicalResult';
import {
  BulkWriteSummary,
  CanonicalResult,
  UNRECOGNIZED_OUTCOME_STATUS_CODE,
} from '../types/results';
import { BulkWriteError } from '../utils/error';

export class ResultService {
  private readonly client: BulkWriteClient;

  constructor(client: BulkWriteClient) {
    this.client = client;
  }

  /**
   * Normalize already-produced outcomes of any mix of shapes.
   * Never throws; an unreadable outcome becomes a failed result at its index.
   */
  public normalizeAll(rawOutcomes: readonly unknown[]): CanonicalResult[] {
    return Array.from(rawOutcomes, raw => this.normalizeOne(raw));
  }

  /**
   * Write the records through the store with partial success allowed, then normalize.
   * Rejects with BulkWriteError only when the batch as a whole fails.
   */
  public async performBulkWrite(
    kind: OperationKind,
    records: readonly WriteRecord[],
    options: BulkWriteRequestOptions = {}
  ): Promise<CanonicalResult[]> {
    const parsedKind = operationKindSchema.safeParse(kind);
    if (!parsedKind.success) {
      throw new BulkWriteError(`Unsupported bulk write operation: ${String(kind)}`, {
        operationKind: String(kind),
        recordCount: records.length,
        code: 'INVALID_OPERATION_KIND',
      });
    }

    const parsedOptions = bulkWriteRequestOptionsSchema.safeParse(options);
    if (!parsedOptions.success) {
      throw new BulkWriteError(
        `Invalid bulk write options: ${parsedOptions.error.errors.map(err => err.message).join(', ')}`,
        { operationKind: kind, recordCount: records.length, code: 'INVALID_OPTIONS' }
      );
    }

    if (records.length === 0) {
      return [];
    }

    const writeOptions: BulkWriteOptions = {
      allOrNone: false,
      traceId: parsedOptions.data.traceId ?? uuidv4(),
      externalIdField: parsedOptions.data.externalIdField,
    };

    let rawOutcomes: readonly unknown[];
    try {
      rawOutcomes = await this.dispatch(parsedKind.data, records, writeOptions);
    } catch (error) {
      throw new BulkWriteError(
        `Bulk ${kind} failed: ${error instanceof Error ? error.message : String(error)}`,
        {
          operationKind: kind,
          recordCount: records.length,
          originalError: error instanceof Error ? error : undefined,
          cause: error,
        }
      );
    }

    if (rawOutcomes.length !== records.length) {
      throw new BulkWriteError(
        `Bulk ${kind} returned ${rawOutcomes.length} outcomes for ${records.length} records`,
        { operationKind: kind, recordCount: records.length, code: 'OUTCOME_COUNT_MISMATCH' }
      );
    }

    return this.normalizeAll(rawOutcomes);
  }

  public bulkUpdate(
    records: readonly WriteRecord[],
    options?: BulkWriteRequestOptions
  ): Promise<CanonicalResult[]> {
    return this.performBulkWrite('insert_update', records, options);
  }

  public bulkUpsert(
    records: readonly WriteRecord[],
    options?: BulkWriteRequestOptions
  ): Promise<CanonicalResult[]> {
    return this.performBulkWrite('upsert', records, options);
  }

  public bulkDelete(
    records: readonly WriteRecord[],
    options?: BulkWriteRequestOptions
  ): Promise<CanonicalResult[]> {
    return this.performBulkWrite('delete', records, options);
  }

  public summarize(results: readonly CanonicalResult[]): BulkWriteSummary {
    const failures = results
      .map((result, index) => ({ index, result }))
      .filter(entry => !entry.result.success);

    return {
      totalProcessed: results.length,
      successCount: results.length - failures.length,
      failureCount: failures.length,
      failures,
    };
  }

  private normalizeOne(raw: unknown): CanonicalResult {
    try {
      return StrategyRegistry.resolve(raw).normalize(raw);
    } catch (error) {
      // Outcomes whose accessors throw are read structurally instead; such a read never succeeds
      const fallback = StrategyRegistry.getFallback().normalize(raw);
      if (!fallback.success) {
        return fallback;
      }

      return createCanonicalResult({
        recordId: fallback.recordId,
        success: false,
        errors: [
          createCanonicalError({
            message: `Write outcome could not be read: ${
              error instanceof Error ? error.message : String(error)
            }`,
            statusCode: UNRECOGNIZED_OUTCOME_STATUS_CODE,
          }),
        ],
      });
    }
  }

  private dispatch(
    kind: OperationKind,
    records: readonly WriteRecord[],
    options: BulkWriteOptions
  ): Promise<readonly unknown[]> {
    switch (kind) {
      case 'insert_update':
        return this.client.save(records, options);
      case 'upsert':
        return this.client.upsert(records, options);
      case 'delete':
        return this.client.delete(records, options);
    }
  }
}
