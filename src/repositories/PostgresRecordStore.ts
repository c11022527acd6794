/**
 * PostgreSQL record store
 * Performs bulk writes one record at a time inside a single transaction, isolating each record
 * behind a savepoint so that a failing record does not abort the batch
 */

import { z } from 'zod';
import { QueryClient, TransactionRunner } from '../config/database';
import { BulkWriteClient, BulkWriteOptions, WriteRecord } from '../interfaces/BulkWriteClient';
import {
  DeleteOutcome,
  RawOutcome,
  SaveOutcome,
  StoreWriteError,
  UpsertOutcome,
} from '../models/outcomes';
import { RecordStoreConfig } from '../types/database';
import { ValidationError } from '../utils/error';
import { logger } from '../utils/logger';

const SAVEPOINT = 'bulk_write_record';

// SQLSTATE -> symbolic status code
const STATUS_CODE_BY_SQLSTATE = new Map<string, string>([
  ['23502', 'REQUIRED_FIELD_MISSING'],
  ['23505', 'DUPLICATE_VALUE'],
  ['23514', 'FIELD_CUSTOM_VALIDATION_EXCEPTION'],
  ['23503', 'INVALID_CROSS_REFERENCE_KEY'],
  ['22P02', 'INVALID_FIELD'],
  ['22001', 'INVALID_FIELD'],
  ['42703', 'INVALID_FIELD'],
  ['42501', 'INSUFFICIENT_ACCESS_OR_READONLY'],
]);

const pgErrorSchema = z.object({
  message: z.string().optional(),
  code: z.string().optional(),
  column: z.string().optional(),
  detail: z.string().optional(),
});

const returnedIdSchema = z.object({
  id: z.union([z.string(), z.number().transform(String)]),
});

const upsertedRowSchema = returnedIdSchema.extend({
  inserted: z.boolean(),
});

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Convert a database error thrown for one record into a raw write error
 */
export function toStoreWriteError(error: unknown): StoreWriteError {
  const parsed = pgErrorSchema.safeParse(error);
  if (!parsed.success) {
    return new StoreWriteError({ message: String(error) });
  }

  const { message, code, column, detail } = parsed.data;
  let fields: string[] = [];
  if (column) {
    fields = [column];
  } else {
    // e.g. Key (email)=(a@example.com) already exists.
    const keyMatch = detail?.match(/^Key \(([^)]+)\)=/);
    if (keyMatch?.[1]) {
      fields = keyMatch[1].split(',').map(field => field.trim());
    }
  }

  return new StoreWriteError({
    fields,
    message,
    statusCode: code ? STATUS_CODE_BY_SQLSTATE.get(code) : undefined,
  });
}

export class PostgresRecordStore implements BulkWriteClient {
  private readonly runner: TransactionRunner;
  private readonly config: RecordStoreConfig;
  private readonly table: string;
  private readonly idColumn: string;

  constructor(runner: TransactionRunner, config: RecordStoreConfig) {
    this.runner = runner;
    this.config = config;
    this.table = quoteIdentifier(config.table);
    this.idColumn = quoteIdentifier(config.idColumn);
  }

  public save(records: readonly WriteRecord[], options: BulkWriteOptions): Promise<SaveOutcome[]> {
    return this.writeEach(
      'save',
      records,
      options,
      (client, record) => this.saveRecord(client, record),
      (record, error) =>
        new SaveOutcome({ success: false, id: this.recordIdOf(record), errors: [error] })
    );
  }

  public upsert(
    records: readonly WriteRecord[],
    options: BulkWriteOptions
  ): Promise<UpsertOutcome[]> {
    const externalIdField = options.externalIdField ?? this.config.externalIdField;
    if (!externalIdField) {
      return Promise.reject(
        new ValidationError('Upsert requires an external id field', { table: this.config.table })
      );
    }

    return this.writeEach(
      'upsert',
      records,
      options,
      (client, record) => this.upsertRecord(client, record, externalIdField),
      (record, error) =>
        new UpsertOutcome({ success: false, id: this.recordIdOf(record), errors: [error] })
    );
  }

  public delete(
    records: readonly WriteRecord[],
    options: BulkWriteOptions
  ): Promise<DeleteOutcome[]> {
    return this.writeEach(
      'delete',
      records,
      options,
      (client, record) => this.deleteRecord(client, record),
      (record, error) =>
        new DeleteOutcome({ success: false, id: this.recordIdOf(record), errors: [error] })
    );
  }

  private async writeEach<TOutcome extends RawOutcome>(
    operation: string,
    records: readonly WriteRecord[],
    options: BulkWriteOptions,
    write: (client: QueryClient, record: WriteRecord) => Promise<TOutcome>,
    toFailure: (record: WriteRecord, error: StoreWriteError) => TOutcome
  ): Promise<TOutcome[]> {
    const log = logger.withTrace(options.traceId);

    const outcomes = await this.runner.transaction(async client => {
      const results: TOutcome[] = [];

      for (const [index, record] of records.entries()) {
        await client.query(`SAVEPOINT ${SAVEPOINT}`);
        try {
          results.push(await write(client, record));
          await client.query(`RELEASE SAVEPOINT ${SAVEPOINT}`);
        } catch (error) {
          if (options.allOrNone) {
            throw error;
          }
          await client.query(`ROLLBACK TO SAVEPOINT ${SAVEPOINT}`);

          const writeError = toStoreWriteError(error);
          log.debug('Record write failed', {
            operation,
            index,
            statusCode: writeError.getStatusCode(),
            error: writeError.getMessage(),
          });
          results.push(toFailure(record, writeError));
        }
      }

      return results;
    }, options.traceId);

    const successCount = outcomes.filter(outcome => outcome.isSuccess()).length;
    log.info(`Bulk ${operation} completed`, {
      table: this.config.table,
      totalRecords: records.length,
      successCount,
      failureCount: outcomes.length - successCount,
      allOrNone: options.allOrNone,
    });

    return outcomes;
  }

  private async saveRecord(client: QueryClient, record: WriteRecord): Promise<SaveOutcome> {
    const id = this.recordIdOf(record);
    const columns = this.columnsOf(record, [this.config.idColumn]);
    const values = columns.map(column => record[column]);

    if (id === undefined) {
      const query =
        columns.length > 0
          ? `INSERT INTO ${this.table} (${columns.map(quoteIdentifier).join(', ')})
             VALUES (${columns.map((_, index) => `$${index + 1}`).join(', ')})
             RETURNING ${this.idColumn} AS id`
          : `INSERT INTO ${this.table} DEFAULT VALUES RETURNING ${this.idColumn} AS id`;

      const result = await client.query(query, values);
      const row = returnedIdSchema.parse(result.rows[0]);
      return new SaveOutcome({ success: true, id: row.id });
    }

    const query =
      columns.length > 0
        ? `UPDATE ${this.table}
           SET ${columns.map((column, index) => `${quoteIdentifier(column)} = $${index + 1}`).join(', ')}
           WHERE ${this.idColumn} = $${columns.length + 1}
           RETURNING ${this.idColumn} AS id`
        : `SELECT ${this.idColumn} AS id FROM ${this.table} WHERE ${this.idColumn} = $1`;

    const result = await client.query(query, [...values, id]);
    if (result.rows.length === 0) {
      return new SaveOutcome({ success: false, id, errors: [this.notFoundError(id)] });
    }

    return new SaveOutcome({ success: true, id: returnedIdSchema.parse(result.rows[0]).id });
  }

  private async upsertRecord(
    client: QueryClient,
    record: WriteRecord,
    externalIdField: string
  ): Promise<UpsertOutcome> {
    const externalId = record[externalIdField];
    if (externalId === undefined || externalId === null || externalId === '') {
      return new UpsertOutcome({
        success: false,
        id: this.recordIdOf(record),
        errors: [
          new StoreWriteError({
            fields: [externalIdField],
            message: `Missing value for external id field ${externalIdField}`,
            statusCode: 'MISSING_ARGUMENT',
          }),
        ],
      });
    }

    const columns = this.columnsOf(record, []);
    const values = columns.map(column => record[column]);

    const query = `
      INSERT INTO ${this.table} (${columns.map(quoteIdentifier).join(', ')})
      VALUES (${columns.map((_, index) => `$${index + 1}`).join(', ')})
      ON CONFLICT (${quoteIdentifier(externalIdField)}) DO UPDATE SET
        ${columns.map(column => `${quoteIdentifier(column)} = EXCLUDED.${quoteIdentifier(column)}`).join(', ')}
      RETURNING ${this.idColumn} AS id, (xmax = 0) AS inserted
    `;

    const result = await client.query(query, values);
    const row = upsertedRowSchema.parse(result.rows[0]);

    return new UpsertOutcome({ success: true, id: row.id, created: row.inserted });
  }

  private async deleteRecord(client: QueryClient, record: WriteRecord): Promise<DeleteOutcome> {
    const id = this.recordIdOf(record);
    if (id === undefined) {
      return new DeleteOutcome({
        success: false,
        errors: [
          new StoreWriteError({
            fields: [this.config.idColumn],
            message: 'Delete requires a record id',
            statusCode: 'MISSING_ARGUMENT',
          }),
        ],
      });
    }

    const result = await client.query(
      `DELETE FROM ${this.table} WHERE ${this.idColumn} = $1 RETURNING ${this.idColumn} AS id`,
      [id]
    );
    if (result.rows.length === 0) {
      return new DeleteOutcome({ success: false, id, errors: [this.notFoundError(id)] });
    }

    return new DeleteOutcome({ success: true, id });
  }

  private recordIdOf(record: WriteRecord): string | undefined {
    const id = record[this.config.idColumn];
    return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined;
  }

  private columnsOf(record: WriteRecord, excluded: string[]): string[] {
    return Object.keys(record).filter(
      column => !excluded.includes(column) && record[column] !== undefined
    );
  }

  private notFoundError(id: string): StoreWriteError {
    return new StoreWriteError({
      fields: [this.config.idColumn],
      message: `No record found with ${this.config.idColumn} ${id}`,
      statusCode: 'ENTITY_NOT_FOUND',
    });
  }
}
