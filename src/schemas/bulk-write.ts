/**
 * Bulk write validation schemas
 */

import { z } from 'zod';

export const operationKindSchema = z.enum(['insert_update', 'upsert', 'delete']);

export type OperationKind = z.infer<typeof operationKindSchema>;

export const bulkWriteRequestOptionsSchema = z.object({
  traceId: z.string().min(1).optional(),
  externalIdField: z.string().min(1, 'External id field cannot be empty').optional(),
});

export type BulkWriteRequestOptions = z.infer<typeof bulkWriteRequestOptionsSchema>;
