import { z } from 'zod';
import type { BatchItemResult, BatchJob, ItemSuccess } from '../types/batch.js';

export const JobStatusSchema = z.enum(['queued', 'running', 'completed', 'failed', 'cancelled']);

export const HttpMethodSchema = z.preprocess(
  (val) => (typeof val === 'string' ? val.toUpperCase() : val),
  z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']),
);

export const ParamSetSchema = z.record(z.unknown());

const SourceIdSchema = z.union([z.string().min(1), z.number().int()]);

// Item count is checked by the orchestrator so that an oversized batch gets
// its own error code rather than a generic validation failure.
export const SubmitBatchSchema = z.object({
  endpoint: z.string().min(1).optional(),
  method: HttpMethodSchema.default('POST'),
  sourceId: SourceIdSchema.optional(),
  params: z.array(ParamSetSchema),
  metadata: z.unknown().optional(),
});

export const JobParamsSchema = z.object({
  jobId: z.string().min(1).max(64),
});

export const FilterValuesSchema = z.object({
  templateId: z.string().optional(),
  endpoint: z.string().min(1).optional(),
  method: HttpMethodSchema.default('POST'),
  sourceId: SourceIdSchema.optional(),
  params: ParamSetSchema.optional(),
  fields: z.array(z.string().min(1)).min(1).max(50),
});

export type SubmitBatchRequest = z.infer<typeof SubmitBatchSchema>;
export type JobParams = z.infer<typeof JobParamsSchema>;
export type FilterValuesRequest = z.infer<typeof FilterValuesSchema>;

// Stored job records, as read back from an external store.

const StoredDate = z.coerce.date();

const ItemBase = {
  index: z.number().int().nonnegative(),
  params: ParamSetSchema,
  finishedAt: StoredDate,
};

const ItemResultSchema = z.discriminatedUnion('outcome', [
  z.object({
    ...ItemBase,
    outcome: z.literal('success'),
    ok: z.literal(true),
    statusCode: z.number().int(),
    data: z.unknown(),
  }),
  z.object({
    ...ItemBase,
    outcome: z.literal('error'),
    ok: z.literal(false),
    error: z.object({
      kind: z.enum(['timeout', 'connection', 'http_status', 'invalid_response']),
      message: z.string(),
      statusCode: z.number().int().optional(),
    }),
  }),
  z.object({
    ...ItemBase,
    outcome: z.literal('cancelled'),
    ok: z.literal(false),
  }),
]).transform((item): BatchItemResult => {
  if (item.outcome === 'success') {
    const success: ItemSuccess = { ...item, data: item.data };
    return success;
  }
  return item;
});

const JobResultRefSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('inline'), items: z.array(ItemResultSchema) }),
  z.object({
    kind: z.literal('file'),
    reference: z.string().min(1),
    itemCount: z.number().int().nonnegative(),
    byteSize: z.number().int().nonnegative(),
  }),
]);

export const BatchJobRecordSchema = z.object({
  id: z.string().min(1),
  endpoint: z.string().min(1),
  method: HttpMethodSchema,
  sourceId: SourceIdSchema.nullable(),
  params: z.array(ParamSetSchema),
  metadata: z.unknown(),
  status: JobStatusSchema,
  progress: z.object({
    total: z.number().int().nonnegative(),
    succeeded: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    cancelled: z.number().int().nonnegative(),
  }),
  cancelRequested: z.boolean(),
  createdAt: StoredDate,
  startedAt: StoredDate.nullable(),
  completedAt: StoredDate.nullable(),
  result: JobResultRefSchema.nullable(),
  error: z.object({ code: z.string(), message: z.string() }).nullable(),
}).transform((job): BatchJob => ({ ...job, metadata: job.metadata }));
