import { ulid } from 'ulid';
import { BatchJob } from '../types/batch.js';

export function makeJob(overrides: Partial<BatchJob> = {}): BatchJob {
  const params = overrides.params ?? [{ date: '2025-01-01', periodType: 11 }];
  return {
    id: ulid(),
    endpoint: 'http://example.com/dtj/api/plan',
    method: 'POST',
    sourceId: 1161,
    params,
    metadata: { requestedBy: 'test' },
    status: 'queued',
    progress: { total: params.length, succeeded: 0, failed: 0, cancelled: 0 },
    cancelRequested: false,
    createdAt: new Date('2025-01-01T00:00:00.000Z'),
    startedAt: null,
    completedAt: null,
    result: null,
    error: null,
    ...overrides,
  };
}
