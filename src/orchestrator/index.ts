import { ulid } from 'ulid';
import type { Logger } from '../logger.js';
import { JobQueue, JobStore } from '../repositories/base.js';
import { ResultFileManager } from '../results/file-manager.js';
import { AllowlistValidator } from '../security/allowlist.js';
import type { BatchWorker } from '../worker/index.js';
import {
  ConflictError,
  InternalError,
  LimitExceededError,
  NotFoundError,
  QueueFullError,
  ValidationError,
  describeError,
} from '../errors.js';
import { msg } from '../lib/error-messages.js';
import {
  BatchItemResult,
  BatchJob,
  JobStatus,
  JobStatusView,
  ParamSet,
  SubmitBatchData,
  isTerminal,
} from '../types/batch.js';

export interface OrchestratorConfig {
  maxItems: number;
  queueMaxSize: number;
  maxRecords?: number;
}

export interface OrchestratorDeps {
  store: JobStore;
  queue: JobQueue;
  allowlist: AllowlistValidator;
  results: ResultFileManager;
  logger: Logger;
  worker?: BatchWorker;
}

export interface SubmitResult {
  job_id: string;
  status: 'queued';
}

export interface CancelResult {
  job_id: string;
  status: JobStatus;
  cancelRequested: boolean;
}

export interface RemoveResult {
  job_id: string;
  deleted: true;
}

export interface JobResults {
  job_id: string;
  status: JobStatus;
  items: unknown[];
}

/** Expected records for one parameter set: its numeric `limit`, else 1. */
export function expectedRecords(params: ParamSet): number {
  const limit = params.limit;
  return typeof limit === 'number' && Number.isFinite(limit) && limit > 0 ? Math.ceil(limit) : 1;
}

export function toStatusView(job: BatchJob): JobStatusView {
  const view: JobStatusView = {
    job_id: job.id,
    status: job.status,
    progress: job.progress,
    cancelRequested: job.cancelRequested,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString() ?? null,
    completedAt: job.completedAt?.toISOString() ?? null,
    error: job.error,
  };
  if (isTerminal(job.status) && job.result) {
    view.result = job.result;
  }
  return view;
}

/**
 * Entry point for batch jobs: admission control on submit, status and
 * result queries, and cancellation. Execution belongs to the BatchWorker.
 */
export class BatchOrchestrator {
  private readonly log: Logger;

  constructor(private deps: OrchestratorDeps, private config: OrchestratorConfig) {
    this.log = deps.logger.child({ component: 'orchestrator' });
  }

  async submit(data: SubmitBatchData): Promise<SubmitResult> {
    const { params } = data;

    if (params.length === 0) {
      throw new ValidationError('EMPTY_BATCH', msg('EMPTY_BATCH'), { params: 0 });
    }
    if (params.length > this.config.maxItems) {
      throw new LimitExceededError('BATCH_TOO_LARGE', { max: this.config.maxItems, count: params.length });
    }
    if (this.config.maxRecords !== undefined) {
      const count = params.reduce((sum, set) => sum + expectedRecords(set), 0);
      if (count > this.config.maxRecords) {
        throw new LimitExceededError('RECORDS_LIMIT_EXCEEDED', { count, limit: this.config.maxRecords });
      }
    }

    const endpoint = await this.deps.allowlist.resolve(data.endpoint);

    const depth = await this.deps.queue.size();
    if (depth >= this.config.queueMaxSize) {
      throw new QueueFullError(depth);
    }

    const job: BatchJob = {
      id: ulid(),
      endpoint,
      method: data.method ?? 'POST',
      sourceId: data.sourceId ?? null,
      params: params.map(set => ({ ...set })),
      metadata: data.metadata ?? null,
      status: 'queued',
      progress: { total: params.length, succeeded: 0, failed: 0, cancelled: 0 },
      cancelRequested: false,
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
      result: null,
      error: null,
    };

    await this.deps.store.put(job);
    try {
      await this.deps.queue.enqueue(job.id);
    } catch (error) {
      await this.markFailed(job, error);
      throw error;
    }

    this.log.info({ jobId: job.id, items: params.length, method: job.method }, 'job queued');
    this.deps.worker?.notify();

    return { job_id: job.id, status: 'queued' };
  }

  async getJob(jobId: string): Promise<BatchJob> {
    const job = await this.deps.store.get(jobId);
    if (!job) {
      throw new NotFoundError('JOB_NOT_FOUND');
    }
    return job;
  }

  async getStatus(jobId: string): Promise<JobStatusView> {
    return toStatusView(await this.getJob(jobId));
  }

  /**
   * Items of a finished job, read back from the result file when the
   * result was offloaded.
   */
  async getResults(jobId: string): Promise<JobResults> {
    const job = await this.getJob(jobId);

    if (!isTerminal(job.status)) {
      throw new ConflictError(job.status);
    }
    if (!job.result) {
      throw new NotFoundError('RESULT_NOT_FOUND');
    }

    const items = job.result.kind === 'inline'
      ? job.result.items
      : await this.deps.results.get(job.result.reference);

    return { job_id: job.id, status: job.status, items };
  }

  /**
   * Idempotent. A queued job is cancelled outright with zero dispatches; a
   * running job is flagged and stops before its next dispatch.
   */
  async cancel(jobId: string): Promise<CancelResult> {
    const job = await this.getJob(jobId);

    if (isTerminal(job.status)) {
      return { job_id: job.id, status: job.status, cancelRequested: job.cancelRequested };
    }

    if (job.status === 'queued' && await this.deps.queue.remove(job.id)) {
      const cancelled = await this.cancelQueued(job);
      this.log.info({ jobId: job.id, items: job.params.length }, 'queued job cancelled');
      return { job_id: cancelled.id, status: cancelled.status, cancelRequested: cancelled.cancelRequested };
    }

    // Running here: the worker carries the flag into its next progress write
    if (this.deps.worker?.requestCancel(job.id)) {
      this.log.info({ jobId: job.id }, 'cancel requested for running job');
      return { job_id: job.id, status: job.status, cancelRequested: true };
    }

    // Running elsewhere (or just dequeued): persist the flag for the worker to observe
    const current = await this.deps.store.update(jobId, stored => ({ ...stored, cancelRequested: true }));
    if (!current) {
      throw new NotFoundError('JOB_NOT_FOUND');
    }
    if (!isTerminal(current.status)) {
      this.log.info({ jobId: job.id, status: current.status }, 'cancel request recorded');
    }

    return { job_id: current.id, status: current.status, cancelRequested: current.cancelRequested };
  }

  /**
   * Deletes a finished job together with its result file. Unfinished jobs
   * have to be cancelled first.
   */
  async remove(jobId: string): Promise<RemoveResult> {
    const job = await this.getJob(jobId);
    if (!isTerminal(job.status)) {
      throw new ConflictError(job.status);
    }

    if (job.result?.kind === 'file') {
      await this.deps.results.delete(job.result.reference);
    }
    await this.deps.store.delete(job.id);
    this.log.info({ jobId: job.id, status: job.status }, 'job removed');

    return { job_id: job.id, deleted: true };
  }

  queueDepth(): Promise<number> {
    return this.deps.queue.size();
  }

  private async cancelQueued(job: BatchJob): Promise<BatchJob> {
    const now = new Date();
    const cancelled = await this.deps.store.update(job.id, current => {
      if (current.status !== 'queued') return null;
      const items: BatchItemResult[] = current.params.map((params, index) => ({
        index,
        params,
        outcome: 'cancelled',
        ok: false,
        finishedAt: now,
      }));
      return {
        ...current,
        status: 'cancelled',
        cancelRequested: true,
        progress: { total: current.params.length, succeeded: 0, failed: 0, cancelled: current.params.length },
        completedAt: now,
        result: { kind: 'inline', items },
      };
    });
    if (!cancelled) {
      throw new NotFoundError('JOB_NOT_FOUND');
    }
    return cancelled;
  }

  private async markFailed(job: BatchJob, cause: unknown): Promise<void> {
    const error = cause instanceof InternalError
      ? { code: cause.code, message: cause.message }
      : { code: 'INTERNAL_ERROR', message: describeError(cause) };

    try {
      await this.deps.store.update(job.id, current => (
        current.status === 'queued' ? { ...current, status: 'failed', completedAt: new Date(), error } : null
      ));
    } catch (writeError) {
      this.log.error({ err: writeError, jobId: job.id }, 'could not record enqueue failure');
    }
  }
}
