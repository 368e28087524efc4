import type { Logger } from '../logger.js';
import { JobQueue, JobStore } from '../repositories/base.js';
import { ResultFileManager } from '../results/file-manager.js';
import { UpstreamClient } from '../upstream/client.js';
import { AppError, InternalError, describeError } from '../errors.js';
import {
  BatchItemResult,
  BatchJob,
  JobError,
  JobProgress,
  JobResultRef,
  JobStatus,
  canTransition,
} from '../types/batch.js';

export interface WorkerConfig {
  workers: number;
  itemConcurrency: number;
  pollIntervalMs: number;
  maxInlineBytes: number;
  shutdownGraceMs?: number;
}

export interface WorkerDeps {
  store: JobStore;
  queue: JobQueue;
  upstream: UpstreamClient;
  results: ResultFileManager;
  logger: Logger;
}

export interface WorkerStats {
  running: number;
  completed: number;
  failed: number;
  cancelled: number;
  skipped: number;
}

interface RunningJob {
  id: string;
  cancelRequested: boolean;
  failure?: unknown;
  progress: JobProgress;
  chain: Promise<void>;
  writeScheduled: boolean;
}

/**
 * Pulls job ids off the queue and runs up to `workers` jobs at once. Each
 * job fans its parameter sets out over `itemConcurrency` lanes.
 *
 * Cancellation is cooperative: the flag is checked before every dispatch
 * and in-flight upstream calls always run to completion.
 */
export class BatchWorker {
  private isRunning = false;
  private pollTimer?: NodeJS.Timeout;
  private runningJobs = new Map<string, RunningJob>();
  private tasks = new Set<Promise<void>>();
  private filling = false;
  private refill = false;
  private stats: WorkerStats = {
    running: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
    skipped: 0,
  };
  private readonly log: Logger;

  constructor(private deps: WorkerDeps, private config: WorkerConfig) {
    this.log = deps.logger.child({ component: 'worker' });
  }

  get active(): boolean {
    return this.isRunning;
  }

  async start(): Promise<void> {
    if (this.isRunning) return;

    this.isRunning = true;
    this.log.info({ workers: this.config.workers, itemConcurrency: this.config.itemConcurrency }, 'worker started');
    this.scheduleNextPoll();
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.isRunning = false;

    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = undefined;
    }

    // In-flight jobs are allowed to finish within the grace period
    const gracePeriod = this.config.shutdownGraceMs ?? 5000;
    const start = Date.now();

    while (this.tasks.size > 0 && Date.now() - start < gracePeriod) {
      await new Promise(resolve => setTimeout(resolve, 20));
    }

    if (this.tasks.size > 0) {
      this.log.warn({ unfinished: [...this.runningJobs.keys()] }, 'worker stopped with jobs still running');
    }
    this.log.info('worker stopped');
  }

  /** Wakes the pool without waiting for the next poll tick. */
  notify(): void {
    if (!this.isRunning) return;
    void this.fill();
  }

  /**
   * Sets the in-process cancellation flag of a job running here. Returns
   * false when this process is not running the job.
   */
  requestCancel(jobId: string): boolean {
    const run = this.runningJobs.get(jobId);
    if (!run) return false;
    run.cancelRequested = true;
    return true;
  }

  getStats(): WorkerStats & { capacity: number } {
    return {
      ...this.stats,
      running: this.runningJobs.size,
      capacity: this.config.workers,
    };
  }

  private scheduleNextPoll(): void {
    if (!this.isRunning) return;

    this.pollTimer = setTimeout(() => {
      this.fill().finally(() => {
        this.scheduleNextPoll();
      });
    }, this.config.pollIntervalMs);
  }

  private async fill(): Promise<void> {
    if (this.filling) {
      this.refill = true;
      return;
    }

    this.filling = true;
    try {
      do {
        this.refill = false;
        while (this.isRunning && this.runningJobs.size < this.config.workers) {
          const jobId = await this.deps.queue.dequeue();
          if (!jobId) break;
          this.launch(jobId);
        }
      } while (this.refill && this.isRunning);
    } catch (error) {
      this.log.error({ err: error }, 'error while polling the queue');
    } finally {
      this.filling = false;
    }
  }

  private launch(jobId: string): void {
    if (this.runningJobs.has(jobId)) {
      this.log.warn({ jobId }, 'job already running here, dropping duplicate queue entry');
      return;
    }

    const run: RunningJob = {
      id: jobId,
      cancelRequested: false,
      progress: { total: 0, succeeded: 0, failed: 0, cancelled: 0 },
      chain: Promise.resolve(),
      writeScheduled: false,
    };
    this.runningJobs.set(jobId, run);

    const task = this.executeJob(run).finally(() => {
      this.runningJobs.delete(jobId);
      this.tasks.delete(task);
      this.notify();
    });
    this.tasks.add(task);
  }

  private async executeJob(run: RunningJob): Promise<void> {
    const log = this.log.child({ jobId: run.id });
    const started = Date.now();

    try {
      const startedAt = new Date();
      let claimed = false;
      const job = await this.deps.store.update(run.id, current => {
        claimed = current.status === 'queued';
        return claimed ? { ...current, status: 'running', startedAt } : null;
      });
      if (!job) {
        log.warn('dequeued job no longer exists, skipping');
        this.stats.skipped++;
        return;
      }
      if (!claimed) {
        log.info({ status: job.status }, 'dequeued job is not queued, skipping');
        this.stats.skipped++;
        return;
      }

      run.progress = { total: job.params.length, succeeded: 0, failed: 0, cancelled: 0 };
      run.cancelRequested = run.cancelRequested || job.cancelRequested;
      log.info({ items: job.params.length }, 'job started');

      const items = await this.dispatchItems(job, run);
      await run.chain;

      if (run.failure !== undefined) {
        throw run.failure;
      }

      const status = await this.finalize(job, run, items);
      log.info({ status, ...run.progress, durationMs: Date.now() - started }, 'job finished');
    } catch (error) {
      log.error({ err: error, durationMs: Date.now() - started }, 'job failed');
      await this.failJob(run.id, error, log);
    }
  }

  private async dispatchItems(job: BatchJob, run: RunningJob): Promise<BatchItemResult[]> {
    const total = job.params.length;
    const results = new Array<BatchItemResult | undefined>(total);
    let next = 0;

    const lane = async (): Promise<void> => {
      while (!run.cancelRequested && run.failure === undefined) {
        const index = next++;
        if (index >= total) return;

        const params = job.params[index];
        const outcome = await this.deps.upstream.call({
          url: job.endpoint,
          method: job.method,
          params,
          sourceId: job.sourceId,
        });

        const finishedAt = new Date();
        if (outcome.ok) {
          results[index] = { index, params, outcome: 'success', ok: true, statusCode: outcome.statusCode, data: outcome.data, finishedAt };
          run.progress.succeeded++;
        } else {
          results[index] = { index, params, outcome: 'error', ok: false, error: outcome.error, finishedAt };
          run.progress.failed++;
        }
        this.scheduleProgressWrite(run);
      }
    };

    const lanes = Math.min(this.config.itemConcurrency, total);
    await Promise.all(Array.from({ length: lanes }, lane));

    const cancelledAt = new Date();
    return Array.from(results, (item, index): BatchItemResult => {
      if (item) return item;
      run.progress.cancelled++;
      return { index, params: job.params[index], outcome: 'cancelled', ok: false, finishedAt: cancelledAt };
    });
  }

  /**
   * Queues a progress write behind the previous one. Writes coalesce: a
   * write that has not started yet picks up every later count.
   */
  private scheduleProgressWrite(run: RunningJob): void {
    if (run.writeScheduled) return;
    run.writeScheduled = true;

    run.chain = run.chain.then(async () => {
      run.writeScheduled = false;
      try {
        await this.persistProgress(run);
      } catch (error) {
        run.failure = error;
      }
    });
  }

  private async persistProgress(run: RunningJob): Promise<void> {
    if (run.failure !== undefined) return;

    const stored = await this.deps.store.update(run.id, current => ({
      ...current,
      progress: { ...run.progress },
      cancelRequested: current.cancelRequested || run.cancelRequested,
    }));
    if (!stored) {
      throw new InternalError('STORE_UNAVAILABLE', 'Job record disappeared while running');
    }

    // Cancellation requested through another process lands here
    if (stored.cancelRequested || stored.status === 'cancelled') {
      run.cancelRequested = true;
    }
  }

  private async finalize(job: BatchJob, run: RunningJob, items: BatchItemResult[]): Promise<JobStatus> {
    const result = await this.consolidate(job.id, items);
    const completedAt = new Date();

    let finished = false;
    const stored = await this.deps.store.update(job.id, current => {
      const cancelled = run.cancelRequested || current.cancelRequested;
      const status: JobStatus = cancelled ? 'cancelled' : 'completed';
      finished = canTransition(current.status, status);
      if (!finished) return null;
      return { ...current, status, cancelRequested: cancelled, progress: { ...run.progress }, completedAt, result, error: null };
    });

    if (!stored || !finished) {
      await this.discard(result);
      if (!stored) {
        throw new InternalError('STORE_UNAVAILABLE', 'Job record disappeared before completion');
      }
      // Another writer finished the job first
      this.stats.skipped++;
      return stored.status;
    }

    if (stored.status === 'cancelled') {
      this.stats.cancelled++;
    } else {
      this.stats.completed++;
    }
    return stored.status;
  }

  private async discard(result: JobResultRef): Promise<void> {
    if (result.kind === 'file') {
      await this.deps.results.delete(result.reference);
    }
  }

  private async consolidate(jobId: string, items: BatchItemResult[]): Promise<JobResultRef> {
    let serialized: string;
    try {
      serialized = JSON.stringify(items);
    } catch (error) {
      throw new InternalError('SERIALIZATION_FAILED', describeError(error), error);
    }

    if (Buffer.byteLength(serialized, 'utf8') <= this.config.maxInlineBytes) {
      return { kind: 'inline', items };
    }
    return this.deps.results.put(jobId, items);
  }

  private async failJob(jobId: string, error: unknown, log: Logger): Promise<void> {
    const jobError: JobError = error instanceof AppError
      ? { code: error.code, message: error.message }
      : { code: 'INTERNAL_ERROR', message: describeError(error) };

    try {
      let marked = false;
      await this.deps.store.update(jobId, current => {
        marked = canTransition(current.status, 'failed');
        return marked ? { ...current, status: 'failed', completedAt: new Date(), error: jobError } : null;
      });
      if (marked) this.stats.failed++;
    } catch (writeError) {
      log.error({ err: writeError }, 'could not record job failure');
    }
  }
}
